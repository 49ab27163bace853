import { createHash, randomBytes, timingSafeEqual } from 'crypto';

const CLIENT_STATE_BYTES = 32;

/**
 * Random per-subscription secret echoed back by the provider on every push
 */
export function generateClientState(): string {
  return randomBytes(CLIENT_STATE_BYTES).toString('base64url');
}

/**
 * Constant-time string comparison.
 * Both sides are hashed first so inputs of different lengths take the same path.
 */
export function secretsEqual(provided: string | undefined, expected: string): boolean {
  if (provided === undefined) {
    return false;
  }
  const providedDigest = createHash('sha256').update(provided).digest();
  const expectedDigest = createHash('sha256').update(expected).digest();
  return timingSafeEqual(providedDigest, expectedDigest);
}
