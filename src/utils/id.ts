import { createHash } from 'crypto';

export interface EventIdParts {
  subscriptionId: string;
  resourceId: string;
  changeType: string;
  timestamp: string;
}

/**
 * Deterministic event id; the same change redelivered by the provider hashes to the same value
 */
export function computeEventId(parts: EventIdParts): string {
  const input = JSON.stringify([parts.subscriptionId, parts.resourceId, parts.changeType, parts.timestamp]);
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Lock key for a (resourceType, account, resourcePath) tuple
 */
export function targetKey(target: { resourceType: string; account: string; resourcePath: string }): string {
  return `${target.resourceType}|${target.account}|${target.resourcePath}`;
}
