import { describe, it, expect } from 'vitest';
import { generateClientState, secretsEqual } from '../../src/utils/secret.js';

describe('generateClientState', () => {
  it('returns 32 random bytes as base64url', () => {
    const state = generateClientState();
    expect(state).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(Buffer.from(state, 'base64url').length).toBe(32);
  });

  it('returns a different value each time', () => {
    expect(generateClientState()).not.toBe(generateClientState());
  });
});

describe('secretsEqual', () => {
  it('matches identical secrets', () => {
    expect(secretsEqual('test-secret', 'test-secret')).toBe(true);
  });

  it('rejects different secrets of any length', () => {
    expect(secretsEqual('test-secreT', 'test-secret')).toBe(false);
    expect(secretsEqual('test', 'test-secret')).toBe(false);
    expect(secretsEqual('', 'test-secret')).toBe(false);
  });

  it('rejects a missing secret', () => {
    expect(secretsEqual(undefined, 'test-secret')).toBe(false);
  });
});
