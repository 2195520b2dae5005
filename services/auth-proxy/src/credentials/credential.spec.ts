import { describe, expect, it } from 'vitest';
import { createCredential, isCredentialStale, remainingLifetimeMs } from './credential';

const issuedAt = new Date('2025-01-01T00:00:00.000Z');
const expiresAt = new Date('2025-01-01T01:00:00.000Z');
const SKEW_MS = 5 * 60 * 1000;

describe('credential', () => {
  it('creates an immutable credential detached from the input dates', () => {
    const input = { token: 'test-token', issuedAt: new Date(issuedAt), expiresAt: new Date(expiresAt) };

    const credential = createCredential(input);
    input.expiresAt.setTime(0);

    expect(Object.isFrozen(credential)).toBe(true);
    expect(credential.expiresAt.toISOString()).toBe('2025-01-01T01:00:00.000Z');
  });

  it('treats a missing credential as stale', () => {
    expect(isCredentialStale(undefined, SKEW_MS)).toBe(true);
  });

  it('turns stale exactly at expiry minus the skew', () => {
    const credential = createCredential({ token: 'test-token', issuedAt, expiresAt });
    const staleFrom = expiresAt.getTime() - SKEW_MS;

    expect(isCredentialStale(credential, SKEW_MS, staleFrom - 1)).toBe(false);
    expect(isCredentialStale(credential, SKEW_MS, staleFrom)).toBe(true);
  });

  it('reports the remaining lifetime, negative once expired', () => {
    const credential = createCredential({ token: 'test-token', issuedAt, expiresAt });

    expect(remainingLifetimeMs(credential, issuedAt.getTime())).toBe(60 * 60 * 1000);
    expect(remainingLifetimeMs(credential, expiresAt.getTime() + 1000)).toBe(-1000);
  });
});
