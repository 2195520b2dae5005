import { Logger } from '@nestjs/common';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { credentialFor, FakeCredentialIssuer, HOUR_MS } from '../../test/fakes/fake-credential-issuer';
import { DEFAULT_SCOPE } from '../config';
import {
  IssuerRejectedError,
  IssuerUnavailableError,
  StartupAcquisitionFailedError,
} from './credential.errors';
import { TokenCache } from './token-cache';

const T0 = new Date('2025-01-01T00:00:00.000Z').getTime();
const SKEW_MS = 5 * 60 * 1000;

describe('TokenCache', () => {
  let issuer: FakeCredentialIssuer;
  let cache: TokenCache;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    issuer = new FakeCredentialIssuer();
    cache = new TokenCache(issuer, { scope: DEFAULT_SCOPE, refreshSkewMs: SKEW_MS });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('get', () => {
    it('acquires a credential on first use for the configured scope', async () => {
      issuer.willIssue('test-token-0001');

      const credential = await cache.get();

      expect(credential.token).toBe('test-token-0001');
      expect(credential.expiresAt.getTime()).toBe(T0 + HOUR_MS);
      expect(issuer.scopes).toEqual([DEFAULT_SCOPE]);
    });

    it('serves a fresh credential without calling the issuer again', async () => {
      issuer.willIssue('test-token-0001');
      const first = await cache.get();

      vi.setSystemTime(T0 + 30 * 60 * 1000);
      const second = await cache.get();

      expect(second).toBe(first);
      expect(issuer.calls).toBe(1);
    });

    it('keeps the credential until it is within the refresh skew of its expiry', async () => {
      issuer.willIssue('test-token-0001').willIssue('test-token-0002');
      await cache.get();

      vi.setSystemTime(T0 + 3299 * 1000);
      expect((await cache.get()).token).toBe('test-token-0001');
      expect(issuer.calls).toBe(1);

      vi.setSystemTime(T0 + 3300 * 1000);
      expect((await cache.get()).token).toBe('test-token-0002');
      expect(issuer.calls).toBe(2);
    });

    it('honours a custom refresh skew', async () => {
      cache = new TokenCache(issuer, { scope: DEFAULT_SCOPE, refreshSkewMs: 0 });
      issuer.willIssue('test-token-0001');
      await cache.get();

      vi.setSystemTime(T0 + HOUR_MS - 1);
      await cache.get();

      expect(issuer.calls).toBe(1);
    });

    it('shares one issuer call among concurrent callers', async () => {
      const pending = issuer.willWait();

      const waiters = Array.from({ length: 50 }, () => cache.get());

      expect(issuer.calls).toBe(1);
      expect(cache.hasRefreshInFlight()).toBe(true);

      const issued = credentialFor('test-token-0001');
      pending.resolve(issued);
      const results = await Promise.all(waiters);

      expect(results.every((credential) => credential === issued)).toBe(true);
      expect(issuer.calls).toBe(1);
      expect(cache.hasRefreshInFlight()).toBe(false);
    });

    it('shares one issuer call when the credential goes stale under load', async () => {
      issuer.willIssue('test-token-0001');
      await cache.get();
      vi.setSystemTime(T0 + 3400 * 1000);
      const pending = issuer.willWait();

      const waiters = Array.from({ length: 10 }, () => cache.get());
      pending.resolve(credentialFor('test-token-0002'));
      const tokens = (await Promise.all(waiters)).map((credential) => credential.token);

      expect(new Set(tokens)).toEqual(new Set(['test-token-0002']));
      expect(issuer.calls).toBe(2);
    });

    it('fails closed and keeps the previous credential when the issuer fails', async () => {
      issuer.willIssue('test-token-0001');
      const previous = await cache.get();
      vi.setSystemTime(T0 + 3300 * 1000);
      const failure = new IssuerUnavailableError('Token endpoint unreachable: fetch failed');
      issuer.willFail(failure);

      await expect(cache.get()).rejects.toBe(failure);

      expect(cache.peek()).toBe(previous);
      expect(cache.isStale()).toBe(true);
      expect(cache.hasRefreshInFlight()).toBe(false);
    });

    it('hands the same failure to every waiting caller and retries on the next call', async () => {
      const pending = issuer.willWait();
      const failure = new IssuerRejectedError('Token endpoint returned invalid_client: denied');

      const waiters = Array.from({ length: 5 }, () => cache.get());
      pending.reject(failure);
      const outcomes = await Promise.allSettled(waiters);

      expect(outcomes.every((o) => o.status === 'rejected' && o.reason === failure)).toBe(true);
      expect(cache.peek()).toBeUndefined();

      issuer.willIssue('test-token-0001');
      expect((await cache.get()).token).toBe('test-token-0001');
      expect(issuer.calls).toBe(2);
    });
  });

  describe('refreshIfStale', () => {
    it('does nothing while the credential is fresh', async () => {
      issuer.willIssue('test-token-0001');
      await cache.get();

      await expect(cache.refreshIfStale()).resolves.toBe(false);
      expect(issuer.calls).toBe(1);
    });

    it('refreshes a stale credential', async () => {
      issuer.willIssue('test-token-0001').willIssue('test-token-0002');
      await cache.get();
      vi.setSystemTime(T0 + 3500 * 1000);

      await expect(cache.refreshIfStale()).resolves.toBe(true);
      expect(cache.peek()?.token).toBe('test-token-0002');
    });

    it('joins a refresh that a request already started', async () => {
      const pending = issuer.willWait();
      const request = cache.get();

      const proactive = cache.refreshIfStale();
      pending.resolve(credentialFor('test-token-0001'));

      await expect(Promise.all([request, proactive])).resolves.toEqual([
        expect.objectContaining({ token: 'test-token-0001' }),
        true,
      ]);
      expect(issuer.calls).toBe(1);
    });
  });

  describe('initialize', () => {
    it('acquires the first credential eagerly', async () => {
      issuer.willIssue('test-token-0001');

      await cache.initialize();

      expect(cache.peek()?.token).toBe('test-token-0001');
    });

    it('wraps a failed first acquisition', async () => {
      const failure = new IssuerRejectedError('Token endpoint returned invalid_client: denied');
      issuer.willFail(failure);

      const error = await cache.initialize().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StartupAcquisitionFailedError);
      expect(error).toHaveProperty('cause', failure);
    });
  });

  it('logs only a smeared token tail on refresh', async () => {
    const log = vi.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    issuer.willIssue('test-token-0001');

    await cache.get();

    expect(log).toHaveBeenCalledWith(
      expect.objectContaining({
        msg: 'Token refreshed',
        token: '****-*****-0001',
        expiresAt: '2025-01-01T01:00:00.000Z',
        lifetimeSeconds: 3600,
      }),
    );
    expect(JSON.stringify(log.mock.calls)).not.toContain('test-token-0001');
  });

  it('warns when a newly issued credential is already due for refresh', async () => {
    const warn = vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    issuer.willIssue('test-token-0001', 4 * 60 * 1000);

    await cache.get();

    expect(warn).toHaveBeenCalledWith({
      msg: 'Issued token expires within the refresh skew, every request will refresh it',
      expiresAt: '2025-01-01T00:04:00.000Z',
      refreshSkewMs: SKEW_MS,
    });
  });

  it('does not warn about a credential that outlives the refresh skew', async () => {
    const warn = vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    issuer.willIssue('test-token-0001');

    await cache.get();

    expect(warn).not.toHaveBeenCalled();
  });
});
