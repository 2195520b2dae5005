import { Logger } from '@nestjs/common';
import { elapsedMilliseconds, smear } from '@token-proxy/utils';
import { type Credential, isCredentialStale, remainingLifetimeMs } from './credential';
import { StartupAcquisitionFailedError } from './credential.errors';
import { CredentialIssuer } from './credential-issuer';

export interface TokenCacheOptions {
  scope: string;
  refreshSkewMs: number;
}

/**
 * Holds the one credential the proxy hands out and refreshes it on demand.
 *
 * The stored credential and the in-flight refresh are kept apart: a fresh credential is returned
 * without yielding, and while a refresh runs every caller shares its promise, so the issuer is
 * never asked twice at once. A failed refresh leaves the previous credential in place.
 */
export class TokenCache {
  private readonly logger = new Logger(TokenCache.name);
  private credential: Credential | undefined;
  private inFlight: Promise<Credential> | undefined;

  public constructor(
    private readonly issuer: CredentialIssuer,
    private readonly options: TokenCacheOptions,
  ) {}

  public async get(): Promise<Credential> {
    const current = this.credential;
    if (current && !this.isStale()) {
      return current;
    }

    return this.refresh();
  }

  /** Resolves to `false` without any I/O while the credential is fresh. */
  public async refreshIfStale(): Promise<boolean> {
    if (!this.isStale()) {
      return false;
    }

    await this.refresh();
    return true;
  }

  public async initialize(): Promise<Credential> {
    try {
      return await this.get();
    } catch (error) {
      throw new StartupAcquisitionFailedError('Could not acquire the initial credential', {
        cause: error,
      });
    }
  }

  public peek(): Credential | undefined {
    return this.credential;
  }

  public isStale(now: number = Date.now()): boolean {
    return isCredentialStale(this.credential, this.options.refreshSkewMs, now);
  }

  public hasRefreshInFlight(): boolean {
    return this.inFlight !== undefined;
  }

  private refresh(): Promise<Credential> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.acquireAndStore().finally(() => {
      this.inFlight = undefined;
    });

    return this.inFlight;
  }

  private async acquireAndStore(): Promise<Credential> {
    // Covers a caller whose staleness check ran before another refresh completed.
    const current = this.credential;
    if (current && !this.isStale()) {
      return current;
    }

    const startedAt = Date.now();
    const credential = await this.issuer.issue(this.options.scope);
    this.credential = credential;

    this.logger.log({
      msg: 'Token refreshed',
      token: smear(credential.token),
      expiresAt: credential.expiresAt.toISOString(),
      lifetimeSeconds: Math.round(remainingLifetimeMs(credential) / 1000),
      durationMs: elapsedMilliseconds(startedAt),
    });

    if (this.isStale()) {
      this.logger.warn({
        msg: 'Issued token expires within the refresh skew, every request will refresh it',
        expiresAt: credential.expiresAt.toISOString(),
        refreshSkewMs: this.options.refreshSkewMs,
      });
    }

    return credential;
  }
}
