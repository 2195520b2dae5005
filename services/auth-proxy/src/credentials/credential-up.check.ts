import { Injectable } from '@nestjs/common';
import { type UpIndicator, type UpIndicatorResult, UptimeCheck } from '@token-proxy/up';
import { remainingLifetimeMs } from './credential';
import { TokenCache } from './token-cache';

@UptimeCheck('credential')
@Injectable()
export class CredentialUpCheck implements UpIndicator {
  public constructor(private readonly tokenCache: TokenCache) {}

  public checkUp(): UpIndicatorResult {
    const credential = this.tokenCache.peek();
    if (!credential) {
      return { status: 'down', message: 'No credential has been acquired' };
    }

    const details = {
      expiresAt: credential.expiresAt.toISOString(),
      remainingSeconds: Math.floor(remainingLifetimeMs(credential) / 1000),
      refreshInFlight: this.tokenCache.hasRefreshInFlight(),
    };

    if (this.tokenCache.isStale()) {
      return { status: 'down', message: 'Credential is due for refresh', details };
    }

    return { status: 'up', details };
  }
}
