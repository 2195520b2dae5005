import { Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { sanitizeError } from '@token-proxy/utils';
import { Config } from '../config';
import { TokenCache } from '../credentials';

export const TOKEN_REFRESHER_INTERVAL = 'token-refresher';

/**
 * Refreshes the credential ahead of expiry so that requests rarely wait on the issuer. The first
 * check runs one full interval after startup; failures are logged and retried on the next tick.
 */
@Injectable()
export class TokenRefresherService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(TokenRefresherService.name);
  private isShuttingDown = false;
  private isRunning = false;

  public constructor(
    private readonly tokenCache: TokenCache,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService<Config, true>,
  ) {}

  public onApplicationBootstrap(): void {
    const { proactiveCheckIntervalMs } = this.configService.get('token', { infer: true });

    const interval = setInterval(() => {
      void this.runCheck();
    }, proactiveCheckIntervalMs);
    interval.unref();

    this.schedulerRegistry.addInterval(TOKEN_REFRESHER_INTERVAL, interval);
    this.logger.log({
      msg: 'Proactive token refresh scheduled',
      intervalMs: proactiveCheckIntervalMs,
    });
  }

  public onModuleDestroy(): void {
    this.logger.log('TokenRefresherService is shutting down...');
    this.isShuttingDown = true;

    try {
      if (this.schedulerRegistry.doesExist('interval', TOKEN_REFRESHER_INTERVAL)) {
        this.schedulerRegistry.deleteInterval(TOKEN_REFRESHER_INTERVAL);
      }
    } catch (error) {
      this.logger.error({
        msg: 'Error stopping the token refresher',
        error: sanitizeError(error),
      });
    }
  }

  public async runCheck(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.debug('Skipping token check due to shutdown');
      return;
    }
    if (this.isRunning) {
      this.logger.debug('Skipping token check, the previous one is still running');
      return;
    }

    this.isRunning = true;
    try {
      const refreshed = await this.tokenCache.refreshIfStale();
      if (!refreshed) {
        this.logger.debug('Token still fresh, nothing to refresh');
      }
    } catch (error) {
      this.logger.error({
        msg: 'Proactive token refresh failed, retrying on the next tick',
        error: sanitizeError(error),
      });
    } finally {
      this.isRunning = false;
    }
  }
}
