import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { InstanceWrapper } from '@nestjs/core/injector/instance-wrapper';
import { UP_MODULE_OPTIONS, UPTIME_CHECK_METADATA_KEY, UptimeCheckMetadata } from './up.decorator';
import type {
  UpIndicator,
  UpIndicatorResult,
  UpModuleOptions,
  UptimeCheckResult,
  UptimeSummary,
} from './up.interfaces';

interface RegisteredCheck {
  name: string;
  indicator: UpIndicator;
}

function isUpIndicator(instance: unknown): instance is UpIndicator {
  return (
    typeof instance === 'object' &&
    instance !== null &&
    'checkUp' in instance &&
    typeof instance.checkUp === 'function'
  );
}

@Injectable()
export class UpRegistryService implements OnApplicationBootstrap {
  private readonly logger = new Logger(UpRegistryService.name);
  private checks: RegisteredCheck[] = [];

  public constructor(
    private readonly discovery: DiscoveryService,
    private readonly reflector: Reflector,
    @Inject(UP_MODULE_OPTIONS) private readonly options: UpModuleOptions,
  ) {}

  public onApplicationBootstrap(): void {
    this.checks = this.discovery
      .getProviders()
      .flatMap((wrapper) => this.toRegisteredCheck(wrapper) ?? []);

    this.logger.log({
      msg: 'Uptime checks discovered',
      checks: this.registeredChecks,
    });
  }

  public get registeredChecks(): string[] {
    return this.checks.map(({ name }) => name);
  }

  public async runAllChecks(): Promise<UptimeSummary> {
    const results = await Promise.all(this.checks.map((check) => this.runSingleCheck(check)));

    return {
      status: results.every((result) => result.status === 'up') ? 'up' : 'down',
      checks: results,
      timestamp: new Date().toISOString(),
    };
  }

  private toRegisteredCheck(wrapper: InstanceWrapper): RegisteredCheck | undefined {
    const { instance, metatype } = wrapper;
    if (!metatype || !instance) return undefined;

    const metadata = this.reflector.get<UptimeCheckMetadata | undefined>(
      UPTIME_CHECK_METADATA_KEY,
      metatype,
    );
    if (!metadata) return undefined;

    const name = metadata.name ?? metatype.name;
    if (!isUpIndicator(instance)) {
      this.logger.warn({ msg: 'Provider has @UptimeCheck but no checkUp() method', name });
      return undefined;
    }

    return { name, indicator: instance };
  }

  private async runSingleCheck(check: RegisteredCheck): Promise<UptimeCheckResult> {
    const start = performance.now();
    const durationMs = () => Math.round((performance.now() - start) * 100) / 100;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<UpIndicatorResult>((resolve) => {
      timer = setTimeout(
        () => resolve({ status: 'down', message: `Timed out after ${this.options.checkTimeoutMs}ms` }),
        this.options.checkTimeoutMs,
      );
    });

    try {
      const result = await Promise.race([Promise.resolve(check.indicator.checkUp()), timeout]);
      return { name: check.name, ...result, durationMs: durationMs() };
    } catch (error) {
      this.logger.warn({ msg: 'Uptime check threw', name: check.name, error: String(error) });
      return {
        name: check.name,
        status: 'down',
        message: error instanceof Error ? error.message : String(error),
        durationMs: durationMs(),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
