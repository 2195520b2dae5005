export { UP_MODULE_OPTIONS, UPTIME_CHECK_METADATA_KEY, UptimeCheck } from './up.decorator';
export type {
  UpIndicator,
  UpIndicatorResult,
  UpModuleOptions,
  UpStatus,
  UptimeCheckResult,
  UptimeSummary,
} from './up.interfaces';
export { UpModule } from './up.module';
export { UpRegistryService } from './up.registry';
