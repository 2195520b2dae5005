export type UpStatus = 'up' | 'down';

export interface UpIndicatorResult {
  status: UpStatus;
  message?: string;
  details?: Record<string, string | number | boolean | null>;
}

/** Implemented by providers marked with `@UptimeCheck()`. Must not block on remote I/O. */
export interface UpIndicator {
  checkUp(): UpIndicatorResult | Promise<UpIndicatorResult>;
}

export interface UptimeCheckResult extends UpIndicatorResult {
  name: string;
  durationMs: number;
}

export interface UptimeSummary {
  status: UpStatus;
  checks: UptimeCheckResult[];
  timestamp: string;
}

export interface UpModuleOptions {
  /** A check that does not settle within this budget is reported as down. */
  checkTimeoutMs: number;
}
