import { SetMetadata } from '@nestjs/common';

export const UPTIME_CHECK_METADATA_KEY = 'up:check';
export const UP_MODULE_OPTIONS = Symbol('UP_MODULE_OPTIONS');

export interface UptimeCheckMetadata {
  name?: string;
}

export function UptimeCheck(name?: string) {
  return SetMetadata<string, UptimeCheckMetadata>(UPTIME_CHECK_METADATA_KEY, { name });
}
