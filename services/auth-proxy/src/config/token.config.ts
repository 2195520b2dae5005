import {
  type ConfigType,
  type NamespacedConfigType,
  registerConfig,
} from '@proventuslabs/nestjs-zod';
import { positiveInt } from '@token-proxy/utils';
import { z } from 'zod';

const MINUTE_MS = 60_000;
// Timers take at most 2^31 - 1 ms; larger delays fire after 1 ms.
const MAX_INTERVAL_MINUTES = Math.floor((2 ** 31 - 1) / MINUTE_MS);
// Entra ID access tokens live 60 to 90 minutes.
const MAX_REFRESH_SKEW_MINUTES = 30;

export const TokenConfigSchema = z
  .object({
    refreshSkewMinutes: z.coerce
      .number<string | undefined>()
      .nonnegative()
      .max(MAX_REFRESH_SKEW_MINUTES)
      .prefault('5')
      .describe('A token is refreshed once it expires within this many minutes'),
    proactiveCheckIntervalMinutes: z.coerce
      .number<string | undefined>()
      .positive()
      .max(MAX_INTERVAL_MINUTES)
      .prefault('30')
      .describe('How often the background refresher checks the token'),
    acquisitionTimeoutMs: positiveInt()
      .prefault('30000')
      .describe('Upper bound for a request waiting on token acquisition'),
  })
  .transform((c) => ({
    ...c,
    refreshSkewMs: c.refreshSkewMinutes * MINUTE_MS,
    proactiveCheckIntervalMs: c.proactiveCheckIntervalMinutes * MINUTE_MS,
  }));

export const tokenConfig = registerConfig('token', TokenConfigSchema);

export type TokenConfigNamespaced = NamespacedConfigType<typeof tokenConfig>;
export type TokenConfig = ConfigType<typeof tokenConfig>;
