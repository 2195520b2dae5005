import {
  type ConfigType,
  type NamespacedConfigType,
  registerConfig,
} from '@proventuslabs/nestjs-zod';
import { baseUrl, positiveInt } from '@token-proxy/utils';
import { z } from 'zod';

export const UpstreamConfigSchema = z.object({
  apiBaseUrl: baseUrl().describe('Every request is forwarded to this URL plus its own path'),
  timeoutMs: positiveInt()
    .prefault('120000')
    .describe('Headers and body timeout for upstream responses'),
});

export const upstreamConfig = registerConfig('upstream', UpstreamConfigSchema, {
  whitelistKeys: new Set(['API_BASE_URL']),
});

export type UpstreamConfigNamespaced = NamespacedConfigType<typeof upstreamConfig>;
export type UpstreamConfig = ConfigType<typeof upstreamConfig>;
