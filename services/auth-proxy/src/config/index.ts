import type { AppConfigNamespaced } from './app.config';
import { appConfig } from './app.config';
import type { AzureConfigNamespaced } from './azure.config';
import { azureConfig } from './azure.config';
import type { TokenConfigNamespaced } from './token.config';
import { tokenConfig } from './token.config';
import type { UpstreamConfigNamespaced } from './upstream.config';
import { upstreamConfig } from './upstream.config';

export * from './app.config';
export * from './azure.config';
export * from './token.config';
export * from './upstream.config';

export const configs = [appConfig, azureConfig, tokenConfig, upstreamConfig];

export type Config = AppConfigNamespaced &
  AzureConfigNamespaced &
  TokenConfigNamespaced &
  UpstreamConfigNamespaced;
