import {
  type ConfigType,
  type NamespacedConfigType,
  registerConfig,
} from '@proventuslabs/nestjs-zod';
import { baseUrl, redacted } from '@token-proxy/utils';
import { z } from 'zod';

export const DEFAULT_SCOPE = 'https://cognitiveservices.azure.com/.default';

export const AzureConfigSchema = z.object({
  clientId: z.string().nonempty().describe('Application (client) ID of the app registration'),
  tenantId: z.string().nonempty().describe('Directory (tenant) ID that issues the tokens'),
  certificatePath: z
    .string()
    .nonempty()
    .describe('PEM file holding the private key and the client certificate'),
  certificatePassword: redacted(z.string().nonempty())
    .optional()
    .describe('Passphrase of an encrypted private key'),
  sendCertificateChain: z
    .stringbool()
    .prefault('false')
    .describe('Send the x5c header so that subject name/issuer authentication can be used'),
  authorityHost: baseUrl()
    .prefault('https://login.microsoftonline.com')
    .describe('Entra ID authority host, e.g. for sovereign clouds'),
  scope: z.string().nonempty().prefault(DEFAULT_SCOPE).describe('Scope requested for the token'),
});

export const azureConfig = registerConfig('azure', AzureConfigSchema);

export type AzureConfigNamespaced = NamespacedConfigType<typeof azureConfig>;
export type AzureConfig = ConfigType<typeof azureConfig>;
