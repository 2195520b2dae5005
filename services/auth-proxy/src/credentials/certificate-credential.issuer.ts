import {
  ConfidentialClientApplication,
  type Configuration,
  LogLevel,
} from '@azure/msal-node';
import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { elapsedMilliseconds, sanitizeError, smear } from '@token-proxy/utils';
import { Agent } from 'undici';
import { type AzureConfig, azureConfig } from '../config';
import { classifyIssuerError } from './classify-issuer-error';
import { loadClientCertificate } from './client-certificate';
import { type Credential, createCredential } from './credential';
import { IssuerRejectedError, IssuerUnavailableError } from './credential.errors';
import { CredentialIssuer } from './credential-issuer';
import { UndiciMsalNetworkClient } from './undici-msal-network-client';

@Injectable()
export class CertificateCredentialIssuer extends CredentialIssuer implements OnModuleDestroy {
  private readonly logger = new Logger(CertificateCredentialIssuer.name);
  private readonly dispatcher = new Agent({
    connectTimeout: 10_000,
    headersTimeout: 30_000,
    bodyTimeout: 30_000,
  });
  private msalClient: ConfidentialClientApplication | undefined;

  public constructor(@Inject(azureConfig.KEY) private readonly config: AzureConfig) {
    super();
  }

  public async issue(scope: string): Promise<Credential> {
    const startedAt = Date.now();
    this.logger.log({ msg: 'Requesting token from Entra ID', scope });

    try {
      const response = await this.getClient().acquireTokenByClientCredential({
        scopes: [scope],
        skipCache: true,
      });

      if (!response?.accessToken || !response.expiresOn) {
        throw new IssuerRejectedError('Token response is missing the access token or its expiry');
      }

      const issuedAt = new Date();
      if (response.expiresOn.getTime() <= issuedAt.getTime()) {
        throw new IssuerRejectedError('Token response is already expired');
      }

      this.logger.debug({
        msg: 'Token issued',
        token: smear(response.accessToken),
        durationMs: elapsedMilliseconds(startedAt),
      });

      return createCredential({
        token: response.accessToken,
        issuedAt,
        expiresAt: response.expiresOn,
      });
    } catch (error) {
      const classified = classifyIssuerError(error);
      const entry = {
        msg: 'Failed to acquire token using client certificate',
        scope,
        durationMs: elapsedMilliseconds(startedAt),
        error: sanitizeError(classified),
      };
      if (classified instanceof IssuerUnavailableError) {
        this.logger.warn(entry);
      } else {
        this.logger.error(entry);
      }
      throw classified;
    }
  }

  public async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  // Built on first use so that certificate problems surface as issuer errors.
  private getClient(): ConfidentialClientApplication {
    if (this.msalClient) return this.msalClient;

    const { clientId, tenantId, authorityHost, certificatePath, certificatePassword } = this.config;
    const certificate = loadClientCertificate(certificatePath, certificatePassword);

    const msalConfig: Configuration = {
      auth: {
        clientId,
        authority: `${authorityHost}/${tenantId}`,
        clientCertificate: {
          privateKey: certificate.privateKey,
          thumbprintSha256: certificate.thumbprintSha256,
          ...(this.config.sendCertificateChain ? { x5c: certificate.x5c } : {}),
        },
      },
      system: {
        networkClient: new UndiciMsalNetworkClient(this.dispatcher),
        loggerOptions: {
          piiLoggingEnabled: false,
          logLevel: LogLevel.Warning,
          loggerCallback: (level, message) => this.forwardMsalLog(level, message),
        },
      },
    };

    this.logger.log({
      msg: 'Initialized MSAL client',
      clientId,
      tenantId,
      thumbprintSha256: certificate.thumbprintSha256,
      sendCertificateChain: this.config.sendCertificateChain,
    });

    this.msalClient = new ConfidentialClientApplication(msalConfig);
    return this.msalClient;
  }

  private forwardMsalLog(level: LogLevel, message: string): void {
    if (level === LogLevel.Error) {
      this.logger.error({ msg: 'MSAL', detail: message });
    } else if (level === LogLevel.Warning) {
      this.logger.warn({ msg: 'MSAL', detail: message });
    } else {
      this.logger.debug({ msg: 'MSAL', detail: message });
    }
  }
}
