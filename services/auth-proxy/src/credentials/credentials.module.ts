import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Config } from '../config';
import { CertificateCredentialIssuer } from './certificate-credential.issuer';
import { CredentialUpCheck } from './credential-up.check';
import { CredentialIssuer } from './credential-issuer';
import { TokenCache } from './token-cache';

@Module({
  providers: [
    { provide: CredentialIssuer, useClass: CertificateCredentialIssuer },
    {
      provide: TokenCache,
      // The first credential is acquired before the application starts listening.
      useFactory: async (issuer: CredentialIssuer, configService: ConfigService<Config, true>) => {
        const { scope } = configService.get('azure', { infer: true });
        const { refreshSkewMs } = configService.get('token', { infer: true });

        const tokenCache = new TokenCache(issuer, { scope, refreshSkewMs });
        await tokenCache.initialize();
        return tokenCache;
      },
      inject: [CredentialIssuer, ConfigService],
    },
    CredentialUpCheck,
  ],
  exports: [TokenCache],
})
export class CredentialsModule {}
