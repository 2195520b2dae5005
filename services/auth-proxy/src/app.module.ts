import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { defaultLoggerOptions, defaultPinoHttpOptions } from '@token-proxy/logger';
import { LoggerModule } from 'nestjs-pino';
import { type AppConfig, appConfig, configs } from './config';
import { CredentialsModule } from './credentials';
import { HealthModule } from './health/health.module';
import { ProxyModule } from './proxy/proxy.module';
import { RefresherModule } from './refresher/refresher.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: configs,
    }),
    LoggerModule.forRootAsync({
      useFactory(appConfigValue: AppConfig) {
        return {
          ...defaultLoggerOptions,
          pinoHttp: {
            ...defaultPinoHttpOptions,
            level: appConfigValue.logLevel,
          },
        };
      },
      inject: [appConfig.KEY],
    }),
    CredentialsModule,
    RefresherModule,
    // Registered before the proxy so that its catch-all route does not shadow them.
    HealthModule,
    ProxyModule,
  ],
})
export class AppModule {}
