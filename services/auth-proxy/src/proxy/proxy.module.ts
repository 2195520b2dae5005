import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Agent } from 'undici';
import { Config } from '../config';
import { CredentialsModule } from '../credentials';
import { UPSTREAM_DISPATCHER } from './proxy.constants';
import { ProxyController } from './proxy.controller';
import { ProxyService } from './proxy.service';

@Module({
  imports: [CredentialsModule],
  controllers: [ProxyController],
  providers: [
    {
      provide: UPSTREAM_DISPATCHER,
      useFactory: (configService: ConfigService<Config, true>) => {
        const { timeoutMs } = configService.get('upstream', { infer: true });
        return new Agent({
          connectTimeout: 15_000,
          headersTimeout: timeoutMs,
          bodyTimeout: timeoutMs,
        });
      },
      inject: [ConfigService],
    },
    ProxyService,
  ],
})
export class ProxyModule {}
