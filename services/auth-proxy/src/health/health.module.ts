import { Module } from '@nestjs/common';
import { UpModule } from '@token-proxy/up';
import { HealthController } from './health.controller';

@Module({
  imports: [UpModule.forRoot()],
  controllers: [HealthController],
})
export class HealthModule {}
