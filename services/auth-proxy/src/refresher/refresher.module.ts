import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CredentialsModule } from '../credentials';
import { TokenRefresherService } from './token-refresher.service';

@Module({
  imports: [ScheduleModule.forRoot(), CredentialsModule],
  providers: [TokenRefresherService],
})
export class RefresherModule {}
