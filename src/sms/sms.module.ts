import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { WebhooksModule } from '../webhooks/webhooks.module';
import { SmsController } from './sms.controller';

@Module({
  imports: [AuthModule, WebhooksModule],
  controllers: [SmsController],
})
export class SmsModule {}
