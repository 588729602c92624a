import { Module } from '@nestjs/common';

import { AppConfigModule } from './config/config.module';
import { AppLoggerModule } from './logger/logger.module';
import { HealthModule } from './health/health.module';
import { WebhooksModule } from './webhooks/webhooks.module';
import { SmsModule } from './sms/sms.module';

@Module({
  imports: [AppLoggerModule, AppConfigModule, HealthModule, WebhooksModule, SmsModule],
})
export class AppModule {}
