import { Module } from '@nestjs/common';
import { WebhookSecretGuard } from './guards/webhook-secret.guard';

@Module({
  providers: [WebhookSecretGuard],
  exports: [WebhookSecretGuard],
})
export class AuthModule {}
