import { CanActivate, ExecutionContext, Inject, Injectable } from '@nestjs/common';
import type { Request } from 'express';
import { INTAKE_CONFIG } from '../../config/intake-config.provider';
import { IntakeConfig } from '../../config/interfaces/intake-config.interface';
import { verifyWebhookSecret, WEBHOOK_SECRET_HEADER } from '../utils/secret.util';

@Injectable()
export class WebhookSecretGuard implements CanActivate {
  constructor(@Inject(INTAKE_CONFIG) private readonly config: IntakeConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    verifyWebhookSecret(request.headers[WEBHOOK_SECRET_HEADER], this.config.sharedSecret);
    return true;
  }
}
