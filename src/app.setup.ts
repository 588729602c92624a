import { INestApplication, ValidationPipe } from '@nestjs/common';
import { webhookSecretMiddleware } from './auth/middleware/webhook-secret.middleware';
import { INTAKE_CONFIG } from './config/intake-config.provider';
import { IntakeConfig } from './config/interfaces/intake-config.interface';

export const INTAKE_ROUTES = ['/webhook', '/sms'];

/** Must run before `app.init()` or `app.listen()`. */
export function configureApp(app: INestApplication): void {
  const config = app.get<IntakeConfig>(INTAKE_CONFIG);
  app.use(INTAKE_ROUTES, webhookSecretMiddleware(config.sharedSecret));

  // Unknown fields are stripped, not rejected.
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
}
