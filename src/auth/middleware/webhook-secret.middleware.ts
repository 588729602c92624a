import { HttpException } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { verifyWebhookSecret, WEBHOOK_SECRET_HEADER } from '../utils/secret.util';

/**
 * Express-level secret check for the intake routes. Registered with `app.use`
 * before `app.init()`, so it runs ahead of the body parsers and a request
 * without the secret is refused before its body is read.
 */
export const webhookSecretMiddleware =
  (expected: string | undefined) =>
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      verifyWebhookSecret(req.headers[WEBHOOK_SECRET_HEADER], expected);
    } catch (error) {
      if (error instanceof HttpException) {
        res.status(error.getStatus()).json(error.getResponse());
        return;
      }
      next(error);
      return;
    }
    next();
  };
