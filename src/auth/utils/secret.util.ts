import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { timingSafeEqual } from 'crypto';

export const WEBHOOK_SECRET_HEADER = 'x-webhook-secret';

export const secretsMatch = (provided: string, expected: string): boolean => {
  const providedBuffer = Buffer.from(provided, 'utf8');
  const expectedBuffer = Buffer.from(expected, 'utf8');
  if (providedBuffer.length !== expectedBuffer.length) {
    return false;
  }
  return timingSafeEqual(providedBuffer, expectedBuffer);
};

/** Throws 401 when the header is missing and 403 when it does not match. */
export const verifyWebhookSecret = (
  header: string | string[] | undefined,
  expected: string | undefined,
): void => {
  if (!expected) {
    return;
  }

  const provided = Array.isArray(header) ? header[0] : header;
  if (!provided) {
    throw new UnauthorizedException('Missing webhook secret');
  }
  if (!secretsMatch(provided, expected)) {
    throw new ForbiddenException('Invalid webhook secret');
  }
};
