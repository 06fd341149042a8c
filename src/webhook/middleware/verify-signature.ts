import { createHmac, timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../utils/logger.js';
import { WebhookVerificationError } from '../../utils/errors.js';

const SIGNATURE_HEADER = 'x-hub-signature-256';
const SIGNATURE_PREFIX = 'sha256=';

export function computeSignature(payload: string | Buffer, appSecret: string): string {
  return createHmac('sha256', appSecret).update(payload).digest('hex');
}

/**
 * Check an X-Hub-Signature-256 header ("sha256=<hex>") against the raw body.
 */
export function isValidSignature(payload: string | Buffer, header: string | undefined, appSecret: string): boolean {
  if (!header || !header.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const received = Buffer.from(header.slice(SIGNATURE_PREFIX.length), 'utf-8');
  const expected = Buffer.from(computeSignature(payload, appSecret), 'utf-8');

  if (received.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(received, expected);
}

/**
 * Reject webhook deliveries that are not signed with the app secret.
 * Expects the body as the raw string (express.text).
 */
export function verifyWhatsAppSignature(appSecret: string | undefined): RequestHandler {
  if (!appSecret) {
    logger.warn('APP_SECRET not configured, webhook signatures will not be checked');
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!appSecret) {
      next();
      return;
    }

    const payload = typeof req.body === 'string' ? req.body : '';
    const header = req.get(SIGNATURE_HEADER);

    if (!isValidSignature(payload, header, appSecret)) {
      const error = new WebhookVerificationError(header ? 'Invalid signature' : 'Missing signature header');
      logger.warn({ hasHeader: !!header }, 'Signature verification failed');
      res.status(error.statusCode).json({ status: 'error', message: error.message });
      return;
    }

    next();
  };
}
