import { Router, type Request, type Response } from 'express';
import { logger } from '../../utils/logger.js';
import { extractInboundEvent, isValidPhoneNumber } from '../../whatsapp/payload.js';
import type { InboundHandler } from '../../chat/types.js';
import type { InboundEvent } from '../../whatsapp/types.js';

export interface WhatsAppWebhookOptions {
  verifyToken: string;
  handler: InboundHandler;
}

function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * GET answers Meta's subscription challenge. POST receives messages; it
 * always acknowledges with 200 once the signature passed, so Meta does not
 * redeliver, and processes the message after responding.
 */
export function createWhatsAppWebhookRouter(options: WhatsAppWebhookOptions): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    const mode = queryParam(req, 'hub.mode');
    const token = queryParam(req, 'hub.verify_token');
    const challenge = queryParam(req, 'hub.challenge') ?? '';

    if (!mode || !token) {
      res.status(400).send('Bad Request');
      return;
    }

    if (mode === 'subscribe' && token === options.verifyToken) {
      logger.info('Webhook verified');
      res.status(200).type('text/plain').send(challenge);
      return;
    }

    logger.warn({ mode }, 'Webhook verification failed');
    res.status(403).send('Forbidden');
  });

  router.post('/', (req: Request, res: Response) => {
    let body: unknown;

    try {
      body = typeof req.body === 'string' ? JSON.parse(req.body) : req.body;
    } catch (error) {
      logger.error({ error }, 'Failed to parse webhook payload');
      res.status(200).json({ status: 'ignored', reason: 'invalid JSON payload' });
      return;
    }

    const event = extractInboundEvent(body);
    if (!event) {
      logger.debug('Ignoring webhook without inbound message');
      res.status(200).json({ status: 'ignored', reason: 'no message' });
      return;
    }

    if (!isValidPhoneNumber(event.userId)) {
      logger.warn({ userId: event.userId }, 'Ignoring message from invalid phone number');
      res.status(200).json({ status: 'ignored', reason: 'invalid sender' });
      return;
    }

    // Acknowledge webhook immediately
    res.status(200).json({ status: 'received' });

    processEvent(options.handler, event).catch((error) => {
      logger.error({ error, userId: event.userId }, 'Failed to process WhatsApp message');
    });
  });

  return router;
}

async function processEvent(handler: InboundHandler, event: InboundEvent): Promise<void> {
  if (event.kind === 'unsupported') {
    await handler.handleUnsupported(event.userId, event.messageType);
    return;
  }

  logger.info({ userId: event.userId, length: event.text.length }, 'Received WhatsApp message');
  await handler.handle({ userId: event.userId, displayName: event.displayName, text: event.text });
}
