import { logger } from '../utils/logger.js';
import { webhookPayloadSchema, type InboundEvent } from './types.js';

const WHATSAPP_OBJECT = 'whatsapp_business_account';

/**
 * Pull the first inbound message out of a webhook payload.
 * Status updates and other notifications return null.
 */
export function extractInboundEvent(body: unknown): InboundEvent | null {
  const result = webhookPayloadSchema.safeParse(body);
  if (!result.success) {
    logger.debug({ issues: result.error.issues.length }, 'Webhook payload does not match message schema');
    return null;
  }

  const payload = result.data;
  if (payload.object !== WHATSAPP_OBJECT) {
    return null;
  }

  const value = payload.entry[0]?.changes[0]?.value;
  const message = value?.messages?.[0];
  if (!value || !message) {
    return null;
  }

  const contact = value.contacts?.[0];
  const userId = contact?.wa_id ?? message.from;
  const displayName = contact?.profile?.name || undefined;

  if (message.type !== 'text' || !message.text) {
    return { kind: 'unsupported', userId, displayName, messageType: message.type };
  }

  return { kind: 'text', userId, displayName, text: message.text.body };
}

/**
 * International number without "+": 10 to 15 digits once separators are removed.
 */
export function isValidPhoneNumber(phoneNumber: string): boolean {
  const digits = phoneNumber.replace(/\D/g, '');
  return digits.length >= 10 && digits.length <= 15;
}
