/**
 * WhatsApp Cloud API webhook payload and outbound message types
 */

import { z } from 'zod';

const contactSchema = z.object({
  wa_id: z.string(),
  profile: z.object({ name: z.string().optional() }).optional(),
});

const messageSchema = z.object({
  from: z.string(),
  id: z.string().optional(),
  timestamp: z.string().optional(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
});

const changeValueSchema = z.object({
  messaging_product: z.string().optional(),
  metadata: z
    .object({
      display_phone_number: z.string().optional(),
      phone_number_id: z.string(),
    })
    .optional(),
  contacts: z.array(contactSchema).optional(),
  messages: z.array(messageSchema).optional(),
});

export const webhookPayloadSchema = z.object({
  object: z.string(),
  entry: z.array(
    z.object({
      id: z.string().optional(),
      changes: z.array(
        z.object({
          field: z.string().optional(),
          value: changeValueSchema,
        })
      ),
    })
  ),
});

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;

export type InboundEvent =
  | { kind: 'text'; userId: string; displayName?: string; text: string }
  | { kind: 'unsupported'; userId: string; displayName?: string; messageType: string };

export interface OutboundTextMessage {
  messaging_product: 'whatsapp';
  recipient_type: 'individual';
  to: string;
  type: 'text';
  text: {
    preview_url: boolean;
    body: string;
  };
}
