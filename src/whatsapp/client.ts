import { logger } from '../utils/logger.js';
import { DeliveryError } from '../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../utils/clock.js';
import { isRetryableStatus, type FetchLike } from '../utils/http.js';
import type { Notifier } from '../chat/types.js';
import type { OutboundTextMessage } from './types.js';

const GRAPH_API_BASE = 'https://graph.facebook.com';

export interface WhatsAppClientOptions {
  accessToken: string;
  phoneNumberId: string;
  apiVersion: string;
  maxAttempts: number;
  /** Delay before the first retry; doubles on every further attempt */
  retryDelayMs: number;
  timeoutMs: number;
  fetch?: FetchLike;
  sleep?: Sleep;
}

export function buildTextMessage(to: string, body: string): OutboundTextMessage {
  return {
    messaging_product: 'whatsapp',
    recipient_type: 'individual',
    to,
    type: 'text',
    text: { preview_url: false, body },
  };
}

export class WhatsAppClient implements Notifier {
  private readonly fetch: FetchLike;
  private readonly sleep: Sleep;
  readonly messagesUrl: string;

  constructor(private readonly options: WhatsAppClientOptions) {
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.messagesUrl = `${GRAPH_API_BASE}/${options.apiVersion}/${options.phoneNumberId}/messages`;
  }

  /**
   * Send a text message, retrying transient failures with exponential
   * backoff. Resolves false once all attempts failed; never rejects.
   */
  async send(to: string, text: string): Promise<boolean> {
    const body = JSON.stringify(buildTextMessage(to, text));
    let delay = this.options.retryDelayMs;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        await this.post(body);
        logger.info({ to, attempt }, 'Sent WhatsApp message');
        return true;
      } catch (error) {
        const retryable = !(error instanceof DeliveryError) || error.retryable;

        if (!retryable || attempt === this.options.maxAttempts) {
          logger.error({ error, to, attempt }, 'Failed to send WhatsApp message');
          return false;
        }

        logger.warn({ error, to, attempt, maxAttempts: this.options.maxAttempts }, 'Error sending message, retrying');
        await this.sleep(delay);
        delay *= 2;
      }
    }

    return false;
  }

  private async post(body: string): Promise<void> {
    const response = await this.fetch(this.messagesUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.accessToken}`,
      },
      body,
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new DeliveryError(
        `WhatsApp API responded ${response.status}: ${errorText}`,
        response.status,
        isRetryableStatus(response.status)
      );
    }
  }
}
