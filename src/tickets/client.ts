/**
 * Ticket Service - hands support tickets to the helpdesk webhook
 *
 * Without a configured webhook URL tickets are only logged.
 */

import { logger } from '../utils/logger.js';
import type { FetchLike } from '../utils/http.js';

export interface TicketRequest {
  userId: string;
  name?: string;
  subject: string;
  description: string;
}

export interface TicketService {
  /** Resolves false when the helpdesk rejected or never received the ticket */
  createTicket(ticket: TicketRequest): Promise<boolean>;
}

export interface TicketClientOptions {
  webhookUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class WebhookTicketClient implements TicketService {
  private readonly fetch: FetchLike;

  constructor(private readonly options: TicketClientOptions = {}) {
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async createTicket(ticket: TicketRequest): Promise<boolean> {
    const { webhookUrl } = this.options;

    if (!webhookUrl) {
      logger.info({ userId: ticket.userId, subject: ticket.subject }, 'Ticket webhook not configured, ticket logged only');
      return true;
    }

    try {
      const response = await this.fetch(webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          name: ticket.name ?? '',
          phone: ticket.userId,
          subject: ticket.subject,
          description: ticket.description,
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10000),
      });

      if (!response.ok) {
        const errorText = await response.text();
        logger.error({ userId: ticket.userId, status: response.status, errorText }, 'Ticket webhook rejected ticket');
        return false;
      }

      logger.info({ userId: ticket.userId, subject: ticket.subject }, 'Created support ticket');
      return true;
    } catch (error) {
      logger.error({ error, userId: ticket.userId }, 'Failed to create support ticket');
      return false;
    }
  }
}
