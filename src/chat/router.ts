/**
 * Message Router - decides the reply to each inbound message
 *
 * Messages of one user are handled strictly one after another; different
 * users are handled concurrently. Every reply goes through the store's
 * history, the notifier and a best-effort snapshot.
 */

import { logger } from '../utils/logger.js';
import { assistantReplyText } from '../assistant/client.js';
import type { AssistantPort } from '../assistant/types.js';
import type { SessionStore } from '../session/store.js';
import type { Session, SnapshotWriter } from '../session/types.js';
import type { TicketService } from '../tickets/client.js';
import { formatForWhatsApp } from './formatter.js';
import { detectSupportIntent, isGreeting, isRestartCommand } from './intent.js';
import { KeyedLanes } from './lanes.js';
import { messages } from './messages.js';
import type { InboundHandler, InboundMessage, Notifier } from './types.js';

const TICKET_SUBJECT_KEY = 'ticketSubject';

export interface MessageRouterDeps {
  store: SessionStore;
  assistant: AssistantPort;
  notifier: Notifier;
  tickets: TicketService;
  snapshots?: SnapshotWriter;
}

export class MessageRouter implements InboundHandler {
  private readonly lanes = new KeyedLanes();

  constructor(private readonly deps: MessageRouterDeps) {}

  /**
   * Handle one text message and deliver the reply. Resolves with the text
   * that was sent; never rejects.
   */
  handle(message: InboundMessage): Promise<string> {
    return this.lanes.run(message.userId, () => this.process(message));
  }

  async handleUnsupported(userId: string, messageType: string): Promise<void> {
    logger.info({ userId, messageType }, 'Received non-text message');
    await this.deliver(userId, messages.textOnly);
  }

  private async process(message: InboundMessage): Promise<string> {
    const { store } = this.deps;
    const { userId, text } = message;
    let reply: string;

    try {
      if (isRestartCommand(text)) {
        reply = await this.restart(userId);
        store.appendHistory(userId, 'user', text);
      } else {
        const session = store.getOrCreate(userId);
        store.appendHistory(userId, 'user', text);
        reply = formatForWhatsApp(await this.respond(session, message));
      }
      store.appendHistory(userId, 'assistant', reply);
    } catch (error) {
      logger.error({ error, userId }, 'Error processing WhatsApp message');
      reply = messages.unexpectedError;
      store.appendHistory(userId, 'assistant', reply);
    }

    await this.deliver(userId, reply);
    await this.saveSnapshot();
    return reply;
  }

  private async restart(userId: string): Promise<string> {
    this.deps.store.restart(userId);
    await this.deps.assistant.forget(userId);
    return messages.restarted;
  }

  private async respond(session: Session, message: InboundMessage): Promise<string> {
    const { store } = this.deps;
    const { userId, text, displayName } = message;

    if (session.state === 'INITIAL' && isGreeting(text)) {
      store.update(userId, { state: 'AWAITING_QUERY' });
      return messages.welcome(displayName);
    }

    if (session.state === 'TICKET_CREATION') {
      const subject = session.context[TICKET_SUBJECT_KEY];

      if (subject === undefined) {
        store.update(userId, { context: { ...session.context, [TICKET_SUBJECT_KEY]: text } });
        return messages.askTicketDescription;
      }

      const created = await this.deps.tickets.createTicket({
        userId,
        name: displayName,
        subject,
        description: text,
      });
      store.update(userId, { state: 'AWAITING_QUERY', context: {} });
      return created ? messages.ticketCreated : messages.ticketFailed;
    }

    const keyword = detectSupportIntent(text);
    if (keyword) {
      logger.info({ userId, keyword }, 'Detected support intent');
      store.update(userId, { state: 'TICKET_CREATION', context: {} });
      return messages.askTicketSubject;
    }

    const result = await this.deps.assistant.reply({
      userId,
      text,
      displayName,
      conversationHandle: session.conversationHandle,
    });

    if (result.conversationHandle && result.conversationHandle !== session.conversationHandle) {
      store.update(userId, { conversationHandle: result.conversationHandle });
    }
    if (result.status !== 'completed') {
      logger.warn({ userId, status: result.status }, 'Assistant did not complete, sending apology');
    }

    return assistantReplyText(result);
  }

  private async deliver(userId: string, text: string): Promise<void> {
    try {
      const delivered = await this.deps.notifier.send(userId, text);
      if (!delivered) {
        logger.warn({ userId }, 'Reply was not delivered');
      }
    } catch (error) {
      logger.error({ error, userId }, 'Error delivering reply');
    }
  }

  private async saveSnapshot(): Promise<void> {
    const { snapshots, store } = this.deps;
    if (!snapshots || store.size === 0) {
      return;
    }
    try {
      await snapshots.save(store.snapshot());
    } catch (error) {
      logger.error({ error }, 'Error saving sessions');
    }
  }
}
