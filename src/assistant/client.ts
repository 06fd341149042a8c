/**
 * Assistant client - relays a user message to an OpenAI Assistant
 *
 * One thread per user. A message is added, a run started and polled until
 * it settles or the wall-clock timeout passes, in which case the run is
 * cancelled. The timeout covers every API call of the reply, including one
 * that never answers. Every outcome is returned as an AssistantResult.
 */

import { logger } from '../utils/logger.js';
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from '../utils/clock.js';
import { AssistantDeadlineError } from '../utils/errors.js';
import { messages } from '../chat/messages.js';
import type { ThreadStore } from './thread-store.js';
import type {
  AssistantFailureReason,
  AssistantPort,
  AssistantRequest,
  AssistantResult,
  ThreadsGateway,
} from './types.js';

export interface AssistantClientOptions {
  /** Missing assistant ID turns every reply into a not_configured failure */
  assistantId?: string;
  timeoutMs: number;
  pollIntervalMs: number;
  clock?: Clock;
  sleep?: Sleep;
}

const CANCEL_TIMEOUT_MS = 5000;

const FAILED_RUN_STATUSES = new Set(['failed', 'cancelled', 'expired', 'incomplete', 'requires_action']);

export function withNameContext(text: string, displayName?: string): string {
  return displayName ? `The user's name is ${displayName}. ${text}` : text;
}

const FAILURE_TEXT: Record<AssistantFailureReason, string> = {
  not_configured: messages.assistantNotConfigured,
  run_failed: messages.assistantRunFailed,
  empty_reply: messages.assistantNoText,
  error: messages.unexpectedError,
};

/**
 * Text to send back to the user for a given assistant outcome.
 */
export function assistantReplyText(result: AssistantResult): string {
  switch (result.status) {
    case 'completed':
      return result.text;
    case 'timed_out':
      return messages.assistantTimeout;
    case 'failed':
      return FAILURE_TEXT[result.reason];
  }
}

/**
 * Settle with the gateway call, or reject once the deadline signal fires.
 * Fakes and SDK calls that ignore the signal are bounded the same way.
 */
function beforeDeadline<T>(work: Promise<T>, signal: AbortSignal, timeoutMs: number): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new AssistantDeadlineError(timeoutMs));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AssistantDeadlineError(timeoutMs));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class AssistantClient implements AssistantPort {
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  constructor(
    private readonly gateway: ThreadsGateway | null,
    private readonly threads: ThreadStore,
    private readonly options: AssistantClientOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async reply(request: AssistantRequest): Promise<AssistantResult> {
    const { gateway } = this;
    const { assistantId, timeoutMs } = this.options;

    if (!gateway || !assistantId) {
      logger.warn({ userId: request.userId }, 'Assistant not configured');
      return { status: 'failed', reason: 'not_configured' };
    }

    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), timeoutMs);
    const within = <T>(work: Promise<T>): Promise<T> => beforeDeadline(work, deadline.signal, timeoutMs);

    let threadId: string | undefined;
    let runId: string | undefined;
    try {
      threadId = await this.resolveThread(gateway, request, deadline.signal, within);
      await within(
        gateway.addUserMessage(threadId, withNameContext(request.text, request.displayName), deadline.signal)
      );
      runId = await within(gateway.startRun(threadId, assistantId, deadline.signal));
      return await this.waitForRun(gateway, { threadId, runId, userId: request.userId }, deadline.signal, within);
    } catch (error) {
      if (error instanceof AssistantDeadlineError) {
        logger.error({ userId: request.userId, threadId, runId, timeoutMs }, 'Assistant request timed out');
        if (threadId && runId) {
          await this.cancelRun(gateway, threadId, runId);
        }
        return { status: 'timed_out', conversationHandle: threadId };
      }

      logger.error({ error, userId: request.userId, threadId }, 'Error generating assistant response');
      return {
        status: 'failed',
        reason: 'error',
        detail: error instanceof Error ? error.message : String(error),
        conversationHandle: threadId,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async forget(userId: string): Promise<void> {
    try {
      if (await this.threads.delete(userId)) {
        logger.info({ userId }, 'Forgot assistant thread');
      }
    } catch (error) {
      logger.error({ error, userId }, 'Failed to forget assistant thread');
    }
  }

  private async resolveThread(
    gateway: ThreadsGateway,
    request: AssistantRequest,
    signal: AbortSignal,
    within: <T>(work: Promise<T>) => Promise<T>
  ): Promise<string> {
    if (request.conversationHandle) {
      return request.conversationHandle;
    }

    const stored = await this.threads.get(request.userId);
    if (stored) {
      return stored;
    }

    const threadId = await within(gateway.createThread(signal));
    await this.threads.set(request.userId, threadId);
    logger.info({ userId: request.userId, threadId }, 'Created new assistant thread');
    return threadId;
  }

  private async waitForRun(
    gateway: ThreadsGateway,
    run: { threadId: string; runId: string; userId: string },
    signal: AbortSignal,
    within: <T>(work: Promise<T>) => Promise<T>
  ): Promise<AssistantResult> {
    const { threadId, runId, userId } = run;
    const startedAt = this.clock.now().getTime();

    while (this.clock.now().getTime() - startedAt < this.options.timeoutMs) {
      const status = await within(gateway.getRunStatus(threadId, runId, signal));

      if (status === 'completed') {
        const text = await within(gateway.latestAssistantText(threadId, signal));
        if (text === null) {
          logger.warn({ userId, threadId, runId }, 'Run completed without a text reply');
          return { status: 'failed', reason: 'empty_reply', conversationHandle: threadId };
        }
        return { status: 'completed', text, conversationHandle: threadId };
      }

      if (FAILED_RUN_STATUSES.has(status)) {
        logger.error({ userId, threadId, runId, status }, 'Run failed');
        // A run waiting for tool output keeps the thread locked until it expires
        if (status === 'requires_action') {
          await this.cancelRun(gateway, threadId, runId);
        }
        return { status: 'failed', reason: 'run_failed', detail: status, conversationHandle: threadId };
      }

      await this.sleep(this.options.pollIntervalMs);
    }

    logger.error({ userId, threadId, runId, timeoutMs: this.options.timeoutMs }, 'Run timed out');
    await this.cancelRun(gateway, threadId, runId);
    return { status: 'timed_out', conversationHandle: threadId };
  }

  /** Best-effort; bounded by its own short deadline */
  private async cancelRun(gateway: ThreadsGateway, threadId: string, runId: string): Promise<void> {
    const signal = AbortSignal.timeout(CANCEL_TIMEOUT_MS);
    try {
      await beforeDeadline(gateway.cancelRun(threadId, runId, signal), signal, CANCEL_TIMEOUT_MS);
      logger.info({ threadId, runId }, 'Cancelled run');
    } catch (error) {
      logger.warn({ error, threadId, runId }, 'Failed to cancel run');
    }
  }
}
