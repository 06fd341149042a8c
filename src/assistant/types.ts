/**
 * Assistant port types
 */

export interface AssistantRequest {
  userId: string;
  text: string;
  displayName?: string;
  /** Thread already recorded on the session, if any */
  conversationHandle?: string | null;
}

export type AssistantFailureReason = 'not_configured' | 'run_failed' | 'empty_reply' | 'error';

export type AssistantResult =
  | { status: 'completed'; text: string; conversationHandle: string }
  | { status: 'failed'; reason: AssistantFailureReason; detail?: string; conversationHandle?: string }
  | { status: 'timed_out'; conversationHandle?: string };

export interface AssistantPort {
  /** Never rejects; every outcome is described by the result */
  reply(request: AssistantRequest): Promise<AssistantResult>;
  /** Drop the user's conversation so the next reply starts a new one */
  forget(userId: string): Promise<void>;
}

/**
 * Subset of the Assistants API used by the client. The signal aborts the
 * request once the reply deadline has passed.
 */
export interface ThreadsGateway {
  createThread(signal?: AbortSignal): Promise<string>;
  addUserMessage(threadId: string, content: string, signal?: AbortSignal): Promise<void>;
  startRun(threadId: string, assistantId: string, signal?: AbortSignal): Promise<string>;
  getRunStatus(threadId: string, runId: string, signal?: AbortSignal): Promise<string>;
  cancelRun(threadId: string, runId: string, signal?: AbortSignal): Promise<void>;
  /** First text block of the newest assistant message */
  latestAssistantText(threadId: string, signal?: AbortSignal): Promise<string | null>;
}
