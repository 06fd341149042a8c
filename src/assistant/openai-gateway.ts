import OpenAI from 'openai';
import type { ThreadsGateway } from './types.js';

export interface OpenAIThreadsGatewayOptions {
  apiKey: string;
  /** Upper bound for a single HTTP request to the API */
  requestTimeoutMs: number;
  maxRetries?: number;
}

/**
 * ThreadsGateway backed by the OpenAI Assistants API (beta threads and runs).
 */
export class OpenAIThreadsGateway implements ThreadsGateway {
  private readonly client: OpenAI;

  constructor(options: OpenAIThreadsGatewayOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.requestTimeoutMs,
      maxRetries: options.maxRetries ?? 1,
    });
  }

  async createThread(signal?: AbortSignal): Promise<string> {
    const thread = await this.client.beta.threads.create({}, { signal });
    return thread.id;
  }

  async addUserMessage(threadId: string, content: string, signal?: AbortSignal): Promise<void> {
    await this.client.beta.threads.messages.create(threadId, { role: 'user', content }, { signal });
  }

  async startRun(threadId: string, assistantId: string, signal?: AbortSignal): Promise<string> {
    const run = await this.client.beta.threads.runs.create(threadId, { assistant_id: assistantId }, { signal });
    return run.id;
  }

  async getRunStatus(threadId: string, runId: string, signal?: AbortSignal): Promise<string> {
    const run = await this.client.beta.threads.runs.retrieve(threadId, runId, { signal });
    return run.status;
  }

  async cancelRun(threadId: string, runId: string, signal?: AbortSignal): Promise<void> {
    await this.client.beta.threads.runs.cancel(threadId, runId, { signal });
  }

  async latestAssistantText(threadId: string, signal?: AbortSignal): Promise<string | null> {
    const page = await this.client.beta.threads.messages.list(threadId, { order: 'desc', limit: 20 }, { signal });

    for (const message of page.data) {
      if (message.role !== 'assistant') {
        continue;
      }
      for (const block of message.content) {
        if (block.type === 'text') {
          return block.text.value;
        }
      }
    }

    return null;
  }
}
