/**
 * Thread Store - remembers the assistant thread of each user
 *
 * Kept in its own small JSON file (userId → threadId) so conversations
 * survive restarts even when the session snapshot is lost.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class ThreadStore {
  private threads: Map<string, string> | null = null;
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(readonly filePath: string) {}

  async get(userId: string): Promise<string | null> {
    const threads = await this.load();
    return threads.get(userId) ?? null;
  }

  async set(userId: string, threadId: string): Promise<void> {
    const threads = await this.load();
    threads.set(userId, threadId);
    await this.persist(threads);
  }

  async delete(userId: string): Promise<boolean> {
    const threads = await this.load();
    if (!threads.delete(userId)) {
      return false;
    }
    await this.persist(threads);
    return true;
  }

  private async load(): Promise<Map<string, string>> {
    if (this.threads) {
      return this.threads;
    }

    const threads = new Map<string, string>();
    try {
      const data = await fs.readFile(this.filePath, 'utf-8');
      const parsed: unknown = JSON.parse(data);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        for (const [userId, threadId] of Object.entries(parsed)) {
          if (typeof threadId === 'string') {
            threads.set(userId, threadId);
          }
        }
      }
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        logger.warn({ error, filePath: this.filePath }, 'Could not read threads file, starting empty');
      }
    }

    // Another caller may have finished loading while we were reading
    if (!this.threads) {
      this.threads = threads;
    }
    return this.threads;
  }

  private persist(threads: Map<string, string>): Promise<void> {
    const payload = JSON.stringify(Object.fromEntries(threads), null, 2);
    const write = this.writeChain.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, payload);
    });
    this.writeChain = write.catch(() => undefined);
    return write;
  }
}
