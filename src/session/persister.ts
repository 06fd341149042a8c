/**
 * Snapshot Persister - saves and loads the session store as one JSON file
 *
 * Durability is best-effort: nothing here throws to the caller.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger.js';
import type { SessionSnapshot, SnapshotWriter } from './types.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class SnapshotPersister implements SnapshotWriter {
  // Saves run one after another, so the file never has two writers
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /**
   * Write the snapshot. Serialization happens before this returns,
   * so later store changes never leak into an older save.
   */
  save(data: SessionSnapshot): Promise<boolean> {
    let payload: string;
    try {
      payload = JSON.stringify(data, null, 2);
    } catch (error) {
      logger.error({ error, filePath: this.filePath }, 'Failed to serialize sessions');
      return Promise.resolve(false);
    }

    const write = this.writeChain.then(() => this.writeFile(payload, Object.keys(data).length));
    this.writeChain = write;
    return write;
  }

  /**
   * Read the raw snapshot. A missing or unreadable file is an empty store.
   */
  async load(): Promise<Record<string, unknown>> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        logger.info({ filePath: this.filePath }, 'Sessions file not found, starting empty');
      } else {
        logger.error({ error, filePath: this.filePath }, 'Failed to read sessions file');
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      logger.error({ error, filePath: this.filePath }, 'Sessions file is not valid JSON');
      return {};
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      logger.error({ filePath: this.filePath }, 'Sessions file does not contain an object');
      return {};
    }

    return { ...parsed };
  }

  private async writeFile(payload: string, count: number): Promise<boolean> {
    const tmpFile = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpFile, payload);
      await fs.rename(tmpFile, this.filePath);
      logger.debug({ filePath: this.filePath, sessions: count }, 'Sessions saved');
      return true;
    } catch (error) {
      logger.error({ error, filePath: this.filePath }, 'Error saving sessions');
      return false;
    }
  }
}
