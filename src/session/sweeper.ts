/**
 * Expiration Sweeper - enforces the inactivity policy in the background
 *
 * Each sweep flags sessions inside one synchronous store call, then sends
 * warnings and closing notices after it, so slow deliveries never hold up
 * message handling. Notices may arrive just after a user wrote again;
 * closing is skipped in that case (see SessionStore.closeIfStale).
 */

import { systemClock, type Clock } from '../utils/clock.js';
import { logger } from '../utils/logger.js';
import { messages } from '../chat/messages.js';
import type { Notifier } from '../chat/types.js';
import type { SessionStore } from './store.js';
import type { InactivityScan, SnapshotWriter } from './types.js';

export interface SweeperOptions {
  intervalMs: number;
  warningThresholdMs: number;
  snapshotIntervalMs: number;
  clock?: Clock;
}

export interface SweepResult {
  warned: string[];
  closed: string[];
  snapshotSaved: boolean;
}

export class SessionSweeper {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<SweepResult> | null = null;
  private lastSnapshotAt: number;
  private readonly clock: Clock;

  constructor(
    private readonly store: SessionStore,
    private readonly notifier: Notifier,
    private readonly persister: SnapshotWriter,
    private readonly options: SweeperOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.lastSnapshotAt = this.clock.now().getTime();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.lastSnapshotAt = this.clock.now().getTime();
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);

    logger.info(
      {
        intervalMs: this.options.intervalMs,
        warningThresholdMs: this.options.warningThresholdMs,
        sessionTimeoutMs: this.store.sessionTimeoutMs,
      },
      'Session sweeper started'
    );
  }

  /** Stop the timer and wait for a sweep that is still delivering notices */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Session sweeper stopped');
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Run one sweep. Never rejects: failures are logged and the next tick
   * runs as usual.
   */
  sweep(): Promise<SweepResult> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const current = this.runSweep().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = current;
    return current;
  }

  private tick(): void {
    if (this.inFlight) {
      logger.debug('Previous sweep still running, skipping tick');
      return;
    }
    this.sweep().catch((error) => {
      logger.error({ error }, 'Error in session sweeper');
    });
  }

  private async runSweep(): Promise<SweepResult> {
    const result: SweepResult = { warned: [], closed: [], snapshotSaved: false };
    const now = this.clock.now();

    let scan: InactivityScan = { warn: [], close: [] };
    try {
      scan = this.store.collectInactive(this.options.warningThresholdMs, now);
    } catch (error) {
      logger.error({ error }, 'Error scanning sessions');
    }

    for (const userId of scan.warn) {
      if (await this.sendWarning(userId)) {
        result.warned.push(userId);
      }
    }

    for (const userId of scan.close) {
      if (await this.closeSession(userId)) {
        result.closed.push(userId);
      }
    }

    if (now.getTime() - this.lastSnapshotAt >= this.options.snapshotIntervalMs) {
      this.lastSnapshotAt = now.getTime();
      result.snapshotSaved = await this.persister.save(this.store.snapshot());
    }

    return result;
  }

  private async sendWarning(userId: string): Promise<boolean> {
    const minutesLeft = Math.floor((this.store.sessionTimeoutMs - this.options.warningThresholdMs) / 60000);
    const warning = messages.inactivityWarning(minutesLeft);

    try {
      const delivered = await this.notifier.send(userId, warning);
      this.store.appendNotice(userId, warning);
      logger.info({ userId, delivered }, 'Sent inactivity warning');
      return true;
    } catch (error) {
      logger.error({ error, userId }, 'Error sending inactivity warning');
      return false;
    }
  }

  private async closeSession(userId: string): Promise<boolean> {
    try {
      const delivered = await this.notifier.send(userId, messages.sessionClosed);
      logger.info({ userId, delivered }, 'Sent closing notice');
    } catch (error) {
      logger.error({ error, userId }, 'Error sending closing notice');
    }

    const closed = this.store.closeIfStale(userId, messages.sessionClosed);
    if (closed) {
      logger.info({ userId }, 'Closed inactive session');
    } else {
      logger.info({ userId }, 'Session became active again before closing');
    }
    return closed;
  }
}
