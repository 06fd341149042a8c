/**
 * Session Store - in-memory user → session map
 *
 * The store is the only owner of session state. Callers get copies, and
 * change sessions only through the operations below. None of them awaits,
 * so each one runs to completion on the event loop before any other
 * request handler or the sweeper can observe the map.
 */

import { systemClock, type Clock } from '../utils/clock.js';
import { logger } from '../utils/logger.js';
import { newSession, parseSnapshot } from './schema.js';
import type {
  HistoryEntry,
  HistoryRole,
  InactivityScan,
  Session,
  SessionSnapshot,
  SessionStats,
  SessionUpdate,
} from './types.js';

export interface SessionStoreOptions {
  sessionTimeoutMs: number;
  clock?: Clock;
}

const DEFAULT_HISTORY_LIMIT = 10;

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly clock: Clock;
  readonly sessionTimeoutMs: number;

  constructor(options: SessionStoreOptions) {
    this.sessionTimeoutMs = options.sessionTimeoutMs;
    this.clock = options.clock ?? systemClock;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Return the user's session, creating it on first contact.
   * An existing session counts as active again.
   */
  getOrCreate(userId: string): Session {
    const existing = this.sessions.get(userId);
    if (existing) {
      this.touch(existing);
      return structuredClone(existing);
    }

    const session = newSession(this.clock.now());
    this.sessions.set(userId, session);
    logger.info({ userId }, 'Created new session');
    return structuredClone(session);
  }

  update(userId: string, fields: SessionUpdate): void {
    const session = this.sessions.get(userId);
    if (!session) {
      return;
    }

    if (fields.state !== undefined) {
      session.state = fields.state;
    }
    if (fields.context !== undefined) {
      session.context = { ...fields.context };
    }
    if (fields.conversationHandle !== undefined) {
      session.conversationHandle = fields.conversationHandle;
    }

    this.touch(session);
    logger.debug({ userId, fields: Object.keys(fields) }, 'Updated session');
  }

  /**
   * Replace the session with a fresh one. Message count carries over,
   * restart count goes up by one.
   */
  restart(userId: string): void {
    const previous = this.sessions.get(userId);
    const meta = {
      messageCount: previous?.meta.messageCount ?? 0,
      restartCount: (previous?.meta.restartCount ?? 0) + 1,
    };

    this.sessions.set(userId, newSession(this.clock.now(), meta));
    logger.info({ userId, restartCount: meta.restartCount }, 'Restarted session');
  }

  remove(userId: string): void {
    if (this.sessions.delete(userId)) {
      logger.info({ userId }, 'Ended session');
    }
  }

  isActive(userId: string): boolean {
    const session = this.sessions.get(userId);
    if (!session) {
      return false;
    }
    return this.clock.now().getTime() < session.lastActivityAt.getTime() + this.sessionTimeoutMs;
  }

  appendHistory(userId: string, role: HistoryRole, content: string): void {
    const session = this.sessions.get(userId);
    if (!session) {
      return;
    }

    session.history.push({ role, content, timestamp: this.clock.now() });
    session.meta.messageCount += 1;
    this.touch(session);
  }

  recentHistory(userId: string, limit: number = DEFAULT_HISTORY_LIMIT): HistoryEntry[] {
    const session = this.sessions.get(userId);
    if (!session || limit <= 0) {
      return [];
    }
    return structuredClone(session.history.slice(-limit));
  }

  snapshot(): SessionSnapshot {
    const copy: SessionSnapshot = {};
    for (const [userId, session] of this.sessions) {
      copy[userId] = structuredClone(session);
    }
    return copy;
  }

  /**
   * Merge sessions read from a snapshot file. Missing fields get their
   * defaults; records that cannot be read are skipped.
   */
  restore(serialized: Record<string, unknown>): number {
    const { sessions, rejected } = parseSnapshot(serialized);

    for (const { userId, issues } of rejected) {
      logger.warn({ userId, issues }, 'Skipping unreadable session record');
    }

    for (const [userId, session] of Object.entries(sessions)) {
      this.sessions.set(userId, session);
    }

    const restored = Object.keys(sessions).length;
    logger.info({ restored, skipped: rejected.length }, 'Restored sessions');
    return restored;
  }

  /**
   * Scan phase of the sweeper. Flags each session it selects so that the
   * same inactivity period never produces a second notice.
   */
  collectInactive(warningThresholdMs: number, now: Date = this.clock.now()): InactivityScan {
    const scan: InactivityScan = { warn: [], close: [] };

    for (const [userId, session] of this.sessions) {
      const inactiveMs = now.getTime() - session.lastActivityAt.getTime();

      if (inactiveMs >= this.sessionTimeoutMs && !session.closeNoticeSent) {
        session.closeNoticeSent = true;
        scan.close.push(userId);
      } else if (inactiveMs >= warningThresholdMs && !session.warningSent) {
        session.warningSent = true;
        scan.warn.push(userId);
      }
    }

    return scan;
  }

  /** Record a system notice without counting it as user activity */
  appendNotice(userId: string, content: string): void {
    const session = this.sessions.get(userId);
    if (!session) {
      return;
    }
    session.history.push({ role: 'assistant', content, timestamp: this.clock.now(), type: 'system' });
  }

  /**
   * Close a session selected by collectInactive. If the user wrote again in
   * the meantime the flag has been cleared and the session stays.
   */
  closeIfStale(userId: string, notice: string): boolean {
    const session = this.sessions.get(userId);
    if (!session || !session.closeNoticeSent) {
      return false;
    }

    session.history.push({ role: 'assistant', content: notice, timestamp: this.clock.now(), type: 'system' });
    logger.info({ userId, messages: session.history.length }, 'Session stats before close');
    this.sessions.delete(userId);
    return true;
  }

  stats(): SessionStats {
    const byState: SessionStats['byState'] = { INITIAL: 0, AWAITING_QUERY: 0, TICKET_CREATION: 0 };
    let totalMessages = 0;
    let totalRestarts = 0;

    for (const session of this.sessions.values()) {
      byState[session.state] += 1;
      totalMessages += session.meta.messageCount;
      totalRestarts += session.meta.restartCount;
    }

    return { activeSessions: this.sessions.size, totalMessages, totalRestarts, byState };
  }

  private touch(session: Session): void {
    const now = this.clock.now();
    if (now.getTime() > session.lastActivityAt.getTime()) {
      session.lastActivityAt = now;
    }
    session.warningSent = false;
    session.closeNoticeSent = false;
  }
}
