/**
 * Session types for per-user WhatsApp conversations
 */

export const SESSION_STATES = ['INITIAL', 'AWAITING_QUERY', 'TICKET_CREATION'] as const;

/** Closed sessions are deleted, so there is no CLOSED state */
export type SessionState = (typeof SESSION_STATES)[number];

export type HistoryRole = 'user' | 'assistant';

export interface HistoryEntry {
  role: HistoryRole;
  content: string;
  timestamp: Date;
  /** Set on notices produced by the sweeper */
  type?: 'system';
}

export interface SessionMeta {
  /** Messages appended through appendHistory, kept across restarts */
  messageCount: number;
  /** Number of explicit /restart commands */
  restartCount: number;
}

export interface Session {
  createdAt: Date;
  lastActivityAt: Date;
  state: SessionState;
  /** Values scoped to the current state, e.g. the ticket subject */
  context: Record<string, string>;
  /** Assistant thread ID, null until the first assistant call */
  conversationHandle: string | null;
  history: HistoryEntry[];
  warningSent: boolean;
  closeNoticeSent: boolean;
  meta: SessionMeta;
}

/** Fields the router may change through SessionStore.update */
export type SessionUpdate = Partial<Pick<Session, 'state' | 'context' | 'conversationHandle'>>;

/** userId → Session */
export type SessionSnapshot = Record<string, Session>;

export interface SnapshotWriter {
  save(data: SessionSnapshot): Promise<boolean>;
}

export interface InactivityScan {
  warn: string[];
  close: string[];
}

export interface SessionStats {
  activeSessions: number;
  totalMessages: number;
  totalRestarts: number;
  byState: Record<SessionState, number>;
}
