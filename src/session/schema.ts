import { z } from 'zod';
import { SESSION_STATES, type Session, type SessionMeta } from './types.js';

// Snapshot keys written by the first release of the bot
const LEGACY_KEYS: Record<string, string> = {
  created_at: 'createdAt',
  last_activity: 'lastActivityAt',
  thread_id: 'conversationHandle',
  message_history: 'history',
  inactivity_warning_sent: 'warningSent',
  closing_notice_sent: 'closeNoticeSent',
};

// Context keys written by the first release during a ticket dialogue
const LEGACY_CONTEXT_KEYS: Record<string, string> = {
  ticket_subject: 'ticketSubject',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function renameLegacyKeys(value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }

  const renamed: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    renamed[LEGACY_KEYS[key] ?? key] = entry;
  }

  const context = renamed.context;
  if (isRecord(context)) {
    const renamedContext: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(context)) {
      renamedContext[LEGACY_CONTEXT_KEYS[key] ?? key] = entry;
    }
    renamed.context = renamedContext;
  }

  const meta = renamed.meta;
  if (isRecord(meta)) {
    renamed.meta = {
      messageCount: meta.messageCount ?? meta.total_messages,
      restartCount: meta.restartCount ?? meta.session_restarts,
    };
  }

  return renamed;
}

const historyEntrySchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.coerce.date(),
  type: z.literal('system').optional(),
});

const sessionRecordSchema = z
  .object({
    createdAt: z.coerce.date(),
    lastActivityAt: z.coerce.date(),
    state: z.enum(SESSION_STATES).default('INITIAL'),
    context: z.record(z.string()).default({}),
    conversationHandle: z.string().nullable().default(null),
    history: z.array(historyEntrySchema).default([]),
    warningSent: z.boolean().default(false),
    closeNoticeSent: z.boolean().default(false),
    meta: z
      .object({
        messageCount: z.number().int().nonnegative().optional(),
        restartCount: z.number().int().nonnegative().optional(),
      })
      .optional(),
  })
  .transform((record): Session => {
    const meta: SessionMeta = {
      messageCount: record.meta?.messageCount ?? record.history.length,
      restartCount: record.meta?.restartCount ?? 0,
    };
    return { ...record, meta };
  });

/**
 * Canonical session shape. Used for fresh sessions and for snapshot records,
 * so both go through the same defaults.
 */
export const sessionSchema: z.ZodType<Session, z.ZodTypeDef, unknown> = z.preprocess(
  renameLegacyKeys,
  sessionRecordSchema
);

export function newSession(now: Date, meta?: SessionMeta): Session {
  return sessionSchema.parse({ createdAt: now, lastActivityAt: now, meta });
}

export type ParsedSnapshot = {
  sessions: Record<string, Session>;
  rejected: { userId: string; issues: string[] }[];
};

/**
 * Parse a loaded snapshot. Records that cannot be repaired by the defaults
 * are reported instead of failing the whole file.
 */
export function parseSnapshot(raw: Record<string, unknown>): ParsedSnapshot {
  const parsed: ParsedSnapshot = { sessions: {}, rejected: [] };

  for (const [userId, record] of Object.entries(raw)) {
    const result = sessionSchema.safeParse(record);
    if (result.success) {
      parsed.sessions[userId] = result.data;
    } else {
      parsed.rejected.push({
        userId,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
  }

  return parsed;
}
