import { describe, it, expect, beforeEach } from 'vitest';
import { SessionStore } from './store.js';
import { ManualClock, START } from '../test/helpers.js';

const USER = '5491100000001';
const TIMEOUT_MS = 600_000;

describe('SessionStore', () => {
  let clock: ManualClock;
  let store: SessionStore;

  beforeEach(() => {
    clock = new ManualClock();
    store = new SessionStore({ sessionTimeoutMs: TIMEOUT_MS, clock });
  });

  describe('getOrCreate', () => {
    it('creates a fresh session on first contact', () => {
      const session = store.getOrCreate(USER);

      expect(session).toEqual({
        createdAt: START,
        lastActivityAt: START,
        state: 'INITIAL',
        context: {},
        conversationHandle: null,
        history: [],
        warningSent: false,
        closeNoticeSent: false,
        meta: { messageCount: 0, restartCount: 0 },
      });
      expect(store.size).toBe(1);
    });

    it('refreshes activity on an existing session', () => {
      store.getOrCreate(USER);
      clock.advance(5_000);

      const session = store.getOrCreate(USER);

      expect(session.createdAt).toEqual(START);
      expect(session.lastActivityAt).toEqual(new Date(START.getTime() + 5_000));
    });

    it('returns a copy that does not write back into the store', () => {
      const session = store.getOrCreate(USER);
      session.context.ticketSubject = 'changed';
      session.state = 'TICKET_CREATION';

      const again = store.getOrCreate(USER);
      expect(again.context).toEqual({});
      expect(again.state).toBe('INITIAL');
    });
  });

  describe('isActive', () => {
    it('is false for unknown users and after remove', () => {
      expect(store.isActive(USER)).toBe(false);

      store.getOrCreate(USER);
      expect(store.isActive(USER)).toBe(true);

      store.remove(USER);
      expect(store.isActive(USER)).toBe(false);
    });

    it('turns false once the timeout has elapsed', () => {
      store.getOrCreate(USER);

      clock.advance(TIMEOUT_MS - 1);
      expect(store.isActive(USER)).toBe(true);

      clock.advance(1);
      expect(store.isActive(USER)).toBe(false);
    });
  });

  describe('update', () => {
    it('changes only the given fields', () => {
      store.getOrCreate(USER);
      store.update(USER, { state: 'TICKET_CREATION', context: { ticketSubject: 'Factura' } });
      store.update(USER, { conversationHandle: 'thread_1' });

      const session = store.getOrCreate(USER);
      expect(session.state).toBe('TICKET_CREATION');
      expect(session.context).toEqual({ ticketSubject: 'Factura' });
      expect(session.conversationHandle).toBe('thread_1');
    });

    it('does nothing for an unknown user', () => {
      store.update(USER, { state: 'AWAITING_QUERY' });
      expect(store.size).toBe(0);
    });

    it('clears the inactivity flags', () => {
      store.getOrCreate(USER);
      clock.advance(300_000);
      store.collectInactive(300_000);
      expect(store.snapshot()[USER]?.warningSent).toBe(true);

      store.update(USER, { state: 'AWAITING_QUERY' });

      expect(store.snapshot()[USER]?.warningSent).toBe(false);
    });
  });

  describe('restart', () => {
    it('resets the conversation but keeps the message count', () => {
      store.getOrCreate(USER);
      store.update(USER, { state: 'TICKET_CREATION', context: { ticketSubject: 'Login' }, conversationHandle: 'thread_1' });
      store.appendHistory(USER, 'user', 'hola');
      store.appendHistory(USER, 'assistant', 'Hola!');

      store.restart(USER);

      const session = store.getOrCreate(USER);
      expect(session.state).toBe('INITIAL');
      expect(session.context).toEqual({});
      expect(session.conversationHandle).toBeNull();
      expect(session.history).toEqual([]);
      expect(session.meta).toEqual({ messageCount: 2, restartCount: 1 });
    });

    it('counts restarts for a user without a session', () => {
      store.restart(USER);
      store.restart(USER);

      expect(store.getOrCreate(USER).meta).toEqual({ messageCount: 0, restartCount: 2 });
    });
  });

  describe('history', () => {
    it('counts every appended message', () => {
      store.getOrCreate(USER);
      for (let i = 0; i < 7; i++) {
        store.appendHistory(USER, i % 2 === 0 ? 'user' : 'assistant', `m${i}`);
      }

      expect(store.getOrCreate(USER).meta.messageCount).toBe(7);
    });

    it('keeps the count exact when appends interleave across async tasks', async () => {
      store.getOrCreate(USER);

      await Promise.all(
        Array.from({ length: 50 }, async (_, i) => {
          await new Promise((resolve) => setTimeout(resolve, i % 5));
          store.appendHistory(USER, 'user', `m${i}`);
        })
      );

      const session = store.getOrCreate(USER);
      expect(session.meta.messageCount).toBe(50);
      expect(session.history).toHaveLength(50);
    });

    it('returns the most recent entries oldest first', () => {
      store.getOrCreate(USER);
      for (let i = 1; i <= 12; i++) {
        store.appendHistory(USER, 'user', `m${i}`);
      }

      expect(store.recentHistory(USER).map((entry) => entry.content)).toEqual([
        'm3', 'm4', 'm5', 'm6', 'm7', 'm8', 'm9', 'm10', 'm11', 'm12',
      ]);
      expect(store.recentHistory(USER, 2).map((entry) => entry.content)).toEqual(['m11', 'm12']);
      expect(store.recentHistory(USER, 0)).toEqual([]);
      expect(store.recentHistory('unknown')).toEqual([]);
    });

    it('ignores appends for unknown users', () => {
      store.appendHistory(USER, 'user', 'hola');
      expect(store.size).toBe(0);
    });
  });

  describe('collectInactive', () => {
    it('selects each inactivity period once', () => {
      store.getOrCreate(USER);

      clock.advance(299_999);
      expect(store.collectInactive(300_000)).toEqual({ warn: [], close: [] });

      clock.advance(1);
      expect(store.collectInactive(300_000)).toEqual({ warn: [USER], close: [] });
      expect(store.collectInactive(300_000)).toEqual({ warn: [], close: [] });

      clock.advance(300_000);
      expect(store.collectInactive(300_000)).toEqual({ warn: [], close: [USER] });
      expect(store.collectInactive(300_000)).toEqual({ warn: [], close: [] });
    });

    it('closes without warning a session that skipped straight past the timeout', () => {
      store.getOrCreate(USER);
      clock.advance(TIMEOUT_MS + 30_000);

      expect(store.collectInactive(300_000)).toEqual({ warn: [], close: [USER] });
    });
  });

  describe('closeIfStale', () => {
    it('removes a flagged session and records the notice', () => {
      store.getOrCreate(USER);
      clock.advance(TIMEOUT_MS);
      store.collectInactive(300_000);

      expect(store.closeIfStale(USER, 'bye')).toBe(true);
      expect(store.size).toBe(0);
    });

    it('keeps a session the user returned to after the scan', () => {
      store.getOrCreate(USER);
      clock.advance(TIMEOUT_MS);
      store.collectInactive(300_000);

      store.getOrCreate(USER);

      expect(store.closeIfStale(USER, 'bye')).toBe(false);
      expect(store.isActive(USER)).toBe(true);
    });
  });

  describe('appendNotice', () => {
    it('records a system entry without refreshing activity', () => {
      store.getOrCreate(USER);
      clock.advance(60_000);

      store.appendNotice(USER, '¿Sigues ahí?');

      const [entry] = store.recentHistory(USER);
      expect(entry).toEqual({
        role: 'assistant',
        content: '¿Sigues ahí?',
        timestamp: new Date(START.getTime() + 60_000),
        type: 'system',
      });
      expect(store.snapshot()[USER]?.lastActivityAt).toEqual(START);
      expect(store.snapshot()[USER]?.meta.messageCount).toBe(0);
    });
  });

  describe('snapshot and restore', () => {
    it('round-trips through JSON', () => {
      store.getOrCreate(USER);
      store.update(USER, { state: 'AWAITING_QUERY', conversationHandle: 'thread_1' });
      store.appendHistory(USER, 'user', 'hola');
      store.restart('5491100000002');

      const serialized: unknown = JSON.parse(JSON.stringify(store.snapshot()));
      const restored = new SessionStore({ sessionTimeoutMs: TIMEOUT_MS, clock });
      expect(restored.restore(isObject(serialized) ? serialized : {})).toBe(2);

      expect(restored.snapshot()).toEqual(store.snapshot());
    });

    it('fills defaults for records written with the legacy keys', () => {
      const restored = store.restore({
        [USER]: {
          created_at: '2025-02-28T18:59:18.123Z',
          last_activity: '2025-02-28T19:01:00.000Z',
          state: 'AWAITING_QUERY',
          context: {},
          thread_id: 'thread_abc',
          message_history: [{ role: 'user', content: 'hola', timestamp: '2025-02-28T18:59:18.123Z' }],
          meta: { session_restarts: 3 },
        },
      });

      expect(restored).toBe(1);
      expect(store.snapshot()[USER]).toEqual({
        createdAt: new Date('2025-02-28T18:59:18.123Z'),
        lastActivityAt: new Date('2025-02-28T19:01:00.000Z'),
        state: 'AWAITING_QUERY',
        context: {},
        conversationHandle: 'thread_abc',
        history: [{ role: 'user', content: 'hola', timestamp: new Date('2025-02-28T18:59:18.123Z') }],
        warningSent: false,
        closeNoticeSent: false,
        meta: { messageCount: 1, restartCount: 3 },
      });
    });

    it('renames the legacy ticket subject inside the context', () => {
      store.restore({
        [USER]: {
          created_at: START.toISOString(),
          last_activity: START.toISOString(),
          state: 'TICKET_CREATION',
          context: { ticket_subject: 'Login roto', channel: 'whatsapp' },
        },
      });

      expect(store.snapshot()[USER]?.context).toEqual({ ticketSubject: 'Login roto', channel: 'whatsapp' });
    });

    it('skips records that cannot be repaired', () => {
      const restored = store.restore({
        good: { createdAt: START.toISOString(), lastActivityAt: START.toISOString() },
        badDate: { createdAt: 'not-a-date', lastActivityAt: START.toISOString() },
        badState: { createdAt: START.toISOString(), lastActivityAt: START.toISOString(), state: 'CLOSED' },
        notAnObject: 42,
      });

      expect(restored).toBe(1);
      expect(Object.keys(store.snapshot())).toEqual(['good']);
    });
  });

  it('reports stats across sessions', () => {
    store.getOrCreate('a');
    store.getOrCreate('b');
    store.update('b', { state: 'TICKET_CREATION' });
    store.appendHistory('a', 'user', 'hola');
    store.appendHistory('b', 'user', 'error');
    store.appendHistory('b', 'assistant', 'asunto?');
    store.restart('c');

    expect(store.stats()).toEqual({
      activeSessions: 3,
      totalMessages: 3,
      totalRestarts: 1,
      byState: { INITIAL: 2, AWAITING_QUERY: 0, TICKET_CREATION: 1 },
    });
  });
});

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
