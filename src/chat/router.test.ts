import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { MessageRouter } from './router.js';
import { messages } from './messages.js';
import { SessionStore } from '../session/store.js';
import type { SnapshotWriter } from '../session/types.js';
import type { AssistantPort, AssistantResult } from '../assistant/types.js';
import type { TicketService } from '../tickets/client.js';
import { ManualClock, START, deferred, fakeNotifier } from '../test/helpers.js';

const USER = '5491100000001';

describe('MessageRouter', () => {
  let store: SessionStore;
  let notifier: ReturnType<typeof fakeNotifier>;
  let assistant: { reply: Mock<AssistantPort['reply']>; forget: Mock<AssistantPort['forget']> };
  let tickets: { createTicket: Mock<TicketService['createTicket']> };
  let snapshots: { save: Mock<SnapshotWriter['save']> };
  let router: MessageRouter;

  const send = (text: string) => router.handle({ userId: USER, displayName: 'Ana', text });
  const historyTexts = () => store.recentHistory(USER, 50).map((entry) => `${entry.role}: ${entry.content}`);

  beforeEach(() => {
    store = new SessionStore({ sessionTimeoutMs: 600_000, clock: new ManualClock() });
    notifier = fakeNotifier();
    assistant = {
      reply: vi.fn<AssistantPort['reply']>(async () => ({
        status: 'completed',
        text: 'respuesta',
        conversationHandle: 'thread_1',
      })),
      forget: vi.fn<AssistantPort['forget']>(async () => undefined),
    };
    tickets = { createTicket: vi.fn<TicketService['createTicket']>(async () => true) };
    snapshots = { save: vi.fn<SnapshotWriter['save']>(async () => true) };
    router = new MessageRouter({ store, assistant, notifier, tickets, snapshots });
  });

  it('welcomes a greeting in a new session', async () => {
    const reply = await send('Hola');

    expect(reply).toBe('¡Hola Ana! Bienvenido. ¿En qué puedo ayudarte hoy?');
    expect(notifier.send).toHaveBeenCalledWith(USER, reply);
    expect(store.getOrCreate(USER).state).toBe('AWAITING_QUERY');
    expect(historyTexts()).toEqual(['user: Hola', `assistant: ${reply}`]);
    expect(snapshots.save).toHaveBeenCalledTimes(1);
    expect(assistant.reply).not.toHaveBeenCalled();
  });

  it('welcomes without a name when the profile has none', async () => {
    const reply = await router.handle({ userId: USER, text: 'hi' });

    expect(reply).toBe('¡Hola! Bienvenido. ¿En qué puedo ayudarte hoy?');
  });

  it('sends a greeting to the assistant once the conversation has started', async () => {
    await send('hola');
    const reply = await send('hola');

    expect(reply).toBe('respuesta');
    expect(assistant.reply).toHaveBeenCalledTimes(1);
  });

  it('restarts the conversation on /restart', async () => {
    await send('hola');
    const reply = await send('  /RESTART ');

    const session = store.getOrCreate(USER);
    expect(reply).toBe(messages.restarted);
    expect(session.state).toBe('INITIAL');
    expect(session.context).toEqual({});
    expect(session.meta).toEqual({ messageCount: 4, restartCount: 1 });
    expect(assistant.forget).toHaveBeenCalledWith(USER);
    expect(historyTexts()).toEqual(['user:   /RESTART ', `assistant: ${messages.restarted}`]);
  });

  it('accepts /reiniciar as a restart command', async () => {
    expect(await send('/reiniciar')).toBe(messages.restarted);
    expect(store.getOrCreate(USER).meta.restartCount).toBe(1);
  });

  it('opens a ticket conversation on a support keyword', async () => {
    const reply = await send('Tengo un error al pagar');

    expect(reply).toBe(messages.askTicketSubject);
    expect(store.getOrCreate(USER).state).toBe('TICKET_CREATION');
    expect(assistant.reply).not.toHaveBeenCalled();
  });

  it('collects subject and description, then files the ticket', async () => {
    await send('tengo un problema');
    expect(await send('Login roto')).toBe(messages.askTicketDescription);
    expect(store.getOrCreate(USER).context).toEqual({ ticketSubject: 'Login roto' });

    const reply = await send('No puedo entrar desde ayer');

    expect(reply).toBe(messages.ticketCreated);
    expect(tickets.createTicket).toHaveBeenCalledWith({
      userId: USER,
      name: 'Ana',
      subject: 'Login roto',
      description: 'No puedo entrar desde ayer',
    });
    const session = store.getOrCreate(USER);
    expect(session.state).toBe('AWAITING_QUERY');
    expect(session.context).toEqual({});
  });

  it('finishes a ticket dialogue restored from an old-format snapshot', async () => {
    store.restore({
      [USER]: {
        created_at: START.toISOString(),
        last_activity: START.toISOString(),
        state: 'TICKET_CREATION',
        context: { ticket_subject: 'Login roto' },
      },
    });

    const reply = await send('No puedo entrar');

    expect(reply).toBe(messages.ticketCreated);
    expect(tickets.createTicket).toHaveBeenCalledWith({
      userId: USER,
      name: 'Ana',
      subject: 'Login roto',
      description: 'No puedo entrar',
    });
  });

  it('apologises when the ticket cannot be filed', async () => {
    tickets.createTicket.mockResolvedValueOnce(false);
    await send('ayuda');
    await send('Factura');

    expect(await send('Me cobraron dos veces')).toBe(messages.ticketFailed);
    expect(store.getOrCreate(USER).state).toBe('AWAITING_QUERY');
  });

  it('formats the assistant reply and remembers the thread', async () => {
    assistant.reply.mockResolvedValueOnce({
      status: 'completed',
      text: '**Hola** mira [docs](https://example.com/docs)【4:0†source】',
      conversationHandle: 'thread_7',
    });

    const reply = await send('¿Dónde está el manual?');

    expect(reply).toBe('*Hola* mira docs: https://example.com/docs');
    expect(assistant.reply).toHaveBeenCalledWith({
      userId: USER,
      text: '¿Dónde está el manual?',
      displayName: 'Ana',
      conversationHandle: null,
    });
    expect(store.getOrCreate(USER).conversationHandle).toBe('thread_7');
  });

  it.each<[AssistantResult, string]>([
    [{ status: 'timed_out', conversationHandle: 'thread_1' }, messages.assistantTimeout],
    [{ status: 'failed', reason: 'run_failed', detail: 'expired', conversationHandle: 'thread_1' }, messages.assistantRunFailed],
    [{ status: 'failed', reason: 'not_configured' }, messages.assistantNotConfigured],
    [{ status: 'failed', reason: 'empty_reply', conversationHandle: 'thread_1' }, messages.assistantNoText],
  ])('replies with an apology for %o', async (result, expected) => {
    assistant.reply.mockResolvedValueOnce(result);

    expect(await send('¿Qué horario tienen?')).toBe(expected);
    expect(notifier.send).toHaveBeenCalledWith(USER, expected);
  });

  it('replies with a generic apology when handling throws', async () => {
    assistant.reply.mockRejectedValueOnce(new Error('boom'));

    const reply = await send('¿Qué horario tienen?');

    expect(reply).toBe(messages.unexpectedError);
    expect(notifier.send).toHaveBeenCalledWith(USER, messages.unexpectedError);
    expect(historyTexts()).toEqual(['user: ¿Qué horario tienen?', `assistant: ${messages.unexpectedError}`]);
  });

  it('resolves even when delivery and snapshot fail', async () => {
    notifier.send.mockRejectedValueOnce(new Error('offline'));
    snapshots.save.mockRejectedValueOnce(new Error('disk full'));

    await expect(send('hola')).resolves.toBe('¡Hola Ana! Bienvenido. ¿En qué puedo ayudarte hoy?');
  });

  it('handles messages of one user in arrival order', async () => {
    const slow = deferred<AssistantResult>();
    assistant.reply
      .mockImplementationOnce(() => slow.promise)
      .mockResolvedValueOnce({ status: 'completed', text: 'De nada', conversationHandle: 'thread_1' });

    const first = send('¿Qué horario tienen?');
    const second = send('Gracias');
    await vi.waitFor(() => expect(assistant.reply).toHaveBeenCalledTimes(1));

    slow.resolve({ status: 'completed', text: 'Abrimos a las 9', conversationHandle: 'thread_1' });
    expect(await Promise.all([first, second])).toEqual(['Abrimos a las 9', 'De nada']);

    expect(historyTexts()).toEqual([
      'user: ¿Qué horario tienen?',
      'assistant: Abrimos a las 9',
      'user: Gracias',
      'assistant: De nada',
    ]);
  });

  it('does not hold one user behind another', async () => {
    const slow = deferred<AssistantResult>();
    assistant.reply.mockImplementationOnce(() => slow.promise);

    const blocked = send('¿Qué horario tienen?');
    const other = await router.handle({ userId: '5491100000002', text: 'hola' });

    expect(other).toBe('¡Hola! Bienvenido. ¿En qué puedo ayudarte hoy?');
    slow.resolve({ status: 'completed', text: 'Abrimos a las 9', conversationHandle: 'thread_1' });
    await blocked;
  });

  it('tells the user only text is supported', async () => {
    await router.handleUnsupported(USER, 'image');

    expect(notifier.send).toHaveBeenCalledWith(USER, messages.textOnly);
    expect(store.size).toBe(0);
  });
});
