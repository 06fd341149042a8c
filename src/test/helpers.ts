import { vi } from 'vitest';
import type { Clock } from '../utils/clock.js';
import type { Notifier } from '../chat/types.js';

export const START = new Date('2025-03-01T12:00:00.000Z');

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date = START) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function fakeNotifier() {
  return { send: vi.fn<Notifier['send']>(async () => true) };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
