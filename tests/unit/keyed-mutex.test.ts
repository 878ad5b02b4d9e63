import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '@/concurrency/keyed-mutex.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs sections for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive('account-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('account-1', async () => {
      events.push('second:start');
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block different keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive('account-1', () => gate.promise);
    const other = await mutex.runExclusive('account-2', async () => 'done');

    expect(other).toBe('done');
    expect(mutex.isLocked('account-1')).toBe(true);

    gate.resolve();
    await held;
    expect(mutex.isLocked('account-1')).toBe(false);
  });

  it('releases the key when a section throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('account-1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await mutex.runExclusive('account-1', async () => 42)).toBe(42);
    expect(mutex.isLocked('account-1')).toBe(false);
  });
});
