import { describe, it, expect } from 'vitest';
import { KeyedLock } from './keyedLock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs tasks with the same key one after another', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run('session', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('session', async () => {
      order.push('second');
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.activeKeys).toBe(0);
  });

  it('lets different keys run side by side', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.run('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await lock.run('b', async () => {
      order.push('b');
    });
    gate.resolve();
    await blocked;

    expect(order).toEqual(['b', 'a']);
  });

  it('keeps going after a task fails', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('s', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await lock.run('s', async () => 'next')).toBe('next');
  });
});
