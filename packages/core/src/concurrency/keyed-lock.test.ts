import { describe, it, expect } from 'vitest';
import { KeyedLock } from './keyed-lock.js';

// -----------------------------------------------------------------------------
// Test Helpers
// -----------------------------------------------------------------------------

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = (ms = 10) => new Promise((resolve) => setTimeout(resolve, ms));

// -----------------------------------------------------------------------------
// Tests
// -----------------------------------------------------------------------------

describe('KeyedLock', () => {
  it('should run tasks on the same key one at a time', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = lock.run('a', async () => {
      order.push('second');
      return 2;
    });

    await tick();
    expect(order).toEqual(['first:start']);
    expect(lock.isLocked('a')).toBe(true);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not block tasks on other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const blocked = lock.run('a', () => gate.promise);

    await expect(lock.run('b', () => 'b')).resolves.toBe('b');

    gate.resolve();
    await blocked;
  });

  it('should release the key when a task throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('a', () => 'ok')).resolves.toBe('ok');
    expect(lock.size).toBe(0);
  });
});
