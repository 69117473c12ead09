import { describe, expect, it } from 'vitest';
import { KeyedLock } from './index-lock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs tasks on the same key one after another', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.runExclusive('coins', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.runExclusive('coins', async () => {
      events.push('second');
    });

    expect(lock.isLocked('coins')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.isLocked('coins')).toBe(false);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const slow = lock.runExclusive('coins', () => gate.promise);
    const result = await lock.runExclusive('chain', async () => 'done');

    expect(result).toBe('done');
    gate.resolve();
    await slow;
  });

  it('lets readers wait for a pending write', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    let written = false;

    const write = lock.runExclusive('coins', async () => {
      await gate.promise;
      written = true;
    });
    const read = lock.whenIdle('coins').then(() => written);

    gate.resolve();
    expect(await read).toBe(true);
    await write;
  });

  it('releases the key when a task fails', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive('coins', async () => {
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');

    expect(lock.isLocked('coins')).toBe(false);
    expect(await lock.runExclusive('coins', async () => 42)).toBe(42);
  });
});
