import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../src/utils/keyed-mutex.js';
import { TimeoutError, withTimeout } from '../../src/utils/timeout.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks for one key in arrival order, one at a time', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('m1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('m1', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive('m1', () => gate.promise);
    const other = await mutex.runExclusive('m2', async () => 'done');

    expect(other).toBe('done');
    expect(mutex.isLocked('m1')).toBe(true);
    gate.resolve();
    await held;
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('m1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await mutex.runExclusive('m1', async () => 42)).toBe(42);
    expect(mutex.isLocked('m1')).toBe(false);
    expect(mutex.size).toBe(0);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when the work finishes in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000, 'fast')).resolves.toBe('ok');
  });

  it('rejects with a TimeoutError and calls onTimeout', async () => {
    let timedOut = false;
    const never = new Promise<string>(() => {});

    const error = await withTimeout(never, 10, 'upload_snapshot', () => {
      timedOut = true;
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof Error && error.message).toBe('upload_snapshot timed out after 10ms');
    expect(timedOut).toBe(true);
  });
});
