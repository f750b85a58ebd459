import { describe, expect, it } from 'vitest';
import { ConversationLock } from '../src/services/concurrency/ConversationLock';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConversationLock', () => {
  it('should reject a second turn while the first is running', async () => {
    const lock = new ConversationLock();
    const gate = deferred<string>();

    const first = lock.runExclusive('c-1', () => gate.promise);
    const second = await lock.runExclusive('c-1', async () => 'second');

    expect(second).toEqual({ status: 'rejected', reason: 'busy' });
    expect(lock.isBusy('c-1')).toBe(true);

    gate.resolve('first');
    expect(await first).toEqual({ status: 'accepted', result: 'first' });
    expect(lock.isBusy('c-1')).toBe(false);
  });

  it('should not block other conversations', async () => {
    const lock = new ConversationLock();
    const gate = deferred<string>();

    const first = lock.runExclusive('c-1', () => gate.promise);
    const other = await lock.runExclusive('c-2', async () => 'other');

    expect(other).toEqual({ status: 'accepted', result: 'other' });
    gate.resolve('done');
    await first;
  });

  it('should release the lock when the turn throws', async () => {
    const lock = new ConversationLock();

    await expect(lock.runExclusive('c-1', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(lock.isBusy('c-1')).toBe(false);
  });
});
