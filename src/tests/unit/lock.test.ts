import { describe, it, expect } from 'vitest';
import { ExclusiveLock, lockFor } from '../../utils/lock.js';

describe('ExclusiveLock', () => {
  it('runs queued work one piece at a time, in order', async () => {
    const lock = new ExclusiveLock();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.runExclusive(async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = lock.runExclusive(async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(lock.queued).toBe(2);
    releaseFirst();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(lock.queued).toBe(0);
  });

  it('releases the lock when work throws', async () => {
    const lock = new ExclusiveLock();

    await expect(lock.runExclusive(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});

describe('lockFor', () => {
  it('hands out one lock per resource', () => {
    const store = {};

    expect(lockFor(store)).toBe(lockFor(store));
    expect(lockFor(store)).not.toBe(lockFor({}));
  });
});
