/**
 * Promise-chain mutex. Work passed to `runExclusive` starts only after every
 * previously queued piece of work has settled, and the lock is released as
 * soon as the work settles, whether it resolved or threw.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get queued(): number {
    return this.pending;
  }

  runExclusive<T>(work: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(work).finally(() => {
      this.pending--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

const locks = new WeakMap<object, ExclusiveLock>();

/** One lock per resource object, for as long as the resource is alive. */
export function lockFor(resource: object): ExclusiveLock {
  let lock = locks.get(resource);
  if (!lock) {
    lock = new ExclusiveLock();
    locks.set(resource, lock);
  }
  return lock;
}
