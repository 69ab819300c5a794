import { TimeoutError } from './errors.js';

export class Deadline {
  private readonly expiresAt: number;

  constructor(
    public readonly timeoutMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = now() + timeoutMs;
  }

  remaining(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  get expired(): boolean {
    return this.remaining() === 0;
  }

  check(stage: string): void {
    if (this.expired) {
      throw new TimeoutError(stage, this.timeoutMs);
    }
  }

  /** Settles with `promise`, or rejects with TimeoutError once the deadline passes. */
  async race<T>(promise: Promise<T>, stage: string): Promise<T> {
    this.check(stage);
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(stage, this.timeoutMs)), this.remaining());
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
