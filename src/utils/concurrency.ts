export interface ConcurrencyLimiter {
  run<T>(fn: () => Promise<T>): Promise<T>;
  readonly inFlight: number;
  readonly waiting: number;
}

/**
 * FIFO limiter: at most `max` callbacks run at once, the rest queue in arrival order.
 */
export const createConcurrencyLimiter = (max: number): ConcurrencyLimiter => {
  const limit = Math.max(1, Math.floor(max) || 1);
  let inFlight = 0;
  const waiters: Array<() => void> = [];

  const acquire = async () => {
    if (inFlight < limit) {
      inFlight++;
      return;
    }
    await new Promise<void>(resolve => {
      waiters.push(() => {
        inFlight++;
        resolve();
      });
    });
  };

  const release = () => {
    inFlight = Math.max(0, inFlight - 1);
    const next = waiters.shift();
    if (next) next();
  };

  return {
    async run<T>(fn: () => Promise<T>): Promise<T> {
      await acquire();
      try {
        return await fn();
      } finally {
        release();
      }
    },
    get inFlight() {
      return inFlight;
    },
    get waiting() {
      return waiters.length;
    },
  };
};

/**
 * One exclusive lock per key (e.g. a file path). Idle keys are dropped.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, ConcurrencyLimiter>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = createConcurrencyLimiter(1);
      this.locks.set(key, lock);
    }
    const held = lock;
    try {
      return await held.run(fn);
    } finally {
      if (held.inFlight === 0 && held.waiting === 0 && this.locks.get(key) === held) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return (this.locks.get(key)?.inFlight ?? 0) > 0;
  }
}
