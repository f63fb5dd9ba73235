// Bounded worker pool with priority ordering
//
// At most `maxWorkers` jobs run at once. Waiting jobs start highest
// priority first, FIFO within a priority.

type Waiter = {
  priority: number;
  sequence: number;
  start: () => void;
};

export class WorkerPool {
  private active = 0;
  private sequence = 0;
  private readonly waiting: Waiter[] = [];

  constructor(readonly maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
  }

  /**
   * Run `job` once a worker is free.
   * A job that is aborted while still queued never starts.
   */
  async run<T>(job: () => Promise<T>, options: { priority?: number; signal?: AbortSignal } = {}): Promise<T> {
    const release = await this.acquire(options.priority ?? 0, options.signal);
    try {
      return await job();
    } finally {
      release();
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.waiting.length;
  }

  private acquire(priority: number, signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (this.active < this.maxWorkers) {
      this.active++;
      return Promise.resolve(this.releaser());
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        priority,
        sequence: this.sequence++,
        start: () => {
          signal?.removeEventListener('abort', onAbort);
          this.active++;
          resolve(this.releaser());
        },
      };

      const onAbort = () => {
        const index = this.waiting.indexOf(waiter);
        if (index >= 0) {
          this.waiting.splice(index, 1);
          reject(signal ? abortReason(signal) : new Error('aborted'));
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.enqueue(waiter);
    });
  }

  private enqueue(waiter: Waiter): void {
    const index = this.waiting.findIndex(
      (w) => w.priority < waiter.priority || (w.priority === waiter.priority && w.sequence > waiter.sequence)
    );
    if (index === -1) {
      this.waiting.push(waiter);
    } else {
      this.waiting.splice(index, 0, waiter);
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active--;
      const next = this.waiting.shift();
      if (next) next.start();
    };
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('aborted');
}
