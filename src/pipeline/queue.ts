/** Bounds how many tasks run at once; the rest wait in FIFO order. */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (limit < 1) {
      throw new RangeError(`limit must be at least 1, got ${limit}`);
    }
  }

  async run<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get activeCount(): number {
    return this.active;
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next waiter
      next();
    } else {
      this.active--;
    }
  }
}

interface PendingJob<J, R> {
  job: J;
  waiters: Array<{ resolve: (result: R) => void; reject: (error: unknown) => void }>;
}

/**
 * Per-path FIFO: one job in flight per path, and at most one pending job
 * behind it. Work arriving while a job is pending is folded into it with
 * `coalesce` instead of growing the queue; everyone waiting on a folded job
 * gets the result of the run that served it.
 */
export class PathQueue<J, R = void> {
  private readonly running = new Map<string, Promise<void>>();
  private readonly pending = new Map<string, PendingJob<J, R>>();

  constructor(
    private readonly worker: (path: string, job: J) => Promise<R>,
    private readonly coalesce: (pending: J, incoming: J) => J,
    private readonly limiter: ConcurrencyLimiter,
  ) {}

  enqueue(path: string, job: J): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const pending = this.pending.get(path);
      if (pending) {
        pending.job = this.coalesce(pending.job, job);
        pending.waiters.push({ resolve, reject });
        return;
      }

      this.pending.set(path, { job, waiters: [{ resolve, reject }] });
      if (!this.running.has(path)) {
        this.drain(path);
      }
    });
  }

  isBusy(path: string): boolean {
    return this.running.has(path) || this.pending.has(path);
  }

  get size(): number {
    return this.running.size + this.pending.size;
  }

  /** Resolves once nothing is running or pending. */
  async onIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running.values()]);
    }
  }

  private drain(path: string): void {
    const entry = this.pending.get(path);
    if (!entry) {
      return;
    }
    this.pending.delete(path);

    const run = this.limiter
      .run(() => this.worker(path, entry.job))
      .then(
        (result) => entry.waiters.forEach((waiter) => waiter.resolve(result)),
        (error: unknown) => entry.waiters.forEach((waiter) => waiter.reject(error)),
      )
      .finally(() => {
        this.running.delete(path);
        this.drain(path);
      });

    this.running.set(path, run);
  }
}
