/**
 * Concurrency control for external service calls.
 *
 * @module services/concurrency
 */

function abortReason(signal: AbortSignal | undefined): unknown {
  return signal?.reason ?? new Error('Aborted');
}

/**
 * Caps how many service calls are in flight at once.
 *
 * Callers beyond the limit wait in FIFO order. A caller waiting with an
 * AbortSignal leaves the queue when the signal aborts, so a stopped stage
 * does not start lookups it no longer needs.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(3);
 * const contacts = await Promise.all(
 *   people.map((person) => limiter.run(() => service.findContact(person), signal))
 * );
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  /**
   * @param limit - Maximum number of calls in flight (default: 3)
   * @throws Error if limit is not a positive integer
   */
  constructor(limit: number = 3) {
    if (limit < 1) {
      throw new Error('Concurrency limit must be at least 1');
    }
    if (!Number.isInteger(limit)) {
      throw new Error('Concurrency limit must be an integer');
    }
    this.limit = limit;
  }

  /**
   * Take a slot, waiting for one when all are in use.
   *
   * @throws The signal's reason if it aborts before a slot is granted
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(grant);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(abortReason(signal));
      };
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Give a slot back. The next waiter, if any, takes it over directly.
   *
   * @throws Error when called without a matching acquire()
   */
  release(): void {
    if (this.active <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }

  /**
   * Run `fn` inside a slot, releasing it however `fn` ends.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
