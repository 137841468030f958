export type Release = () => void;

/**
 * FIFO counting semaphore bounding how many tool processes run at once.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private waiters: Array<{ grant: (release: Release) => void }> = [];

  constructor(readonly max: number) {
    if (!Number.isInteger(max) || max < 1) throw new RangeError(`max must be a positive integer, got ${max}`);
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a slot. Resolves with a release function, or with null if `signal` aborts first
   * (the waiter is removed from the queue and holds no slot).
   */
  acquire(signal?: AbortSignal): Promise<Release | null> {
    if (signal?.aborted) return Promise.resolve(null);
    if (this.active < this.max) {
      this.active += 1;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release | null>((resolve) => {
      const waiter = {
        grant: (release: Release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        }
      };
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        resolve(null);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the slot over directly; `active` stays the same.
        next.grant(this.releaser());
        return;
      }
      this.active -= 1;
    };
  }
}
