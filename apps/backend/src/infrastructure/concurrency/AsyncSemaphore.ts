// =============================================================================
// Async Semaphore / Mutex
// =============================================================================
// Counting semaphore for cooperative tasks. A waiter is handed the slot of the
// task that releases it, so `inUse` never dips while the queue is non-empty.

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
}

export class AsyncSemaphore {
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Slots currently free. */
  get available(): number {
    return this.capacity - this.inUse;
  }

  /**
   * Wait for a slot. The returned function releases it; calling it twice is a no-op.
   * Rejects with the signal's reason if aborted while queued.
   */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.inUse < this.capacity) {
      this.inUse += 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Run `task` while holding a slot.
   */
  async runExclusive<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Transfer the slot to the next waiter
      next.grant(this.createRelease());
      return;
    }
    this.inUse = Math.max(0, this.inUse - 1);
  }
}

/**
 * Mutual exclusion: a semaphore with a single slot.
 */
export class AsyncMutex extends AsyncSemaphore {
  constructor() {
    super(1);
  }
}
