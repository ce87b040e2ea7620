/**
 * Mindmap Write Lock
 * Async FIFO mutex that serializes the store's write sections.
 * Readers never take it (WAL keeps them consistent); embedding happens before
 * acquiring, so a slow provider never holds up other writers.
 */

interface Waiter {
  grant: () => void;
  fail: (err: Error) => void;
}

export class WriteLockTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Write lock timeout after ${timeoutMs}ms`);
    this.name = 'WriteLockTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class WriteLock {
  private waiters: Waiter[] = [];
  private held = false;
  private closed = false;
  private acquires = 0;
  private waits = 0;
  private peakQueueDepth = 0;

  /** Resolves when the caller owns the lock. Rejects on timeout or after drain(). */
  acquire(timeoutMs?: number): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Write lock is closed'));
    }
    this.acquires++;

    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }

    this.waits++;
    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const waiter: Waiter = {
        grant: () => { if (timer) clearTimeout(timer); resolve(); },
        fail: (err: Error) => { if (timer) clearTimeout(timer); reject(err); },
      };
      this.waiters.push(waiter);
      this.peakQueueDepth = Math.max(this.peakQueueDepth, this.waiters.length);

      if (timeoutMs !== undefined && timeoutMs > 0) {
        timer = setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx !== -1) this.waiters.splice(idx, 1);
          reject(new WriteLockTimeoutError(timeoutMs));
        }, timeoutMs);
      }
    });
  }

  /** Hand the lock straight to the next waiter, or free it */
  release(): void {
    if (!this.held) return;
    const next = this.waiters.shift();
    if (next) {
      next.grant();
    } else {
      this.held = false;
    }
  }

  /** Run fn while holding the lock; releases on success and on error */
  async withLock<T>(fn: () => T | Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Reject every queued waiter and refuse new acquires (shutdown) */
  drain(reason = 'Write lock shutting down'): void {
    this.closed = true;
    const pending = this.waiters.splice(0);
    for (const waiter of pending) {
      waiter.fail(new Error(reason));
    }
    this.held = false;
  }

  get stats() {
    return {
      held: this.held,
      queueDepth: this.waiters.length,
      totalAcquires: this.acquires,
      totalWaits: this.waits,
      maxQueueDepth: this.peakQueueDepth,
    };
  }
}
