/**
 * Async mutex
 * queue-based lock so read-check-write sequences on shared state never
 * interleave across awaits
 */

interface Waiter {
  resolve: () => void;
}

export class Mutex {
  private locked = false;
  private queue: Waiter[] = [];

  async acquire(): Promise<void> {
    // proceed immediately if free
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push({ resolve });
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next.resolve();
      return;
    }
    this.locked = false;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  // for testing/observability
  getStats(): { locked: boolean; waiting: number } {
    return {
      locked: this.locked,
      waiting: this.queue.length
    };
  }
}
