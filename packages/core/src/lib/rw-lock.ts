/**
 * Async read/write lock, writer-preferring.
 *
 * Readers share the lock; a writer holds it alone. Once a writer is queued,
 * new readers queue behind it, so a steady stream of readers cannot starve
 * connect/shutdown/reconciliation. Waiters are granted in arrival order;
 * consecutive readers at the head of the queue are granted together.
 *
 * The lock is not reentrant. Code that already holds the write side calls
 * the manager's `*Locked` routines directly instead of going through the
 * public lock-taking API.
 */

interface Waiter {
  kind: "read" | "write";
  grant: () => void;
}

export class RwLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  /** Run `fn` holding the shared (read) side */
  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  /** Run `fn` holding the exclusive (write) side */
  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  /** Current holders, for diagnostics and tests */
  get state(): { readers: number; writer: boolean; waiting: number } {
    return {
      readers: this.readers,
      writer: this.writer,
      waiting: this.queue.length,
    };
  }

  private acquireRead(): Promise<void> {
    if (!this.writer && this.queue.length === 0) {
      this.readers++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({
        kind: "read",
        grant: () => {
          this.readers++;
          resolve();
        },
      });
    });
  }

  private acquireWrite(): Promise<void> {
    if (!this.writer && this.readers === 0 && this.queue.length === 0) {
      this.writer = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({
        kind: "write",
        grant: () => {
          this.writer = true;
          resolve();
        },
      });
    });
  }

  private releaseRead(): void {
    this.readers--;
    this.dispatch();
  }

  private releaseWrite(): void {
    this.writer = false;
    this.dispatch();
  }

  private dispatch(): void {
    while (!this.writer) {
      const next = this.queue[0];
      if (next === undefined) return;
      if (next.kind === "write") {
        if (this.readers > 0) return;
        this.queue.shift();
        next.grant();
        return;
      }
      this.queue.shift();
      next.grant();
    }
  }
}
