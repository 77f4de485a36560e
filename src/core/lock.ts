interface Waiter {
  kind: "read" | "write";
  grant: () => void;
}

/**
 * Reader/writer lock for async sections.
 *
 * Readers share the lock; a writer holds it alone. Waiters are served in
 * arrival order, so a queued writer blocks readers that arrive after it.
 */
export class RWLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.readers -= 1;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private acquire(kind: Waiter["kind"]): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(kind)) {
      this.take(kind);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ kind, grant: resolve });
    });
  }

  private canGrant(kind: Waiter["kind"]): boolean {
    if (this.writing) return false;
    return kind === "read" || this.readers === 0;
  }

  private take(kind: Waiter["kind"]): void {
    if (kind === "read") this.readers += 1;
    else this.writing = true;
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.kind)) return;
      this.queue.shift();
      this.take(next.kind);
      next.grant();
      if (next.kind === "write") return;
    }
  }
}
