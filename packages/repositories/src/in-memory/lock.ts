// Readers-writer lock for in-memory stores
//
// Readers share the lock; a writer holds it alone. Waiting writers block new
// readers so a steady read load cannot starve them.

type Waiter = {
  kind: 'read' | 'write';
  resolve: () => void;
};

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  /**
   * Run `fn` holding a shared read lock.
   */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  /**
   * Run `fn` holding the exclusive write lock.
   */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  private canGrant(kind: Waiter['kind']): boolean {
    if (kind === 'write') return !this.writing && this.readers === 0;
    return !this.writing && !this.queue.some((w) => w.kind === 'write');
  }

  private acquire(kind: Waiter['kind']): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(kind)) {
      this.grant(kind);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ kind, resolve });
    });
  }

  private grant(kind: Waiter['kind']): void {
    if (kind === 'write') {
      this.writing = true;
    } else {
      this.readers++;
    }
  }

  private release(kind: Waiter['kind']): void {
    if (kind === 'write') {
      this.writing = false;
    } else {
      this.readers--;
    }
    this.drain();
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next.kind === 'write') {
        if (this.writing || this.readers > 0) return;
        this.queue.shift();
        this.grant('write');
        next.resolve();
        return;
      }
      if (this.writing) return;
      this.queue.shift();
      this.grant('read');
      next.resolve();
    }
  }
}
