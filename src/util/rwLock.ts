// src/util/rwLock.ts
// What: Async readers-writer lock.
// How: Readers share the lock while no writer holds or waits for it; writers are exclusive. Waiters are granted
//      in arrival order, so a queued writer is not starved by a stream of new readers.

interface Waiter {
  exclusive: boolean;
  grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.release(false);
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.release(true);
    }
  }

  get state(): { readers: number; writing: boolean; waiting: number } {
    return { readers: this.readers, writing: this.writing, waiting: this.queue.length };
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(exclusive)) {
      this.take(exclusive);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ exclusive, grant: resolve });
    });
  }

  private canGrant(exclusive: boolean): boolean {
    return exclusive ? !this.writing && this.readers === 0 : !this.writing;
  }

  private take(exclusive: boolean): void {
    if (exclusive) this.writing = true;
    else this.readers += 1;
  }

  private release(exclusive: boolean): void {
    if (exclusive) this.writing = false;
    else this.readers -= 1;

    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!next || !this.canGrant(next.exclusive)) break;
      this.queue.shift();
      this.take(next.exclusive);
      next.grant();
      if (next.exclusive) break;
    }
  }
}
