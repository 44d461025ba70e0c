type Waiter = () => void;

/**
 * Writer-preferring async reader-writer lock.
 *
 * Any number of readers hold the lock together. A writer waits for in-flight readers to
 * drain and, while queued or active, blocks new readers. When a write completes the
 * readers that queued behind it are released before the next writer.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly waitingWriters: Waiter[] = [];
  private waitingReaders: Waiter[] = [];

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  get state(): { readers: number; writing: boolean; queuedReaders: number; queuedWriters: number } {
    return {
      readers: this.activeReaders,
      writing: this.writerActive,
      queuedReaders: this.waitingReaders.length,
      queuedWriters: this.waitingWriters.length,
    };
  }

  private acquireRead(): Promise<void> {
    if (!this.writerActive && this.waitingWriters.length === 0) {
      this.activeReaders++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waitingReaders.push(() => {
        this.activeReaders++;
        resolve();
      });
    });
  }

  private acquireWrite(): Promise<void> {
    if (!this.writerActive && this.activeReaders === 0 && this.waitingWriters.length === 0) {
      this.writerActive = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waitingWriters.push(() => {
        this.writerActive = true;
        resolve();
      });
    });
  }

  private releaseRead(): void {
    this.activeReaders--;
    if (this.activeReaders === 0) {
      this.dispatch(false);
    }
  }

  private releaseWrite(): void {
    this.writerActive = false;
    this.dispatch(true);
  }

  private dispatch(preferReaders: boolean): void {
    if (this.writerActive || this.activeReaders > 0) {
      return;
    }

    if (preferReaders && this.waitingReaders.length > 0) {
      const readers = this.waitingReaders;
      this.waitingReaders = [];
      readers.forEach((wake) => wake());
      return;
    }

    const writer = this.waitingWriters.shift();
    if (writer) {
      writer();
      return;
    }

    const readers = this.waitingReaders;
    this.waitingReaders = [];
    readers.forEach((wake) => wake());
  }
}
