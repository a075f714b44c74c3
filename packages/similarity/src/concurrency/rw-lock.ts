/**
 * FILE PURPOSE: Promise-based reader/writer lock and mutex
 *
 * WHY: Concurrent check requests share one index. Queries may overlap each
 *      other but never a mutation; mutations are rare so writers go first.
 * HOW: Waiting writers block new readers. On release, a waiting writer is
 *      admitted before any queued reader; when no writer waits, every
 *      queued reader is admitted together. Never hold a lock across
 *      network I/O.
 */

type Waiter = () => void;

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly readQueue: Waiter[] = [];
  private readonly writeQueue: Waiter[] = [];

  /** Run `fn` with shared access. */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  /** Run `fn` with exclusive access. */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  get state(): { readers: number; writer: boolean; waitingReaders: number; waitingWriters: number } {
    return {
      readers: this.activeReaders,
      writer: this.writerActive,
      waitingReaders: this.readQueue.length,
      waitingWriters: this.writeQueue.length,
    };
  }

  private acquireRead(): Promise<void> {
    if (!this.writerActive && this.writeQueue.length === 0) {
      this.activeReaders++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.readQueue.push(() => {
        this.activeReaders++;
        resolve();
      });
    });
  }

  private acquireWrite(): Promise<void> {
    if (!this.writerActive && this.activeReaders === 0) {
      this.writerActive = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.writeQueue.push(() => {
        this.writerActive = true;
        resolve();
      });
    });
  }

  private releaseRead(): void {
    this.activeReaders--;
    if (this.activeReaders === 0) this.dispatch();
  }

  private releaseWrite(): void {
    this.writerActive = false;
    this.dispatch();
  }

  private dispatch(): void {
    if (this.writerActive || this.activeReaders > 0) return;
    const writer = this.writeQueue.shift();
    if (writer) {
      writer();
      return;
    }
    const readers = this.readQueue.splice(0);
    for (const reader of readers) reader();
  }
}

/** FIFO mutual exclusion. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
