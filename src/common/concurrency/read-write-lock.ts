type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/**
 * Reader/writer lock for async callers.
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer blocks readers that
 * arrive after it. Acquisition never times out and the lock is not reentrant.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  get readers(): number {
    return this.activeReaders;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  async read<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await task();
    } finally {
      this.release('read');
    }
  }

  async write<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await task();
    } finally {
      this.release('write');
    }
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'write') {
      this.writing = false;
    } else {
      this.activeReaders -= 1;
    }

    while (this.waiters.length > 0 && this.canGrant(this.waiters[0].mode)) {
      const next = this.waiters.shift();
      if (!next) break;
      this.take(next.mode);
      next.grant();
    }
  }

  private canGrant(mode: LockMode): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.activeReaders === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'write') {
      this.writing = true;
    } else {
      this.activeReaders += 1;
    }
  }
}
