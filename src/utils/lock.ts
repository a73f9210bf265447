type Release = () => void;

interface Waiter {
  mode: "read" | "write";
  grant: (release: Release) => void;
}

/**
 * Promise-based readers-writer lock. Readers share the lock; a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer is not starved by new readers.
 */
export class ReadWriteLock {
  private activeReaders = 0;

  private writerActive = false;

  private readonly queue: Waiter[] = [];

  async withRead<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire("read");
    try {
      return await task();
    } finally {
      release();
    }
  }

  async withWrite<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire("write");
    try {
      return await task();
    } finally {
      release();
    }
  }

  private acquire(mode: "read" | "write"): Promise<Release> {
    return new Promise<Release>((resolve) => {
      this.queue.push({ mode, grant: resolve });
      this.drain();
    });
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next.mode === "write") {
        if (this.writerActive || this.activeReaders > 0) {
          return;
        }
        this.queue.shift();
        this.writerActive = true;
        next.grant(this.once(() => {
          this.writerActive = false;
        }));
        continue;
      }

      if (this.writerActive) {
        return;
      }
      this.queue.shift();
      this.activeReaders += 1;
      next.grant(this.once(() => {
        this.activeReaders -= 1;
      }));
    }
  }

  private once(onRelease: () => void): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      onRelease();
      this.drain();
    };
  }
}
