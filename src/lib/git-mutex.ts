/**
 * FIFO queue that keeps git invocations from this process strictly one at a time.
 *
 * Only in-process callers are ordered; other processes touching the same
 * repository are not coordinated.
 */
export class GitMutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private running = false;

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.waiting++;
    await previous;
    this.waiting--;
    this.running = true;
    try {
      return await fn();
    } finally {
      this.running = false;
      release();
    }
  }

  /** Callers queued behind the one currently running. */
  get pending(): number {
    return this.waiting;
  }

  get isLocked(): boolean {
    return this.running || this.waiting > 0;
  }
}

const defaultMutex = new GitMutex();
export default defaultMutex;
