/**
 * Promise-chain mutex. Every read-modify-write of a persona's state goes
 * through runExclusive() so ticks and conversation turns never interleave.
 */
export class StateLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending += 1;

    await previous;
    try {
      return await operation();
    } finally {
      this.pending -= 1;
      release();
    }
  }

  isLocked(): boolean {
    return this.pending > 0;
  }

  getStatus(): { pending: number } {
    return { pending: this.pending };
  }
}
