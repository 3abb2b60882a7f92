/**
 * Promise-based mutex for serializing async critical sections within one
 * process. Waiters are served in arrival order.
 * @public
 */
export class Mutex {
  private queue: Array<() => void> = [];
  private locked = false;

  /**
   * Resolves with a release function once the lock is held.
   */
  public async acquire(): Promise<() => void> {
    return new Promise<() => void>((resolve) => {
      const tryAcquire = (): void => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  public get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Runs `fn` while holding the lock, releasing it whether `fn` resolves or throws.
   */
  public async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    this.locked = false;
    this.queue.shift()?.();
  }
}
