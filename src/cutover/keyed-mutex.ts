/**
 * Per-key mutual exclusion.
 *
 * Each key has a promise chain; acquiring appends to the chain and waits
 * for the previous holder to release. Keys are independent, so locks for
 * different services never contend.
 */

export type Release = () => void;

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Wait for the key and hold it until the returned release is called. */
  async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const tail = previous.then(() => gate);
    this.tails.set(key, tail);
    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (this.tails.get(key) === tail) this.tails.delete(key);
      open();
    };
  }

  /** Hold the key only if nobody else does; null when it is taken. */
  async tryAcquire(key: string): Promise<Release | null> {
    if (this.isLocked(key)) return null;
    return this.acquire(key);
  }
}
