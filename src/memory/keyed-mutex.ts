// =============================================================================
// KeyedMutex — Per-key promise chain serializing async critical sections
// =============================================================================

/**
 * Callers sharing a key run one at a time in arrival order; different keys
 * never wait on each other. Idle keys hold no entry.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previousTail = this.tails.get(key) ?? Promise.resolve();

    let release = () => {};
    const currentGate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const currentTail = previousTail.then(() => currentGate);
    this.tails.set(key, currentTail);

    await previousTail;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === currentTail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with a holder or waiters */
  get activeKeys(): number {
    return this.tails.size;
  }
}
