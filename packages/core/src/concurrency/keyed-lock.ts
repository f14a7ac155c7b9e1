/**
 * Serializes async operations that share a key.
 *
 * Operations under the same key run one after another in call order;
 * different keys never wait for each other. A rejected operation does not
 * block the ones queued behind it.
 * @public
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  public run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(operation);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Whether an operation for `key` is running or queued. */
  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
