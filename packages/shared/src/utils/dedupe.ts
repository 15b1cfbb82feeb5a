/**
 * RequestDeduplicator
 *
 * Shares one pending promise between concurrent callers of the same key
 * (single-flight). The entry is dropped as soon as the promise settles, so a
 * failed call is never remembered and the next caller starts a fresh one.
 */
export class RequestDeduplicator<T> {
  private pendingRequests = new Map<string, Promise<T>>();

  /**
   * Run `fetcher` for `key` unless a call for the same key is already pending,
   * in which case the pending promise is returned instead.
   */
  run(key: string, fetcher: () => Promise<T>): Promise<T> {
    const existing = this.pendingRequests.get(key);
    if (existing) {
      return existing;
    }

    const promise = fetcher()
      .then((result) => {
        this.pendingRequests.delete(key);
        return result;
      })
      .catch((error: unknown) => {
        this.pendingRequests.delete(key);
        throw error;
      });

    this.pendingRequests.set(key, promise);
    return promise;
  }

  /**
   * The promise pending for `key`, if any.
   */
  pending(key: string): Promise<T> | undefined {
    return this.pendingRequests.get(key);
  }

  isPending(key: string): boolean {
    return this.pendingRequests.has(key);
  }

  get pendingCount(): number {
    return this.pendingRequests.size;
  }
}
