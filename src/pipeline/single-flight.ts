/**
 * Keyed single-flight guard.
 *
 * While a task for a key is running, further callers with the same key
 * receive the in-flight promise instead of starting their own. The entry
 * is cleared once the task settles, so the next caller starts fresh.
 */

export class SingleFlight<T> {
  private inFlight = new Map<string, Promise<T>>();

  run(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) return existing;

    // The task starts on a later microtask, after the entry is registered.
    const promise = Promise.resolve()
      .then(task)
      .finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, promise);
    return promise;
  }

  isRunning(key: string): boolean {
    return this.inFlight.has(key);
  }
}
