/**
 * Coalesces concurrent loads of the same key: while a load for a key is running,
 * later callers get the same promise instead of starting another one.
 */
export class SharedRequests<M extends object> {
  private readonly running: { [K in keyof M]?: Promise<M[K]> } = {};

  /** Number of keys with a load in progress. */
  get size(): number {
    return Object.keys(this.running).length;
  }

  isRunning<K extends keyof M>(key: K): boolean {
    return this.running[key] !== undefined;
  }

  /** Join the running load for `key`, or start one with `load`. */
  run<K extends keyof M>(key: K, load: () => Promise<M[K]>): Promise<M[K]> {
    const existing = this.running[key];
    if (existing) return existing;

    const started = load().finally(() => {
      if (this.running[key] === started) delete this.running[key];
    });
    this.running[key] = started;
    return started;
  }
}

export default SharedRequests;
