/**
 * Counting semaphore capping concurrent handler invocations.
 * Waiters are served first come, first served.
 */
export class InFlightGate {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`In-flight limit must be a positive integer (got ${limit})`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a free slot. Returns a release function; calling it more than once is a no-op.
   */
  async acquire(): Promise<() => void> {
    if (this.active < this.limit) {
      this.active += 1;
    } else {
      // The releasing caller hands its slot over, so `active` stays unchanged.
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.active -= 1;
      }
    };
  }
}

export default InFlightGate;
