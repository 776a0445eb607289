/**
 * Per-route hit counters, owned by a single Dispatcher.
 *
 * Node runs every call below to completion on the event loop, so the
 * create-if-absent and the add happen in one critical section: concurrent
 * requests for a new key can neither create two counters nor lose a hit.
 * Nothing here awaits, and nothing here is held across a sink call.
 */
export class CounterTable {
  private readonly counters = new Map<string, number>();

  /**
   * Add one hit for `key`, creating its counter at zero first if needed
   * @returns the counter's new value
   */
  increment(key: string): number {
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next);
    return next;
  }

  get(key: string): number | undefined {
    return this.counters.get(key);
  }

  has(key: string): boolean {
    return this.counters.has(key);
  }

  get size(): number {
    return this.counters.size;
  }

  /**
   * Point-in-time copy of every counter
   */
  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }
}
