import { DatabaseHandle, DatabaseLease } from "./database-handle";

/**
 * Holds the generation lookups should use.
 *
 * Readers take a lease per lookup and never keep one across requests; the
 * update scheduler is the only writer. `swap` is a single assignment, so a
 * reader sees either the old or the new handle, never anything between.
 */
export class ActiveDatabase {
  private current: DatabaseHandle | null = null;

  /**
   * Lease the current generation, or null before the first activation.
   */
  acquire(): DatabaseLease | null {
    return this.current ? this.current.acquire() : null;
  }

  get handle(): DatabaseHandle | null {
    return this.current;
  }

  /**
   * Make `next` current and hand back the previous handle, which the caller
   * retires.
   */
  swap(next: DatabaseHandle): DatabaseHandle | null {
    const previous = this.current;
    this.current = next;
    return previous;
  }

  /**
   * Empty the slot (shutdown) and retire whatever was active.
   */
  async clear(): Promise<void> {
    const previous = this.current;
    this.current = null;
    if (previous) {
      previous.retire();
      await previous.whenDisposed();
    }
  }
}
