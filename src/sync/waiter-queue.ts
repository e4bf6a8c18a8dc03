import type { Waiter } from "./waiter.js";

/**
 * Pending-acquire collection of a Semaphore.
 *
 * Ordering:
 *   fair   → strict FIFO by arrival
 *   unfair → ascending permits; equal sizes keep arrival order
 *
 * The head (`peek`) is always the next waiter release() should consider.
 */
export class WaiterQueue implements Iterable<Waiter> {
  private readonly items: Waiter[] = [];

  constructor(readonly fair: boolean) {}

  get size(): number {
    return this.items.length;
  }

  offer(waiter: Waiter): void {
    if (this.fair) {
      this.items.push(waiter);
      return;
    }
    // Upper bound: first index whose permits exceed the new request
    let lo = 0;
    let hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.items[mid].permits <= waiter.permits) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    this.items.splice(lo, 0, waiter);
  }

  peek(): Waiter | undefined {
    return this.items[0];
  }

  poll(): Waiter | undefined {
    return this.items.shift();
  }

  /** Returns false if the waiter was not queued (already polled or removed). */
  remove(waiter: Waiter): boolean {
    const index = this.items.indexOf(waiter);
    if (index === -1) return false;
    this.items.splice(index, 1);
    return true;
  }

  [Symbol.iterator](): Iterator<Waiter> {
    return this.items[Symbol.iterator]();
  }
}
