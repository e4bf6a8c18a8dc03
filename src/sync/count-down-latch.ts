import { defaultScheduler } from "../scheduler/node-scheduler.js";
import type { Action, ResultAction, Scheduler } from "../scheduler/types.js";
import {
  LatchCountSchema,
  type LatchOptions,
  LatchOptionsSchema,
  TimeoutMsSchema,
} from "../schemas/arguments.js";
import { SyncError, validateArgument } from "./errors.js";
import { armTimeout, createWaiter, satisfy, type Waiter } from "./waiter.js";

/**
 * One-shot gate that opens when its count reaches zero.
 *
 * Zero is absorbing: the countDown() that takes the count from 1 to 0 posts
 * every registered waiter once (each on its own context) and the collection
 * stays empty from then on. Later awaits are posted immediately.
 *
 * Waiters have no relative order.
 */
export class CountDownLatch {
  private count: number;
  private readonly scheduler: Scheduler;
  private readonly waiters = new Set<Waiter>();

  constructor(initialCount: number, options?: LatchOptions) {
    this.count = validateArgument(
      LatchCountSchema,
      initialCount,
      "initialCount",
    );
    const opts = validateArgument(LatchOptionsSchema, options ?? {}, "options");
    this.scheduler = opts.scheduler ?? defaultScheduler();
  }

  countDown(): void {
    if (this.count === 0) {
      console.debug("[latch] countDown() on an open latch ignored");
      return;
    }
    this.count--;
    if (this.count > 0) return;

    const released = [...this.waiters];
    this.waiters.clear();
    for (const waiter of released) {
      satisfy(this.scheduler, waiter);
    }
  }

  /**
   * Post `action` on the caller's context once the count is zero.
   *
   * With `timeoutMs`, posts exactly one of resultAction(true) (opened) or
   * resultAction(false) (timed out first).
   */
  await(action: Action): void;
  await(timeoutMs: number, resultAction: ResultAction): void;
  await(actionOrTimeout: Action | number, resultAction?: ResultAction): void {
    if (typeof actionOrTimeout === "number") {
      const timeoutMs = validateArgument(
        TimeoutMsSchema,
        actionOrTimeout,
        "timeoutMs",
      );
      if (typeof resultAction !== "function") {
        throw new SyncError(
          "INVALID_ARGUMENT",
          "resultAction must be a function",
          { argument: "resultAction", value: resultAction },
        );
      }
      this.awaitWithTimeout(timeoutMs, resultAction);
      return;
    }
    if (typeof actionOrTimeout !== "function") {
      throw new SyncError("INVALID_ARGUMENT", "action must be a function", {
        argument: "action",
        value: actionOrTimeout,
      });
    }

    if (this.count === 0) {
      this.scheduler.currentContext().runOnContext(actionOrTimeout);
      return;
    }
    this.waiters.add(createWaiter(this.scheduler, 0, actionOrTimeout));
  }

  getCount(): number {
    return this.count;
  }

  /**
   * Resolves when open; with `timeoutMs`, resolves false if it stays closed
   * that long.
   */
  awaitAsync(): Promise<void>;
  awaitAsync(timeoutMs: number): Promise<boolean>;
  awaitAsync(timeoutMs?: number): Promise<void> | Promise<boolean> {
    if (timeoutMs === undefined) {
      return new Promise<void>((resolve) => {
        this.await(() => resolve());
      });
    }
    validateArgument(TimeoutMsSchema, timeoutMs, "timeoutMs");
    return new Promise<boolean>((resolve) => {
      this.await(timeoutMs, resolve);
    });
  }

  private awaitWithTimeout(
    timeoutMs: number,
    resultAction: ResultAction,
  ): void {
    if (this.count === 0) {
      this.scheduler.currentContext().runOnContext(() => resultAction(true));
      return;
    }

    const waiter = createWaiter(this.scheduler, 0, () => resultAction(true));
    this.waiters.add(waiter);
    armTimeout(
      this.scheduler,
      waiter,
      timeoutMs,
      (w) => this.removeExpired(w, timeoutMs),
      () => resultAction(false),
    );
  }

  private removeExpired(waiter: Waiter, timeoutMs: number): boolean {
    if (!this.waiters.delete(waiter)) return false;
    console.debug(
      `[latch] waiter ${waiter.id} timed out after ${timeoutMs}ms ` +
        `(count=${this.count})`,
    );
    return true;
  }
}
