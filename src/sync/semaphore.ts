import { defaultScheduler } from "../scheduler/node-scheduler.js";
import type { Action, ResultAction, Scheduler } from "../scheduler/types.js";
import {
  InitialPermitsSchema,
  PermitsSchema,
  type SemaphoreOptions,
  SemaphoreOptionsSchema,
  TimeoutMsSchema,
} from "../schemas/arguments.js";
import { SyncError, validateArgument } from "./errors.js";
import { armTimeout, createWaiter, satisfy, type Waiter } from "./waiter.js";
import { WaiterQueue } from "./waiter-queue.js";

export const DEFAULT_SEMAPHORE_OPTIONS: Readonly<{ fair: boolean }> = {
  fair: false,
};

/**
 * Counting semaphore for callback-driven code. Nothing blocks: a request that
 * cannot be granted is parked as a Waiter and its action is posted later, on
 * the context that made the request.
 *
 * No action ever runs inside a semaphore call. Immediate grants are posted too.
 *
 * Fairness:
 *   fair   → waiters are granted strictly in arrival order; acquire() queues
 *            behind existing waiters even when enough permits are free
 *   unfair → the smallest outstanding request is granted first
 *
 * tryAcquire(permits) barges in both modes.
 */
export class Semaphore {
  private availablePermits: number;
  private readonly fair: boolean;
  private readonly scheduler: Scheduler;
  private readonly pending: WaiterQueue;

  constructor(initialPermits: number, options?: boolean | SemaphoreOptions) {
    this.availablePermits = validateArgument(
      InitialPermitsSchema,
      initialPermits,
      "initialPermits",
    );
    const opts: SemaphoreOptions =
      typeof options === "boolean"
        ? { fair: options }
        : validateArgument(SemaphoreOptionsSchema, options ?? {}, "options");
    this.fair = opts.fair ?? DEFAULT_SEMAPHORE_OPTIONS.fair;
    this.scheduler = opts.scheduler ?? defaultScheduler();
    this.pending = new WaiterQueue(this.fair);
  }

  /**
   * Request permits; `action` is posted on the caller's context once they are
   * granted. Returns immediately either way.
   */
  acquire(action: Action): void;
  acquire(permits: number, action: Action): void;
  acquire(permitsOrAction: number | Action, maybeAction?: Action): void {
    let permits = 1;
    let action: Action | undefined;
    if (typeof permitsOrAction === "function") {
      action = permitsOrAction;
    } else {
      permits = permitsOrAction;
      action = maybeAction;
    }
    this.checkPermits(permits);
    const onGranted = requireCallback(action, "action");

    if (this.canGrant(permits)) {
      this.availablePermits -= permits;
      this.scheduler.currentContext().runOnContext(onGranted);
      return;
    }
    this.pending.offer(createWaiter(this.scheduler, permits, onGranted));
  }

  /**
   * Barging, synchronous attempt. Takes the permits and returns true iff they
   * are available right now; never queues.
   *
   * With `action`, also posts it on the caller's context on success.
   *
   * With `timeoutMs` and `resultAction`, queues like acquire() and posts
   * exactly one of resultAction(true) (granted) or resultAction(false)
   * (timed out).
   */
  tryAcquire(permits?: number): boolean;
  tryAcquire(permits: number, action: Action): boolean;
  tryAcquire(
    permits: number,
    timeoutMs: number,
    resultAction: ResultAction,
  ): void;
  tryAcquire(
    permits = 1,
    actionOrTimeout?: Action | number,
    resultAction?: ResultAction,
  ): boolean | undefined {
    this.checkPermits(permits);

    if (typeof actionOrTimeout === "number") {
      this.tryAcquireWithTimeout(
        permits,
        actionOrTimeout,
        requireCallback(resultAction, "resultAction"),
      );
      return undefined;
    }

    const action =
      actionOrTimeout === undefined
        ? undefined
        : requireCallback(actionOrTimeout, "action");
    if (permits > this.availablePermits) return false;
    this.availablePermits -= permits;
    if (action) this.scheduler.currentContext().runOnContext(action);
    return true;
  }

  /**
   * Return permits, then grant queued waiters from the head while the head
   * fits. Stops at the first one that does not.
   */
  release(permits = 1): void {
    this.checkPermits(permits);
    this.availablePermits += permits;
    this.grantQueued();
  }

  /**
   * Take every available permit. Returns the prior count (may be negative).
   * Waiters are untouched.
   */
  drainPermits(): number {
    const drained = this.availablePermits;
    this.availablePermits = 0;
    return drained;
  }

  getAvailablePermits(): number {
    return this.availablePermits;
  }

  getQueueLength(): number {
    return this.pending.size;
  }

  isFair(): boolean {
    return this.fair;
  }

  // Promise conveniences

  /** Resolves once granted. Invalid permits throw synchronously. */
  acquireAsync(permits = 1): Promise<void> {
    this.checkPermits(permits);
    return new Promise((resolve) => {
      this.acquire(permits, () => resolve());
    });
  }

  /** Resolves true if granted within `timeoutMs`, false otherwise. */
  tryAcquireAsync(permits: number, timeoutMs: number): Promise<boolean> {
    this.checkPermits(permits);
    validateArgument(TimeoutMsSchema, timeoutMs, "timeoutMs");
    return new Promise((resolve) => {
      this.tryAcquire(permits, timeoutMs, resolve);
    });
  }

  /** Acquire, run `fn`, and release in finally. */
  withPermits<T>(permits: number, fn: () => Promise<T> | T): Promise<T> {
    return this.acquireAsync(permits).then(async () => {
      try {
        return await fn();
      } finally {
        this.release(permits);
      }
    });
  }

  private tryAcquireWithTimeout(
    permits: number,
    timeoutMs: number,
    resultAction: ResultAction,
  ): void {
    validateArgument(TimeoutMsSchema, timeoutMs, "timeoutMs");

    if (this.canGrant(permits)) {
      this.availablePermits -= permits;
      this.scheduler.currentContext().runOnContext(() => resultAction(true));
      return;
    }

    const waiter = createWaiter(this.scheduler, permits, () =>
      resultAction(true),
    );
    this.pending.offer(waiter);
    armTimeout(
      this.scheduler,
      waiter,
      timeoutMs,
      (w: Waiter) => this.removeExpired(w, timeoutMs),
      () => resultAction(false),
    );
  }

  private grantQueued(): void {
    let head = this.pending.peek();
    while (head && head.permits <= this.availablePermits) {
      this.pending.poll();
      this.availablePermits -= head.permits;
      satisfy(this.scheduler, head);
      head = this.pending.peek();
    }
  }

  private removeExpired(waiter: Waiter, timeoutMs: number): boolean {
    if (!this.pending.remove(waiter)) return false;
    console.debug(
      `[semaphore] waiter ${waiter.id} timed out after ${timeoutMs}ms ` +
        `(requested=${waiter.permits} available=${this.availablePermits})`,
    );
    // A fair queue may have been held back only by the expired head
    this.grantQueued();
    return true;
  }

  private canGrant(permits: number): boolean {
    if (permits > this.availablePermits) return false;
    return !this.fair || this.pending.size === 0;
  }

  private checkPermits(permits: number): void {
    validateArgument(PermitsSchema, permits, "permits");
  }
}

function requireCallback<F extends (...args: never[]) => void>(
  fn: F | undefined,
  argument: string,
): F {
  if (typeof fn !== "function") {
    throw new SyncError("INVALID_ARGUMENT", `${argument} must be a function`, {
      argument,
      value: fn,
    });
  }
  return fn;
}
