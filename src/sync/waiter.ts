import { ulid } from "ulid";
import type {
  Action,
  ExecutionContext,
  Scheduler,
  TimerHandle,
} from "../scheduler/types.js";

/**
 * A parked acquire/await request.
 *
 * Ownership rule: whoever removes the waiter from its collection decides the
 * outcome. Satisfaction and timeout both start with that removal; the loser
 * finds the waiter gone and does nothing.
 */
export interface Waiter {
  readonly id: string;
  readonly permits: number; // 0 for latch waiters
  /** Captured when the request was made; every outcome is posted here. */
  readonly context: ExecutionContext;
  readonly onSatisfied: Action;
  timer?: TimerHandle;
}

export function createWaiter(
  scheduler: Scheduler,
  permits: number,
  onSatisfied: Action,
): Waiter {
  return {
    id: ulid(),
    permits,
    context: scheduler.currentContext(),
    onSatisfied,
  };
}

/**
 * Satisfaction path. Call only after removing the waiter from its collection.
 * Cancels the pending timer (exactly once, here) and posts the action.
 */
export function satisfy(scheduler: Scheduler, waiter: Waiter): void {
  if (waiter.timer) {
    scheduler.cancelTimer(waiter.timer);
    waiter.timer = undefined;
  }
  waiter.context.runOnContext(waiter.onSatisfied);
}

/**
 * Timeout path. `tryRemove` must return true only if this call took the
 * waiter out of its collection; then `onExpired` is posted on the waiter's
 * context.
 */
export function armTimeout(
  scheduler: Scheduler,
  waiter: Waiter,
  timeoutMs: number,
  tryRemove: (waiter: Waiter) => boolean,
  onExpired: Action,
): void {
  waiter.timer = scheduler.setTimer(timeoutMs, () => {
    waiter.timer = undefined;
    if (tryRemove(waiter)) {
      waiter.context.runOnContext(onExpired);
    }
  });
}
