import { AsyncResource } from "node:async_hooks";
import type {
  Action,
  ExecutionContext,
  Scheduler,
  TimerHandle,
} from "./types.js";

/** Largest delay setTimeout honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface NodeSchedulerOpts {
  /** unref() every timer so a pending timed wait never holds the process. */
  unrefTimers?: boolean; // default false
}

/**
 * Context backed by an AsyncResource: the callback re-enters the async scope
 * of whoever captured it, so AsyncLocalStorage state survives the hop.
 */
class AsyncResourceContext implements ExecutionContext {
  private readonly resource = new AsyncResource("loopsync.context");

  runOnContext(action: Action): void {
    setImmediate(() => {
      this.resource.runInAsyncScope(action);
    });
  }
}

/** Holds the chunk currently armed, so cancel works during a long delay. */
class NodeTimer {
  timeout: NodeJS.Timeout | undefined;
}

/**
 * Scheduler for the Node.js event loop.
 * Posts via setImmediate, times via setTimeout/clearTimeout.
 */
export class NodeScheduler implements Scheduler {
  private readonly unrefTimers: boolean;

  constructor(opts: NodeSchedulerOpts = {}) {
    this.unrefTimers = opts.unrefTimers ?? false;
  }

  currentContext(): ExecutionContext {
    return new AsyncResourceContext();
  }

  /**
   * Delays above MAX_TIMER_DELAY_MS are split into chunks, re-armed until the
   * full delay has passed.
   */
  setTimer(delayMs: number, callback: Action): TimerHandle {
    const timer = new NodeTimer();
    const arm = (remaining: number): void => {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      timer.timeout = setTimeout(() => {
        if (remaining > chunk) {
          arm(remaining - chunk);
        } else {
          callback();
        }
      }, chunk);
      if (this.unrefTimers) timer.timeout.unref();
    };
    arm(delayMs);
    return timer;
  }

  cancelTimer(handle: TimerHandle): void {
    // clearTimeout is a no-op for fired or cleared timers
    if (handle instanceof NodeTimer) clearTimeout(handle.timeout);
  }
}

let shared: NodeScheduler | undefined;

/** Lazily created scheduler used when no scheduler option is given. */
export function defaultScheduler(): Scheduler {
  shared ??= new NodeScheduler();
  return shared;
}
