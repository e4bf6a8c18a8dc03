import type {
  Action,
  ExecutionContext,
  Scheduler,
  TimerHandle,
} from "./types.js";

export const MAIN_CONTEXT = "main";

class ManualContext implements ExecutionContext {
  constructor(
    readonly name: string,
    private readonly scheduler: ManualScheduler,
  ) {}

  runOnContext(action: Action): void {
    this.scheduler.post(this, action);
  }
}

class ManualTimer {
  cancelled = false;
  fired = false;

  constructor(
    readonly seq: number,
    readonly dueAt: number,
    readonly context: ManualContext,
    readonly callback: Action,
  ) {}
}

interface Posted {
  context: ManualContext;
  action: Action;
}

/**
 * Deterministic scheduler for tests.
 *
 * Nothing runs until the test says so: posted actions wait in a single FIFO
 * until runPending()/runAll(), and timers fire only when the virtual clock is
 * moved with advanceBy(). Contexts are identified by name; `activeContext`
 * reports which one the running code is on.
 */
export class ManualScheduler implements Scheduler {
  private readonly contexts = new Map<string, ManualContext>();
  private readonly queue: Posted[] = [];
  private timers: ManualTimer[] = [];
  private timerSeq = 0;
  private clock = 0;
  private current: ManualContext;

  constructor() {
    this.current = this.context(MAIN_CONTEXT);
  }

  /** Name of the context the currently executing code runs on. */
  get activeContext(): string {
    return this.current.name;
  }

  /** Virtual time in ms. */
  get now(): number {
    return this.clock;
  }

  /** Posted actions not yet run. */
  get queued(): number {
    return this.queue.length;
  }

  /** Timers neither fired nor cancelled. */
  get activeTimers(): number {
    return this.timers.filter((t) => !t.cancelled && !t.fired).length;
  }

  currentContext(): ExecutionContext {
    return this.current;
  }

  setTimer(delayMs: number, callback: Action): TimerHandle {
    const timer = new ManualTimer(
      this.timerSeq++,
      this.clock + delayMs,
      this.current,
      callback,
    );
    this.timers.push(timer);
    return timer;
  }

  cancelTimer(handle: TimerHandle): void {
    if (handle instanceof ManualTimer) handle.cancelled = true;
  }

  /** Run `fn` synchronously as if called from the named context. */
  within<T>(name: string, fn: () => T): T {
    return this.enter(this.context(name), fn);
  }

  /**
   * Run the actions that were queued when called, in posting order.
   * Actions they post stay queued. Returns how many ran.
   */
  runPending(): number {
    const batch = this.queue.splice(0, this.queue.length);
    for (const { context, action } of batch) {
      this.enter(context, action);
    }
    return batch.length;
  }

  /** Run until the queue is empty, including actions posted along the way. */
  runAll(limit = 10_000): number {
    let ran = 0;
    while (this.queue.length > 0) {
      if (ran >= limit) {
        throw new Error(`ManualScheduler.runAll exceeded ${limit} actions`);
      }
      ran += this.runPending();
    }
    return ran;
  }

  /**
   * Move the virtual clock forward, firing due timers in due-time order
   * (arming order for equal due times). Posted actions are not run.
   */
  advanceBy(ms: number): void {
    const target = this.clock + ms;
    for (;;) {
      const next = this.nextDue(target);
      if (!next) break;
      this.clock = next.dueAt;
      next.fired = true;
      this.enter(next.context, next.callback);
    }
    this.clock = target;
    this.timers = this.timers.filter((t) => !t.cancelled && !t.fired);
  }

  /** @internal used by contexts */
  post(context: ManualContext, action: Action): void {
    this.queue.push({ context, action });
  }

  private nextDue(target: number): ManualTimer | undefined {
    let next: ManualTimer | undefined;
    for (const t of this.timers) {
      if (t.cancelled || t.fired || t.dueAt > target) continue;
      if (
        !next ||
        t.dueAt < next.dueAt ||
        (t.dueAt === next.dueAt && t.seq < next.seq)
      ) {
        next = t;
      }
    }
    return next;
  }

  private context(name: string): ManualContext {
    let ctx = this.contexts.get(name);
    if (!ctx) {
      ctx = new ManualContext(name, this);
      this.contexts.set(name, ctx);
    }
    return ctx;
  }

  private enter<T>(context: ManualContext, fn: () => T): T {
    const previous = this.current;
    this.current = context;
    try {
      return fn();
    } finally {
      this.current = previous;
    }
  }
}
