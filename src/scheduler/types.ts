/** A resumption callback posted to an execution context. */
export type Action = () => void;

/** Result callback of the timed variants: true = satisfied, false = timeout. */
export type ResultAction = (result: boolean) => void;

/**
 * A captured logical execution identity.
 *
 * `runOnContext` must run the action exactly once, asynchronously relative to
 * the call that posted it, on the identity that was captured (even when the
 * post comes from another caller's release/countDown).
 */
export interface ExecutionContext {
  runOnContext(action: Action): void;
}

/** Opaque one-shot timer handle, read only by the scheduler that issued it. */
export type TimerHandle = object;

/**
 * Host event-loop capability injected into every primitive.
 *
 * Contract for timers: `cancelTimer` is idempotent and a no-op for a timer
 * that has already fired. The timeout path and the satisfaction path may both
 * reach the same handle.
 */
export interface Scheduler {
  /** Capture the caller's current context. */
  currentContext(): ExecutionContext;
  setTimer(delayMs: number, callback: Action): TimerHandle;
  cancelTimer(handle: TimerHandle): void;
}
