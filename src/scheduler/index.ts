// Contracts
export type {
  Action,
  ExecutionContext,
  ResultAction,
  Scheduler,
  TimerHandle,
} from "./types.js";

// Node event loop
export type { NodeSchedulerOpts } from "./node-scheduler.js";
export {
  defaultScheduler,
  MAX_TIMER_DELAY_MS,
  NodeScheduler,
} from "./node-scheduler.js";

// Deterministic
export { MAIN_CONTEXT, ManualScheduler } from "./manual-scheduler.js";
