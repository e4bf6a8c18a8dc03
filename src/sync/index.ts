// Errors
export type { SyncErrorCode } from "./errors.js";
export { SyncError } from "./errors.js";

// Primitives
export { CountDownLatch } from "./count-down-latch.js";
export { DEFAULT_SEMAPHORE_OPTIONS, Semaphore } from "./semaphore.js";

// Waiter plumbing
export type { Waiter } from "./waiter.js";
export { WaiterQueue } from "./waiter-queue.js";
