export {
  InitialPermitsSchema,
  type LatchOptions,
  LatchCountSchema,
  LatchOptionsSchema,
  PermitsSchema,
  type SemaphoreOptions,
  SemaphoreOptionsSchema,
  TimeoutMsSchema,
} from "./arguments.js";
