import { z } from "zod";
import type { Scheduler } from "../scheduler/types.js";

/** Permits requested or released. */
export const PermitsSchema = z.number().int().nonnegative().safe();

/**
 * Initial semaphore permits. Negative values are allowed: releases must cover
 * the deficit first.
 */
export const InitialPermitsSchema = z.number().int().safe();

export const TimeoutMsSchema = z.number().nonnegative().finite();

export const LatchCountSchema = z.number().int().nonnegative().safe();

// Scheduler is an injected capability; only its shape is checked
const SchedulerSchema = z.custom<Scheduler>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "currentContext" in value &&
    "setTimer" in value &&
    "cancelTimer" in value,
  { message: "Expected a Scheduler" },
);

export const SemaphoreOptionsSchema = z
  .object({
    fair: z.boolean().optional(),
    scheduler: SchedulerSchema.optional(),
  })
  .strict();

export type SemaphoreOptions = z.infer<typeof SemaphoreOptionsSchema>;

export const LatchOptionsSchema = z
  .object({
    scheduler: SchedulerSchema.optional(),
  })
  .strict();

export type LatchOptions = z.infer<typeof LatchOptionsSchema>;
