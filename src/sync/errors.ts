import type { z } from "zod";

// negative permits/timeout, fractional count, bad options
export type SyncErrorCode = "INVALID_ARGUMENT";

export class SyncError extends Error {
  constructor(
    public readonly code: SyncErrorCode,
    message: string,
    public readonly details?: {
      argument?: string;
      value?: unknown;
    },
  ) {
    super(message);
    this.name = "SyncError";
  }
}

/**
 * Parse `value` with `schema`, throwing INVALID_ARGUMENT at the call site on
 * failure. Nothing is deferred into a callback.
 */
export function validateArgument<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  argument: string,
): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((i) => i.message).join("; ");
    throw new SyncError(
      "INVALID_ARGUMENT",
      `Invalid ${argument} (${String(value)}): ${reason}`,
      { argument, value },
    );
  }
  return parsed.data;
}
