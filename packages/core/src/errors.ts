/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class CheckpointError extends Data.TaggedError("CheckpointError")<{
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

export class StateError extends Data.TaggedError("StateError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class DataError extends Data.TaggedError("DataError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class FeederError extends Data.TaggedError("FeederError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class OptimizerError extends Data.TaggedError("OptimizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** A compute step threw while processing a batch. Carries the batch identity for diagnosis. */
export class BatchError extends Data.TaggedError("BatchError")<{
  readonly message: string;
  readonly engine: string;
  readonly batchIds: readonly string[];
  readonly epoch: number;
  readonly iteration: number;
  readonly cause?: unknown;
}> {}

export interface HookFailure {
  readonly hook: string;
  readonly cause: unknown;
}

/** One or more hooks failed while an event was being fired. */
export class HookError extends Data.TaggedError("HookError")<{
  readonly message: string;
  readonly event: string;
  readonly failures: readonly HookFailure[];
}> {}

/** Render an unknown thrown value for log lines and error messages. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  try {
    return JSON.stringify(cause);
  } catch {
    return String(cause);
  }
}
