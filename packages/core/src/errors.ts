/**
 * Typed error classes for the sweep library.
 */
import { Data } from "effect";

/** Invalid search space or invalid search request. Carries every problem found. */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly problems: readonly string[];
  readonly cause?: unknown;
}> {}

/** A factory generator threw while a value was being sampled. */
export class GeneratorError extends Data.TaggedError("GeneratorError")<{
  readonly message: string;
  readonly hyperparameter: string;
  readonly cause?: unknown;
}> {}

/** Internal bookkeeping went wrong. Raised as a defect, never recovered. */
export class InvariantError extends Data.TaggedError("InvariantError")<{
  readonly message: string;
}> {}

export function configError(problems: readonly string[], cause?: unknown): ConfigError {
  return new ConfigError({ message: problems.join("; "), problems, cause });
}

export function errorMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
