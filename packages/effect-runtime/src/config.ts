/**
 * RuntimeConfig type, defaults and validation.
 */
import { Effect } from "effect";
import { configError, type ConfigError } from "@hypersweep/core";
import { LOG_LEVELS } from "./logging.js";

export interface RuntimeConfig {
  /** Seed for the sweep RNG; the same seed replays the same random draws. */
  readonly seed: number;
  readonly logLevel: string;
}

export const defaultRuntimeConfig: RuntimeConfig = {
  seed: 42,
  logLevel: "info",
};

/** Merge partial overrides with defaults and validate the result. */
export function resolveRuntimeConfig(
  overrides: Partial<RuntimeConfig> = {},
): Effect.Effect<RuntimeConfig, ConfigError> {
  const config = { ...defaultRuntimeConfig, ...overrides };
  return Effect.as(validateRuntimeConfig(config), config);
}

export function validateRuntimeConfig(config: RuntimeConfig): Effect.Effect<void, ConfigError> {
  const problems: string[] = [];
  if (!Number.isSafeInteger(config.seed)) {
    problems.push(`seed must be a safe integer, got ${config.seed}`);
  }
  const known: readonly string[] = LOG_LEVELS;
  if (!known.includes(config.logLevel.toLowerCase())) {
    problems.push(`logLevel must be one of ${LOG_LEVELS.join(", ")}, got "${config.logLevel}"`);
  }
  return problems.length > 0 ? Effect.fail(configError(problems)) : Effect.void;
}
