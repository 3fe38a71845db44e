/**
 * Helpers for handing a finished sweep to an experiment runner.
 */
import { Effect } from "effect";
import { configError, hashConfig, type ConfigError } from "@hypersweep/core";
import type { ConfigDict } from "./generators.js";

export interface SweepEntry {
  readonly config: ConfigDict;
  /** 0-based repetition index of this config. */
  readonly repetition: number;
}

export interface TaggedConfig {
  /** Order-independent hash of the config; equal configs share an id. */
  readonly id: string;
  readonly config: ConfigDict;
}

/**
 * Run every config `repetitions` times, back to back. Each entry gets its own
 * copy so a runner can mutate it freely.
 */
export function repeatSweep(
  configs: readonly ConfigDict[],
  repetitions: number,
): Effect.Effect<SweepEntry[], ConfigError> {
  if (!Number.isSafeInteger(repetitions) || repetitions < 1) {
    return Effect.fail(configError([`repetitions must be a positive integer, got ${repetitions}`]));
  }
  return Effect.succeed(
    configs.flatMap(config =>
      Array.from({ length: repetitions }, (_, repetition) => ({ config: { ...config }, repetition })),
    ),
  );
}

export function tagSweep(configs: readonly ConfigDict[]): TaggedConfig[] {
  return configs.map(config => ({ id: hashConfig(config), config }));
}
