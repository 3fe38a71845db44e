/**
 * Effect layers for the sweep runtime.
 *
 * The RNG is the only service a search space needs; the logger and level
 * come from RuntimeConfig.
 */
import { Layer, Logger } from "effect";
import { RngService, SeededRng, type Rng } from "@hypersweep/core";
import type { RuntimeConfig } from "./config.js";
import { prettyLogger, parseLogLevel } from "./logging.js";

// ── RNG Layer ──────────────────────────────────────────────────────────────

export const RngLive = (seed: number) =>
  Layer.sync(RngService, (): Rng => new SeededRng(seed));

export const RngFrom = (rng: Rng) =>
  Layer.succeed(RngService, rng);

// ── Logger Layer ───────────────────────────────────────────────────────────

export const LoggerLive = (logLevel: string) =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(parseLogLevel(logLevel)),
  );

// ── Full runtime ───────────────────────────────────────────────────────────

export const SweepRuntime = (config: RuntimeConfig) =>
  Layer.merge(RngLive(config.seed), LoggerLive(config.logLevel));
