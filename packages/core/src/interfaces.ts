/**
 * Ports. The random source is supplied from outside the library.
 */
import { Context } from "effect";

// ── Rng ────────────────────────────────────────────────────────────────────
export interface Rng {
  /** Uniform number in [0, 1). */
  next(): number;
  state(): number;
  setState(s: number): void;
  seed(s: number): void;
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}
