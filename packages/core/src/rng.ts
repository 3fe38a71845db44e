/**
 * Uniform random source for sweeps: xorshift128+ seeded from one integer,
 * so a sweep replays exactly from its seed.
 */
import type { Rng } from "./interfaces.js";

const WARMUP_ROUNDS = 20;

export class SeededRng implements Rng {
  private _s0 = 0;
  private _s1 = 0;
  private _seed = 0;

  constructor(seed = 42) {
    this.seed(seed);
  }

  seed(s: number): void {
    this._seed = s;
    this._s0 = s;
    this._s1 = s ^ 0xdeadbeef;
    for (let i = 0; i < WARMUP_ROUNDS; i++) this.next();
  }

  /** The seed this generator was last (re)started from. */
  state(): number {
    return this._seed;
  }

  setState(s: number): void {
    this.seed(s);
  }

  next(): number {
    let x = this._s0;
    const y = this._s1;
    this._s0 = y;
    x ^= x << 23;
    x ^= x >>> 17;
    x ^= y ^ (y >>> 26);
    this._s1 = x;
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }
}

/**
 * Uniform pick from a non-empty array. Draws are independent, so the same
 * element can come back on consecutive calls.
 */
export function choice<T>(rng: Rng, items: readonly [T, ...T[]]): T {
  const idx = Math.min(Math.floor(rng.next() * items.length), items.length - 1);
  return items[idx];
}
