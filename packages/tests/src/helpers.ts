import { Effect, Layer, Logger } from "effect";
import type { Rng, RngService } from "@hypersweep/core";
import { RngFrom } from "@hypersweep/effect-runtime";

/** Rng that replays a fixed list of uniforms, cycling when it runs out. */
export class ScriptedRng implements Rng {
  private _i = 0;
  constructor(private readonly _values: readonly number[]) {}

  next(): number {
    const v = this._values[this._i % this._values.length];
    this._i++;
    return v;
  }
  state(): number { return this._i; }
  setState(s: number): void { this._i = s; }
  seed(s: number): void { this._i = s; }
}

function text(message: unknown): string {
  return Array.isArray(message) ? message.map(String).join(" ") : String(message);
}

/** Run an effect with a scripted rng; logs are collected as "LEVEL:message". */
export function runWith<A, E>(
  effect: Effect.Effect<A, E, RngService>,
  uniforms: readonly number[] = [0],
): { value: A; logs: string[] } {
  const logs: string[] = [];
  const capture = Logger.make(({ logLevel, message }) => {
    logs.push(`${logLevel.label}:${text(message)}`);
  });
  const layer = Layer.merge(
    RngFrom(new ScriptedRng(uniforms)),
    Logger.replace(Logger.defaultLogger, capture),
  );
  const value = Effect.runSync(Effect.provide(effect, layer));
  return { value, logs };
}

export function failureOf<A, E>(
  effect: Effect.Effect<A, E, RngService>,
  uniforms: readonly number[] = [0],
): E {
  return runWith(Effect.flip(effect), uniforms).value;
}
