/**
 * Hyperparameter generators.
 *
 * A generator says how a hyperparameter's value is produced:
 *   - FixedValue: the value itself (it is also the default)
 *   - Candidates: a uniform random pick from a list (the first entry is the default)
 *   - Factory: a zero-argument function called for every value (no default)
 *
 * Callers may write generators loosely (an array, a function, a plain value);
 * `toGenerator` turns that into the tagged form once, at the boundary.
 */
import { Array as Arr, Effect, Predicate } from "effect";
import { GeneratorError, RngService, choice, errorMessage } from "@hypersweep/core";

export type HyperValue = unknown;

/**
 * One sampled configuration: hyperparameter name → chosen value.
 *
 * Keys follow the space's insertion order, except integer-like names
 * (`"2"`, `"10"`): JavaScript objects always list those first, in ascending
 * numeric order. Use `ConfigSpace.names` when the declared order matters.
 */
export type ConfigDict = Record<string, HyperValue>;

export interface FixedValue {
  readonly _tag: "FixedValue";
  readonly value: HyperValue;
}

export interface Candidates {
  readonly _tag: "Candidates";
  readonly values: readonly HyperValue[];
}

export interface Factory {
  readonly _tag: "Factory";
  readonly make: () => HyperValue;
  /** Declared parameter count of the user's function, when `make` wraps it. */
  readonly arity?: number;
}

export type Generator = FixedValue | Candidates | Factory;

/** A tagged generator, or the loose shorthand for one. */
export type GeneratorInput = Generator | readonly HyperValue[] | (() => HyperValue) | HyperValue;

export type NamedInputs<V> = ReadonlyMap<string, V> | Readonly<Record<string, V>>;

// ── Constructors ───────────────────────────────────────────────────────────

export const fixed = (value: HyperValue): FixedValue => ({ _tag: "FixedValue", value });

export const candidates = (values: readonly HyperValue[]): Candidates => ({
  _tag: "Candidates",
  values: [...values],
});

export const factory = (make: () => HyperValue, arity = make.length): Factory => ({
  _tag: "Factory",
  make,
  arity,
});

export function isGenerator(input: unknown): input is Generator {
  if (!Predicate.hasProperty(input, "_tag")) return false;
  switch (input._tag) {
    case "FixedValue":
      return Predicate.hasProperty(input, "value");
    case "Candidates":
      return Predicate.hasProperty(input, "values") && Arr.isArray(input.values);
    case "Factory":
      return Predicate.hasProperty(input, "make") && Predicate.isFunction(input.make);
    default:
      return false;
  }
}

/** Resolve loose generator shorthand: arrays are candidates, functions are factories. */
export function toGenerator(input: GeneratorInput): Generator {
  if (isGenerator(input)) return input;
  if (Arr.isArray(input)) return candidates(input);
  if (Predicate.isFunction(input)) {
    const fn = input;
    return factory((): HyperValue => fn(), fn.length);
  }
  return fixed(input);
}

function isMap<V>(input: NamedInputs<V>): input is ReadonlyMap<string, V> {
  return input instanceof Map;
}

/** Entries of a Map or plain record, in insertion order. */
export function entriesOf<V>(input: NamedInputs<V>): Array<[string, V]> {
  return isMap(input) ? [...input.entries()] : Object.entries(input);
}

// ── Sampling ───────────────────────────────────────────────────────────────

export function invokeFactory(name: string, gen: Factory): Effect.Effect<HyperValue, GeneratorError> {
  return Effect.try({
    try: () => gen.make(),
    catch: (cause) => new GeneratorError({
      message: `${name} call error: ${errorMessage(cause)}`,
      hyperparameter: name,
      cause,
    }),
  });
}

/**
 * Draw one value from a generator. Candidate picks are independent and
 * with replacement; `name` only labels errors.
 */
export function sampleGenerator(
  gen: Generator,
  name = "<generator>",
): Effect.Effect<HyperValue, GeneratorError, RngService> {
  switch (gen._tag) {
    case "Candidates": {
      const values = gen.values;
      return Effect.flatMap(RngService, (rng) =>
        Arr.isNonEmptyReadonlyArray(values)
          ? Effect.succeed(choice(rng, values))
          : Effect.fail(new GeneratorError({
              message: `${name} has no candidate values`,
              hyperparameter: name,
            })),
      );
    }
    case "Factory":
      return invokeFactory(name, gen);
    case "FixedValue":
      return Effect.succeed(gen.value);
  }
}
