/**
 * ConfigSpace: a validated set of hyperparameter generators plus default
 * overrides, and the search strategies that enumerate configurations from it.
 *
 * Every search returns fresh dictionaries owned by the caller. Keys follow the
 * insertion order of the generator map (integer-like names excepted, see
 * `ConfigDict`).
 *
 * Example:
 *
 *   const sweep = ConfigSpace.make(
 *     { mixingRate: () => Math.random(), batchSize: 32, learningRate: [0.01, 0.001] },
 *     { mixingRate: 0.5 },
 *   ).pipe(
 *     Effect.flatMap(space => space.randomSearch(100)),
 *     Effect.provide(SweepRuntime(defaultRuntimeConfig)),
 *   );
 *   for (const config of Effect.runSync(sweep)) runExperiment(config);
 */
import { isDeepStrictEqual } from "node:util";
import { Effect, Option } from "effect";
import {
  InvariantError,
  configError,
  errorMessage,
  type ConfigError,
  type GeneratorError,
  type RngService,
} from "@hypersweep/core";
import {
  entriesOf,
  invokeFactory,
  sampleGenerator,
  toGenerator,
  type Candidates,
  type ConfigDict,
  type Generator,
  type GeneratorInput,
  type HyperValue,
  type NamedInputs,
} from "./generators.js";

export type SearchError = ConfigError | GeneratorError;

// ── Validation ─────────────────────────────────────────────────────────────

/** Collect every problem with a space; never stops at the first one. */
function checkSpace(
  generators: ReadonlyMap<string, Generator>,
  defaults: ReadonlyMap<string, HyperValue>,
): string[] {
  const problems: string[] = [];

  const unknownDefaults = [...defaults.keys()].filter(name => !generators.has(name));
  if (unknownDefaults.length > 0) {
    problems.push(`${unknownDefaults.join(", ")} are not hyperparameters`);
  }

  for (const [name, gen] of generators) {
    if (gen._tag === "Candidates" && gen.values.length === 0) {
      problems.push(`${name} has no candidate values`);
    }
    if (gen._tag !== "Factory") continue;
    const arity = gen.arity ?? gen.make.length;
    if (arity > 0) {
      problems.push(`${name} call error: factory takes ${arity} argument(s), expected none`);
      continue;
    }
    // Probe call; the value is thrown away.
    try {
      gen.make();
    } catch (cause) {
      problems.push(`${name} call error: ${errorMessage(cause)}`);
    }
  }

  return problems;
}

function checkCount(n: number): Effect.Effect<void, ConfigError> {
  return Number.isSafeInteger(n) && n >= 0
    ? Effect.void
    : Effect.fail(configError([`n must be a non-negative integer, got ${n}`]));
}

function replicate<A, E, R>(
  n: number,
  make: () => Effect.Effect<A, E, R>,
): Effect.Effect<A[], E | ConfigError, R> {
  return Effect.zipRight(checkCount(n), Effect.suspend(() => Effect.all(Array.from({ length: n }, make))));
}

function logGenerated(strategy: string) {
  return <E, R>(search: Effect.Effect<ConfigDict[], E, R>) =>
    search.pipe(
      Effect.tap(dicts => Effect.logDebug(`generated ${dicts.length} configs`)),
      Effect.annotateLogs({ strategy }),
    );
}

// ── ConfigSpace ────────────────────────────────────────────────────────────

export class ConfigSpace {
  private readonly _generators: ReadonlyMap<string, Generator>;
  private readonly _defaults: ReadonlyMap<string, HyperValue>;

  /** Factory hyperparameters with no default override; their defaults are fresh draws. */
  readonly missingDefaults: readonly string[];

  private constructor(
    generators: ReadonlyMap<string, Generator>,
    defaults: ReadonlyMap<string, HyperValue>,
    missingDefaults: readonly string[],
  ) {
    this._generators = generators;
    this._defaults = defaults;
    this.missingDefaults = missingDefaults;
  }

  /**
   * Validate and build a space. Every factory generator is called once here,
   * so factories with side effects will see an extra call.
   */
  static make(
    generators: NamedInputs<GeneratorInput>,
    defaults: NamedInputs<HyperValue> = {},
  ): Effect.Effect<ConfigSpace, ConfigError> {
    return Effect.suspend(() => {
      const gens = new Map(
        entriesOf(generators).map(([name, input]): [string, Generator] => [name, toGenerator(input)]),
      );
      const defs = new Map(entriesOf(defaults));
      const problems = checkSpace(gens, defs);
      const missing = [...gens]
        .filter(([name, gen]) => gen._tag === "Factory" && !defs.has(name))
        .map(([name]) => name);

      const warn = missing.length > 0
        ? Effect.logWarning(`${missing.join(", ")} have no default values`)
        : Effect.void;
      const result: Effect.Effect<ConfigSpace, ConfigError> = problems.length > 0
        ? Effect.fail(configError(problems))
        : Effect.succeed(new ConfigSpace(gens, defs, missing));
      return Effect.zipRight(warn, result);
    });
  }

  // ── Accessors ──────────────────────────────────────────────────────────

  get names(): readonly string[] {
    return [...this._generators.keys()];
  }

  get size(): number {
    return this._generators.size;
  }

  generator(name: string): Option.Option<Generator> {
    return Option.fromNullable(this._generators.get(name));
  }

  // ── Single values ──────────────────────────────────────────────────────

  defaultValue(name: string): Effect.Effect<HyperValue, SearchError> {
    return Effect.flatMap(this._lookup(name), gen => this._resolveDefault(name, gen));
  }

  randomValue(name: string): Effect.Effect<HyperValue, SearchError, RngService> {
    return Effect.flatMap(this._lookup(name), gen => sampleGenerator(gen, name));
  }

  // ── Dictionaries ───────────────────────────────────────────────────────

  defaultDict(): Effect.Effect<ConfigDict, GeneratorError> {
    return this._dict((name, gen) => this._resolveDefault(name, gen));
  }

  randomDict(): Effect.Effect<ConfigDict, GeneratorError, RngService> {
    return this._dict((name, gen) => sampleGenerator(gen, name));
  }

  // ── Searches ───────────────────────────────────────────────────────────

  /** `n` default dictionaries. Identical unless a factory default is redrawn. */
  defaultSearch(n = 1): Effect.Effect<ConfigDict[], SearchError> {
    return replicate(n, () => this.defaultDict()).pipe(logGenerated("default"));
  }

  randomSearch(n = 1): Effect.Effect<ConfigDict[], SearchError, RngService> {
    return replicate(n, () => this.randomDict()).pipe(logGenerated("random"));
  }

  /**
   * With k interests, split `n` dictionaries into k contiguous groups of
   * `floor(n / k)`. Group i varies interests[i] at random and keeps every
   * other hyperparameter at its default. The last group also takes the
   * `n mod k` leftover dictionaries.
   */
  oneValueSearch(interests: readonly string[], n = 1): Effect.Effect<ConfigDict[], SearchError, RngService> {
    return Effect.suspend((): Effect.Effect<ConfigDict[], SearchError, RngService> => {
      const problems = this._checkInterests(interests);
      if (problems.length > 0) return Effect.fail(configError(problems));

      const k = interests.length;
      const nRep = Math.floor(n / k);
      if (nRep === 0) {
        return Effect.fail(configError([`n_rep == 0 when n=${n} and ${k} interests`]));
      }

      return Effect.flatMap(this.defaultSearch(n), dicts =>
        Effect.forEach(dicts, (dict, i) => {
          const name = interests[Math.min(Math.floor(i / nRep), k - 1)];
          return Effect.map(this.randomValue(name), value => {
            dict[name] = value;
            return dict;
          });
        }),
      );
    }).pipe(logGenerated("one-value"));
  }

  /**
   * One-at-a-time grid: the default dictionary first, then for each interest
   * (in order) one dictionary per non-default candidate, with only that
   * hyperparameter changed. Yields sum(len(candidates)) - len(interests) + 1
   * dictionaries.
   */
  oneValueGridSearch(interests: readonly string[]): Effect.Effect<ConfigDict[], SearchError> {
    return Effect.suspend((): Effect.Effect<ConfigDict[], SearchError> => {
      const problems = this._checkInterests(interests);
      if (problems.length > 0) return Effect.fail(configError(problems));

      const lists: Array<[string, Candidates]> = [];
      const notLists: string[] = [];
      for (const name of interests) {
        const gen = this._generators.get(name);
        if (gen?._tag === "Candidates") lists.push([name, gen]);
        else notLists.push(name);
      }
      if (notLists.length > 0) {
        return Effect.fail(configError([`${notLists.join(", ")} are not candidate lists`]));
      }

      const overrides: Array<[string, HyperValue]> = [];
      const absent: string[] = [];
      for (const [name, gen] of lists) {
        const dflt = this._listDefault(name, gen);
        const idx = gen.values.findIndex(v => isDeepStrictEqual(v, dflt));
        if (idx === -1) {
          absent.push(`default of ${name} is not one of its candidates`);
          continue;
        }
        gen.values.forEach((value, i) => {
          if (i !== idx) overrides.push([name, value]);
        });
      }
      if (absent.length > 0) return Effect.fail(configError(absent));

      const total = lists.reduce((acc, [, gen]) => acc + gen.values.length, 0) - lists.length + 1;
      if (overrides.length + 1 !== total) {
        return Effect.die(new InvariantError({
          message: `grid search built ${overrides.length + 1} configs, expected ${total}`,
        }));
      }

      return Effect.map(this.defaultSearch(total), dicts => {
        overrides.forEach(([name, value], i) => {
          dicts[i + 1][name] = value;
        });
        return dicts;
      });
    }).pipe(logGenerated("one-value-grid"));
  }

  /**
   * Default search with some generators swapped out for this search only.
   * Overrides are not validated and may name hyperparameters outside the space.
   */
  customSearch(
    overrides: NamedInputs<GeneratorInput>,
    n = 1,
  ): Effect.Effect<ConfigDict[], SearchError, RngService> {
    return Effect.suspend((): Effect.Effect<ConfigDict[], SearchError, RngService> => {
      const gens = entriesOf(overrides).map(([name, input]): [string, Generator] => [name, toGenerator(input)]);
      return Effect.flatMap(this.defaultSearch(n), dicts =>
        Effect.forEach(dicts, dict =>
          Effect.map(
            Effect.forEach(gens, ([name, gen]) =>
              Effect.map(sampleGenerator(gen, name), (value): [string, HyperValue] => [name, value]),
            ),
            drawn => {
              for (const [name, value] of drawn) dict[name] = value;
              return dict;
            },
          ),
        ),
      );
    }).pipe(logGenerated("custom"));
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private _lookup(name: string): Effect.Effect<Generator, ConfigError> {
    const gen = this._generators.get(name);
    return gen ? Effect.succeed(gen) : Effect.fail(configError([`${name} is not a hyperparameter`]));
  }

  private _checkInterests(interests: readonly string[]): string[] {
    if (interests.length === 0) return ["interests must name at least one hyperparameter"];
    const unknown = interests.filter(name => !this._generators.has(name));
    return unknown.length > 0 ? [`${unknown.join(", ")} are not hyperparameters`] : [];
  }

  private _listDefault(name: string, gen: Candidates): HyperValue {
    return this._defaults.has(name) ? this._defaults.get(name) : gen.values[0];
  }

  private _resolveDefault(name: string, gen: Generator): Effect.Effect<HyperValue, GeneratorError> {
    if (this._defaults.has(name)) return Effect.succeed(this._defaults.get(name));
    switch (gen._tag) {
      case "Candidates":
        return Effect.succeed(gen.values[0]);
      case "Factory":
        return Effect.zipRight(
          Effect.logWarning(`missing default for hyperparameter ${name}`),
          invokeFactory(name, gen),
        );
      case "FixedValue":
        return Effect.succeed(gen.value);
    }
  }

  private _dict<E, R>(
    resolve: (name: string, gen: Generator) => Effect.Effect<HyperValue, E, R>,
  ): Effect.Effect<ConfigDict, E, R> {
    return Effect.map(
      Effect.forEach([...this._generators], ([name, gen]) =>
        Effect.map(resolve(name, gen), (value): [string, HyperValue] => [name, value]),
      ),
      entries => Object.fromEntries(entries),
    );
  }
}
