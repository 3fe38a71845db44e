import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { repeatSweep, tagSweep } from "@hypersweep/space";

describe("repeatSweep", () => {
  it("repeats each config back to back", () => {
    const configs = [{ a: 1 }, { a: 2 }];
    const entries = Effect.runSync(repeatSweep(configs, 2));
    expect(entries).toEqual([
      { config: { a: 1 }, repetition: 0 },
      { config: { a: 1 }, repetition: 1 },
      { config: { a: 2 }, repetition: 0 },
      { config: { a: 2 }, repetition: 1 },
    ]);
    expect(entries[0].config).not.toBe(configs[0]);
    expect(entries[0].config).not.toBe(entries[1].config);
  });

  it("rejects non-positive repetitions", () => {
    const err = Effect.runSync(Effect.flip(repeatSweep([{ a: 1 }], 0)));
    expect(err.message).toBe("repetitions must be a positive integer, got 0");
  });
});

describe("tagSweep", () => {
  it("gives equal configs the same id", () => {
    const tagged = tagSweep([{ a: 1, b: 2 }, { b: 2, a: 1 }, { a: 2, b: 2 }]);
    expect(tagged[0].id).toBe(tagged[1].id);
    expect(tagged[2].id).not.toBe(tagged[0].id);
    expect(tagged[2].config).toEqual({ a: 2, b: 2 });
  });
});

describe("tagSweep value kinds", () => {
  it("tags configs holding bigints, non-finite numbers and sets", () => {
    const tagged = tagSweep([
      { steps: 10n },
      { a: NaN },
      { a: null },
      { a: Infinity },
      { s: new Set([1]) },
      { s: new Set([2]) },
    ]);
    expect(new Set(tagged.map(t => t.id)).size).toBe(6);
  });
});
