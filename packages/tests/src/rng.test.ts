import { describe, it, expect } from "vitest";
import { SeededRng, choice } from "@hypersweep/core";
import { ScriptedRng } from "./helpers.js";

describe("SeededRng", () => {
  it("produces deterministic sequences", () => {
    const rng1 = new SeededRng(42);
    const rng2 = new SeededRng(42);

    const seq1 = Array.from({ length: 10 }, () => rng1.next());
    const seq2 = Array.from({ length: 10 }, () => rng2.next());

    expect(seq1).toEqual(seq2);
  });

  it("produces values in [0, 1)", () => {
    const rng = new SeededRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("replays after reseeding", () => {
    const rng = new SeededRng(9);
    const first = [rng.next(), rng.next()];
    rng.setState(9);
    expect([rng.next(), rng.next()]).toEqual(first);
    expect(rng.state()).toBe(9);
  });

  it("spreads draws evenly across buckets", () => {
    const rng = new SeededRng(42);
    const buckets = [0, 0, 0, 0];
    for (let i = 0; i < 4000; i++) buckets[Math.floor(rng.next() * 4)]++;
    for (const count of buckets) {
      expect(count).toBeGreaterThan(800);
      expect(count).toBeLessThan(1200);
    }
  });

  it("different seeds give different sequences", () => {
    const rng1 = new SeededRng(1);
    const rng2 = new SeededRng(2);
    expect(rng1.next()).not.toBe(rng2.next());
  });
});

describe("choice", () => {
  it("maps the uniform draw onto an index", () => {
    const rng = new ScriptedRng([0, 0.34, 0.999]);
    const items = ["a", "b", "c"] as const;
    expect([choice(rng, items), choice(rng, items), choice(rng, items)]).toEqual(["a", "b", "c"]);
  });

  it("clamps a draw of exactly 1 to the last element", () => {
    expect(choice(new ScriptedRng([1]), [5, 6])).toBe(6);
  });

  it("covers every element over many draws", () => {
    const rng = new SeededRng(7);
    const seen = new Set<number>();
    for (let i = 0; i < 200; i++) seen.add(choice(rng, [1, 2, 3, 4]));
    expect([...seen].sort()).toEqual([1, 2, 3, 4]);
  });
});
