import { describe, it, expect } from "vitest";
import { candidates, factory, fixed, isGenerator, sampleGenerator, toGenerator } from "@hypersweep/space";
import { failureOf, runWith } from "./helpers.js";

describe("toGenerator", () => {
  it("treats arrays as candidate lists", () => {
    expect(toGenerator([1, 2])).toEqual({ _tag: "Candidates", values: [1, 2] });
  });

  it("treats functions as factories and other values as fixed", () => {
    expect(toGenerator(() => 3)._tag).toBe("Factory");
    expect(toGenerator("adam")).toEqual({ _tag: "FixedValue", value: "adam" });
    expect(toGenerator(null)).toEqual({ _tag: "FixedValue", value: null });
  });

  it("passes tagged generators through", () => {
    const gen = fixed([1, 2]);
    expect(toGenerator(gen)).toBe(gen);
  });
});

describe("isGenerator", () => {
  it("checks the fields of each variant", () => {
    expect(isGenerator(candidates([]))).toBe(true);
    expect(isGenerator(factory(() => 1))).toBe(true);
    expect(isGenerator({ _tag: "Candidates" })).toBe(false);
    expect(isGenerator({ _tag: "Factory", make: 1 })).toBe(false);
    expect(isGenerator({ _tag: "Other", value: 1 })).toBe(false);
    expect(isGenerator([1])).toBe(false);
  });
});

describe("sampleGenerator", () => {
  it("samples each variant", () => {
    expect(runWith(sampleGenerator(candidates(["x", "y"])), [0.6]).value).toBe("y");
    expect(runWith(sampleGenerator(factory(() => 11))).value).toBe(11);
    expect(runWith(sampleGenerator(fixed(4))).value).toBe(4);
  });

  it("fails on an empty candidate list", () => {
    const err = failureOf(sampleGenerator(candidates([]), "width"));
    expect(err.hyperparameter).toBe("width");
    expect(err.message).toBe("width has no candidate values");
  });
});
