import { describe, expect, test } from "@jest/globals";

import {
  assertGridCoord,
  createGridCoord,
  gridCoordAsNumber,
  isGridCoord,
} from "@/engine/core/types";
import {
  assertDurationMs,
  createDurationMs,
  createSeed,
  durationMsAsNumber,
  isDurationMs,
  isSeed,
  seedAsString,
} from "@/types/brands";

describe("@/types/brands — DurationMs", () => {
  test("accepts non-negative finite numbers", () => {
    expect(durationMsAsNumber(createDurationMs(0))).toBe(0);
    expect(durationMsAsNumber(createDurationMs(16.5))).toBe(16.5);
  });

  test("rejects negatives and non-finite values", () => {
    expect(() => createDurationMs(-1)).toThrow(
      "DurationMs must be a non-negative finite number",
    );
    expect(() => createDurationMs(Number.POSITIVE_INFINITY)).toThrow();
    expect(() => createDurationMs(Number.NaN)).toThrow();
  });

  test("guards", () => {
    expect(isDurationMs(100)).toBe(true);
    expect(isDurationMs(-5)).toBe(false);
    expect(isDurationMs("100")).toBe(false);
    expect(() => assertDurationMs(-5)).toThrow("Not a valid DurationMs");
    expect(() => assertDurationMs(5)).not.toThrow();
  });
});

describe("@/types/brands — Seed", () => {
  test("non-empty strings only", () => {
    expect(seedAsString(createSeed("abc"))).toBe("abc");
    expect(() => createSeed("")).toThrow("Seed must be a non-empty string");
    expect(isSeed("x")).toBe(true);
    expect(isSeed("")).toBe(false);
    expect(isSeed(3)).toBe(false);
  });
});

describe("@/engine/core/types — GridCoord", () => {
  test("integers, negatives included", () => {
    expect(gridCoordAsNumber(createGridCoord(-2))).toBe(-2);
    expect(() => createGridCoord(1.5)).toThrow("GridCoord must be an integer");
    expect(isGridCoord(7)).toBe(true);
    expect(isGridCoord(0.1)).toBe(false);
    expect(() => assertGridCoord("3")).toThrow("Not a valid GridCoord");
  });
});
