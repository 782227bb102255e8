// Branded primitive types for type safety and domain modeling

// Duration in milliseconds - for clock intervals
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// RNG seed - for the piece generator
declare const SeedBrand: unique symbol;
export type Seed = string & { readonly [SeedBrand]: true };

// DurationMs constructors and guards
export function createDurationMs(value: number): DurationMs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationMs must be a non-negative finite number");
  }
  return value as DurationMs;
}

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

export function assertDurationMs(n: unknown): asserts n is DurationMs {
  if (!isDurationMs(n)) throw new Error("Not a valid DurationMs");
}

// Seed constructors and guards
export function createSeed(value: string): Seed {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error("Seed must be a non-empty string");
  }
  return value as Seed;
}

export function isSeed(s: unknown): s is Seed {
  return typeof s === "string" && s.length > 0;
}

// Conversion helpers for interop at boundaries
export const durationMsAsNumber = (d: DurationMs): number => d as number;
export const seedAsString = (s: Seed): string => s as string;
