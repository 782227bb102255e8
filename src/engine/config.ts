import { type DurationMs, createDurationMs } from "../types/brands";

export const DIFFICULTIES = ["EASY", "MEDIUM", "HARD"] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export function isDifficulty(u: unknown): u is Difficulty {
  return (
    typeof u === "string" && (DIFFICULTIES as ReadonlyArray<string>).includes(u)
  );
}

export type EngineConfig = Readonly<{
  /** Gravity interval at level 1, per difficulty. */
  baseGravityMs: Readonly<Record<Difficulty, DurationMs>>;
  /** Gravity never fires faster than this. */
  minGravityMs: DurationMs;
  /** Interval reduction per level above 1. */
  gravityStepMs: DurationMs;
  linesPerLevel: number;
  /** HARD per-piece countdown length, in countdown ticks. */
  countdownSeconds: number;
  countdownTickMs: DurationMs;
  maxHardErrors: number;
  softDropPoints: number;
  hardDropPointsPerRow: number;
}>;

export type EngineConfigOverrides = Partial<{
  baseGravityMs: Partial<Record<Difficulty, number>>;
  minGravityMs: number;
  gravityStepMs: number;
  linesPerLevel: number;
  countdownSeconds: number;
  countdownTickMs: number;
  maxHardErrors: number;
  softDropPoints: number;
  hardDropPointsPerRow: number;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  baseGravityMs: {
    EASY: createDurationMs(600),
    HARD: createDurationMs(180),
    MEDIUM: createDurationMs(350),
  },
  countdownSeconds: 30,
  countdownTickMs: createDurationMs(1000),
  gravityStepMs: createDurationMs(30),
  hardDropPointsPerRow: 2,
  linesPerLevel: 10,
  maxHardErrors: 3,
  minGravityMs: createDurationMs(60),
  softDropPoints: 1,
};

function positiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

function nonNegativeInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return value;
}

/**
 * Resolve overrides on top of the defaults. Invalid values throw.
 */
export function createEngineConfig(
  overrides: EngineConfigOverrides = {},
): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  const base = overrides.baseGravityMs ?? {};
  const tickMs = overrides.countdownTickMs ?? d.countdownTickMs;
  if (tickMs <= 0) throw new Error("countdownTickMs must be positive");
  const minGravityMs = overrides.minGravityMs ?? d.minGravityMs;
  if (minGravityMs <= 0) throw new Error("minGravityMs must be positive");

  return {
    baseGravityMs: {
      EASY: createDurationMs(base.EASY ?? d.baseGravityMs.EASY),
      HARD: createDurationMs(base.HARD ?? d.baseGravityMs.HARD),
      MEDIUM: createDurationMs(base.MEDIUM ?? d.baseGravityMs.MEDIUM),
    },
    countdownSeconds: positiveInt(
      "countdownSeconds",
      overrides.countdownSeconds ?? d.countdownSeconds,
    ),
    countdownTickMs: createDurationMs(tickMs),
    gravityStepMs: createDurationMs(overrides.gravityStepMs ?? d.gravityStepMs),
    hardDropPointsPerRow: nonNegativeInt(
      "hardDropPointsPerRow",
      overrides.hardDropPointsPerRow ?? d.hardDropPointsPerRow,
    ),
    linesPerLevel: positiveInt(
      "linesPerLevel",
      overrides.linesPerLevel ?? d.linesPerLevel,
    ),
    maxHardErrors: positiveInt(
      "maxHardErrors",
      overrides.maxHardErrors ?? d.maxHardErrors,
    ),
    minGravityMs: createDurationMs(minGravityMs),
    softDropPoints: nonNegativeInt(
      "softDropPoints",
      overrides.softDropPoints ?? d.softDropPoints,
    ),
  };
}
