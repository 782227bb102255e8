import { type Difficulty, type EngineConfig } from "../config";

import type { SessionState } from "../types";

/**
 * Gravity interval for a difficulty and level:
 * max(minGravityMs, base - (level - 1) * gravityStepMs).
 */
export function gravityIntervalMs(
  cfg: EngineConfig,
  difficulty: Difficulty,
  level: number,
): number {
  const base = cfg.baseGravityMs[difficulty];
  return Math.max(cfg.minGravityMs, base - (level - 1) * cfg.gravityStepMs);
}

export function currentGravityMs(state: SessionState): number {
  return gravityIntervalMs(state.cfg, state.difficulty, state.level);
}
