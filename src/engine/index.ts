import { DEFAULT_ENGINE_CONFIG } from "./config";
import { createEmptyGrid } from "./core/board";
import { randomPiece } from "./core/pieces";
import { createUniformRng } from "./core/rng/uniform";
import { spawnNext } from "./gameplay/spawn";
import { applyCommand } from "./step/apply-command";
import { normalizePlayerName } from "./types";

import type { Command } from "./commands";
import type { DomainEvent } from "./events";
import type {
  Difficulty,
  EngineConfig,
  PieceRandomGenerator,
  SessionState,
} from "./types";

export type InitOptions = {
  player?: string | null;
  difficulty: Difficulty;
  cfg?: EngineConfig;
  rng?: PieceRandomGenerator;
};

/**
 * Fresh session: empty grid, zeroed counters, level 1, a drawn preview and
 * the first piece already spawned from it.
 */
export function init(opts: InitOptions): {
  state: SessionState;
  events: ReadonlyArray<DomainEvent>;
} {
  const first = randomPiece(opts.rng ?? createUniformRng());
  const blank: SessionState = {
    cfg: opts.cfg ?? DEFAULT_ENGINE_CONFIG,
    current: null,
    difficulty: opts.difficulty,
    gameOverReason: null,
    grid: createEmptyGrid(),
    hardErrors: 0,
    level: 1,
    lines: 0,
    next: first.piece,
    phase: "active",
    player: normalizePlayerName(opts.player),
    rng: first.newRng,
    score: 0,
  };
  return spawnNext(blank);
}

/**
 * Apply one command. `applied` is false when the command was rejected or
 * could not move the piece; the state is then returned unchanged.
 */
export function step(
  state: SessionState,
  cmd: Command,
): {
  state: SessionState;
  events: ReadonlyArray<DomainEvent>;
  applied: boolean;
} {
  return applyCommand(state, cmd);
}

/**
 * Apply commands in order, collecting every event.
 */
export function stepN(
  state: SessionState,
  cmds: ReadonlyArray<Command>,
): { state: SessionState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const all: Array<DomainEvent> = [];
  for (const cmd of cmds) {
    const r = step(s, cmd);
    s = r.state;
    all.push(...r.events);
  }
  return { events: all, state: s };
}
