import { type EngineConfig, type Difficulty } from "./config";
import { type PieceRandomGenerator } from "./core/rng/interface";
import { type ActivePiece, type Grid, type Piece } from "./core/types";

export * from "./core/types";
export { type Difficulty, type EngineConfig } from "./config";
export { type PieceRandomGenerator } from "./core/rng/interface";

// paused exists only outside HARD; gameOver is terminal
export type SessionPhase = "active" | "paused" | "gameOver";

export type GameOverReason = "blockOut" | "lockConflict" | "hardErrors";

export type SessionState = {
  readonly cfg: EngineConfig;
  readonly player: string;
  readonly difficulty: Difficulty;
  readonly grid: Grid;
  readonly current: ActivePiece | null;
  readonly next: Piece;
  readonly score: number;
  readonly level: number;
  readonly lines: number;
  readonly hardErrors: number;
  readonly phase: SessionPhase;
  readonly gameOverReason: GameOverReason | null;
  readonly rng: PieceRandomGenerator;
};

export const DEFAULT_PLAYER_NAME = "Player";

export function normalizePlayerName(name: string | null | undefined): string {
  const trimmed = (name ?? "").trim();
  return trimmed.length === 0 ? DEFAULT_PLAYER_NAME : trimmed;
}

export function isGameOver(state: SessionState): boolean {
  return state.phase === "gameOver";
}

export function isPaused(state: SessionState): boolean {
  return state.phase === "paused";
}

export function canPause(difficulty: Difficulty): boolean {
  return difficulty !== "HARD";
}

export function endSession(
  state: SessionState,
  reason: GameOverReason,
): SessionState {
  return { ...state, gameOverReason: reason, phase: "gameOver" };
}
