import { dropDistance } from "./core/board";
import { PIECES, copyShape } from "./core/pieces";
import { gridCoordAsNumber } from "./core/types";
import { currentGravityMs } from "./physics/gravity";
import { canPause, isGameOver, isPaused } from "./types";

import type {
  ActivePiece,
  Difficulty,
  PieceId,
  SessionState,
  ShapeMatrix,
} from "./types";

export type CellView = Readonly<{ id: PieceId; color: string }> | null;

export type PieceView = Readonly<{
  id: PieceId;
  color: string;
  shape: ShapeMatrix;
}>;

export type ActivePieceView = PieceView &
  Readonly<{
    row: number;
    col: number;
    ghostRow: number; // where a hard drop would land
  }>;

/**
 * Read-only projection of a session for rendering and HUD refresh.
 * Everything in it is a fresh copy.
 */
export type SessionView = Readonly<{
  grid: ReadonlyArray<ReadonlyArray<CellView>>;
  active: ActivePieceView | null;
  preview: PieceView;
  previewVisible: boolean;
  player: string;
  difficulty: Difficulty;
  score: number;
  level: number;
  lines: number;
  timerDisplay: string;
  hardErrors: number;
  maxHardErrors: number;
  gravityMs: number;
  canPause: boolean;
  paused: boolean;
  gameOver: boolean;
}>;

// Scalar selectors
export const selectScore = (s: SessionState): number => s.score;
export const selectLevel = (s: SessionState): number => s.level;
export const selectLines = (s: SessionState): number => s.lines;
export const selectHardErrors = (s: SessionState): number => s.hardErrors;
export const selectIsPaused = (s: SessionState): boolean => isPaused(s);
export const selectIsGameOver = (s: SessionState): boolean => isGameOver(s);
export const selectCanPause = (s: SessionState): boolean =>
  canPause(s.difficulty);

// The preview is hidden in HARD
export const selectPreviewVisible = (s: SessionState): boolean =>
  s.difficulty !== "HARD";

/**
 * Countdown text for the HUD: "<n>s" in HARD, "-" elsewhere.
 */
export function formatTimerDisplay(
  difficulty: Difficulty,
  remainingSeconds: number,
): string {
  return difficulty === "HARD" ? `${String(remainingSeconds)}s` : "-";
}

function pieceView(id: PieceId, shape: ShapeMatrix): PieceView {
  return { color: PIECES[id].color, id, shape: copyShape(shape) };
}

export function selectActive(s: SessionState): ActivePieceView | null {
  const a: ActivePiece | null = s.current;
  if (!a) return null;
  const row = gridCoordAsNumber(a.row);
  return {
    ...pieceView(a.piece.id, a.piece.shape),
    col: gridCoordAsNumber(a.col),
    ghostRow: row + dropDistance(s.grid, a),
    row,
  };
}

export function selectGridCells(
  s: SessionState,
): ReadonlyArray<ReadonlyArray<CellView>> {
  return s.grid.map((row) =>
    row.map((cell) =>
      cell === null ? null : { color: PIECES[cell].color, id: cell },
    ),
  );
}

export function selectSessionView(
  s: SessionState,
  countdownRemaining: number,
): SessionView {
  return {
    active: selectActive(s),
    canPause: selectCanPause(s),
    difficulty: s.difficulty,
    gameOver: selectIsGameOver(s),
    gravityMs: currentGravityMs(s),
    grid: selectGridCells(s),
    hardErrors: s.hardErrors,
    level: s.level,
    lines: s.lines,
    maxHardErrors: s.cfg.maxHardErrors,
    paused: selectIsPaused(s),
    player: s.player,
    preview: pieceView(s.next.id, s.next.shape),
    previewVisible: selectPreviewVisible(s),
    score: s.score,
    timerDisplay: formatTimerDisplay(s.difficulty, countdownRemaining),
  };
}
