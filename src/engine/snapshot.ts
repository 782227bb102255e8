import { DEFAULT_ENGINE_CONFIG, isDifficulty } from "./config";
import { cloneGrid } from "./core/board";
import {
  copyShape,
  createPiece,
  randomPiece,
  shapeHeight,
  shapeWidth,
  withShape,
} from "./core/pieces";
import { createUniformRng } from "./core/rng/uniform";
import { isOrientationOf } from "./core/rotation";
import {
  BOARD_COLS,
  BOARD_ROWS,
  createGridCoord,
  gridCoordAsNumber,
  isPieceId,
} from "./core/types";
import { spawnNext } from "./gameplay/spawn";
import { normalizePlayerName } from "./types";

import type { DomainEvent } from "./events";
import type {
  ActivePiece,
  Cell,
  Difficulty,
  EngineConfig,
  GameOverReason,
  Grid,
  Piece,
  PieceId,
  PieceRandomGenerator,
  SessionState,
  ShapeBit,
  ShapeMatrix,
} from "./types";

export const SNAPSHOT_VERSION = 1 as const;

// Color is not stored: it is a display tag derived from the id
export type SnapshotPiece = {
  readonly id: PieceId;
  readonly shape: ShapeMatrix;
};

export type GameSnapshot = {
  readonly version: typeof SNAPSHOT_VERSION;
  readonly player: string;
  readonly difficulty: Difficulty;
  readonly score: number;
  readonly level: number;
  readonly lines: number;
  readonly hardErrors: number;
  readonly grid: Grid;
  readonly current: SnapshotPiece | null;
  readonly next: SnapshotPiece | null;
  readonly curRow: number;
  readonly curCol: number;
  readonly gameOver: boolean;
  readonly gameOverReason: GameOverReason | null;
};

export type ParseResult =
  | { ok: true; snapshot: GameSnapshot }
  | { ok: false; reason: string };

function snapshotPiece(piece: Piece): SnapshotPiece {
  return { id: piece.id, shape: copyShape(piece.shape) };
}

/**
 * Independent copy of everything needed to resume the session.
 */
export function exportSnapshot(state: SessionState): GameSnapshot {
  const current = state.current;
  return {
    curCol: current ? gridCoordAsNumber(current.col) : 0,
    curRow: current ? gridCoordAsNumber(current.row) : 0,
    current: current ? snapshotPiece(current.piece) : null,
    difficulty: state.difficulty,
    gameOver: state.phase === "gameOver",
    gameOverReason: state.gameOverReason,
    grid: cloneGrid(state.grid),
    hardErrors: state.hardErrors,
    level: state.level,
    lines: state.lines,
    next: snapshotPiece(state.next),
    player: state.player,
    score: state.score,
    version: SNAPSHOT_VERSION,
  };
}

// --- structural validation ---

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isInt(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x);
}

function isCount(x: unknown): x is number {
  return isInt(x) && x >= 0;
}

function isShapeBit(x: unknown): x is ShapeBit {
  return x === 0 || x === 1;
}

function isGameOverReason(x: unknown): x is GameOverReason {
  return x === "blockOut" || x === "lockConflict" || x === "hardErrors";
}

function parseShape(u: unknown): ShapeMatrix | null {
  if (!Array.isArray(u) || u.length === 0) return null;
  const rows: Array<Array<ShapeBit>> = [];
  let width = -1;
  for (const row of u) {
    if (!Array.isArray(row) || row.length === 0) return null;
    if (width !== -1 && row.length !== width) return null;
    width = row.length;
    const bits: Array<ShapeBit> = [];
    for (const bit of row) {
      if (!isShapeBit(bit)) return null;
      bits.push(bit);
    }
    rows.push(bits);
  }
  return rows;
}

function parsePiece(u: unknown): SnapshotPiece | null {
  if (!isRecord(u)) return null;
  const id = u["id"];
  if (!isPieceId(id)) return null;
  const shape = parseShape(u["shape"]);
  // Only the canonical matrix of the id, possibly rotated
  return shape && isOrientationOf(id, shape) ? { id, shape } : null;
}

function parseGrid(u: unknown): Grid | null {
  if (!Array.isArray(u) || u.length !== BOARD_ROWS) return null;
  const grid: Array<Array<Cell>> = [];
  for (const row of u) {
    if (!Array.isArray(row) || row.length !== BOARD_COLS) return null;
    const cells: Array<Cell> = [];
    for (const cell of row) {
      if (cell === null) cells.push(null);
      else if (isPieceId(cell)) cells.push(cell);
      else return null;
    }
    grid.push(cells);
  }
  return grid;
}

function parseOptionalPiece(
  u: unknown,
  field: string,
): { ok: true; piece: SnapshotPiece | null } | { ok: false; reason: string } {
  if (u === null || u === undefined) return { ok: true, piece: null };
  const piece = parsePiece(u);
  if (!piece) return { ok: false, reason: `${field} is not a valid piece` };
  return { ok: true, piece };
}

/**
 * Validate unknown data (typically decoded JSON) as a snapshot. Never throws.
 */
export function parseSnapshot(u: unknown): ParseResult {
  if (!isRecord(u)) return { ok: false, reason: "snapshot is not an object" };
  if (u["version"] !== SNAPSHOT_VERSION) {
    return { ok: false, reason: "unsupported snapshot version" };
  }
  const player = u["player"];
  if (typeof player !== "string") {
    return { ok: false, reason: "player must be a string" };
  }
  const difficulty = u["difficulty"];
  if (!isDifficulty(difficulty)) {
    return { ok: false, reason: "difficulty must be EASY, MEDIUM or HARD" };
  }
  const { hardErrors, level, lines, score } = u;
  if (!isCount(score) || !isCount(lines) || !isCount(hardErrors)) {
    return {
      ok: false,
      reason: "score, lines and hardErrors must be non-negative integers",
    };
  }
  if (!isInt(level) || level < 1) {
    return { ok: false, reason: "level must be an integer of at least 1" };
  }
  const grid = parseGrid(u["grid"]);
  if (!grid) {
    return { ok: false, reason: `grid must be ${BOARD_ROWS}x${BOARD_COLS}` };
  }
  const current = parseOptionalPiece(u["current"], "current");
  if (!current.ok) return current;
  const next = parseOptionalPiece(u["next"], "next");
  if (!next.ok) return next;
  const { curCol, curRow } = u;
  if (!isInt(curRow) || !isInt(curCol)) {
    return { ok: false, reason: "curRow and curCol must be integers" };
  }
  const active = current.piece;
  if (
    active &&
    (curRow < -shapeHeight(active.shape) ||
      curRow >= BOARD_ROWS ||
      curCol <= -shapeWidth(active.shape) ||
      curCol >= BOARD_COLS)
  ) {
    return { ok: false, reason: "current position is off the board" };
  }
  const gameOver = u["gameOver"];
  if (typeof gameOver !== "boolean") {
    return { ok: false, reason: "gameOver must be a boolean" };
  }
  const reason = u["gameOverReason"];
  const gameOverReason = isGameOverReason(reason) ? reason : null;

  return {
    ok: true,
    snapshot: {
      curCol,
      curRow,
      current: current.piece,
      difficulty,
      gameOver,
      gameOverReason: gameOver ? (gameOverReason ?? "blockOut") : null,
      grid,
      hardErrors,
      level,
      lines,
      next: next.piece,
      player,
      score,
      version: SNAPSHOT_VERSION,
    },
  };
}

export type RestoreOptions = {
  cfg?: EngineConfig;
  rng?: PieceRandomGenerator;
};

function toPiece(p: SnapshotPiece): Piece {
  return withShape(createPiece(p.id), p.shape);
}

/**
 * Rebuild a live session from a validated snapshot. The session resumes
 * unpaused. A running snapshot without an active piece spawns from its
 * preview; a missing preview is drawn fresh.
 */
export function restoreState(
  snapshot: GameSnapshot,
  opts: RestoreOptions = {},
): { state: SessionState; events: ReadonlyArray<DomainEvent> } {
  let rng = opts.rng ?? createUniformRng();
  let next: Piece;
  if (snapshot.next) {
    next = toPiece(snapshot.next);
  } else {
    const drawn = randomPiece(rng);
    next = drawn.piece;
    rng = drawn.newRng;
  }

  const current: ActivePiece | null = snapshot.current
    ? {
        col: createGridCoord(snapshot.curCol),
        piece: toPiece(snapshot.current),
        row: createGridCoord(snapshot.curRow),
      }
    : null;

  const state: SessionState = {
    cfg: opts.cfg ?? DEFAULT_ENGINE_CONFIG,
    current,
    difficulty: snapshot.difficulty,
    gameOverReason: snapshot.gameOver
      ? (snapshot.gameOverReason ?? "blockOut")
      : null,
    grid: cloneGrid(snapshot.grid),
    hardErrors: snapshot.hardErrors,
    level: snapshot.level,
    lines: snapshot.lines,
    next,
    phase: snapshot.gameOver ? "gameOver" : "active",
    player: normalizePlayerName(snapshot.player),
    rng,
    score: snapshot.score,
  };

  if (!snapshot.gameOver && current === null) return spawnNext(state);
  return { events: [], state };
}
