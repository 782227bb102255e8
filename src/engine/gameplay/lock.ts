import { collides, stampPiece } from "../core/board";
import { shapeHeight } from "../core/pieces";
import { createGridCoord, gridCoordAsNumber } from "../core/types";
import { applyLineClear } from "../scoring/line-clear";
import { endSession, isGameOver } from "../types";

import { spawnNext } from "./spawn";

import type { DomainEvent, LockSource } from "../events";
import type { ActivePiece, Grid, SessionState } from "../types";

/**
 * Find a row at or above the piece's own where it does not overlap the grid.
 * Lifts one row at a time, at most shapeHeight + 2 + |row| times.
 */
export function resolveLockRow(
  grid: Grid,
  active: ActivePiece,
): { active: ActivePiece; lifted: number } | null {
  const shape = active.piece.shape;
  const col = gridCoordAsNumber(active.col);
  const startRow = gridCoordAsNumber(active.row);
  const maxLift = shapeHeight(shape) + 2 + Math.abs(startRow);

  for (let lifted = 0; lifted <= maxLift; lifted++) {
    const row = startRow - lifted;
    if (!collides(grid, shape, row, col)) {
      return { active: { ...active, row: createGridCoord(row) }, lifted };
    }
  }
  return null;
}

/**
 * Stamp the active piece into the grid. An overlapping piece is lifted first;
 * if no row resolves the overlap the session ends and the grid is untouched.
 */
export function lockActivePiece(
  state: SessionState,
  source: LockSource,
): { state: SessionState; events: Array<DomainEvent> } {
  const current = state.current;
  if (!current) return { events: [], state };

  const resolved = resolveLockRow(state.grid, current);
  if (resolved === null) {
    return {
      events: [{ kind: "GameOver", reason: "lockConflict" }],
      state: endSession(state, "lockConflict"),
    };
  }

  return {
    events: [
      {
        kind: "Locked",
        lifted: resolved.lifted,
        pieceId: current.piece.id,
        source,
      },
    ],
    state: {
      ...state,
      current: null,
      grid: stampPiece(state.grid, resolved.active),
    },
  };
}

/**
 * Lock → clear → spawn, stopping early if the lock ends the session.
 */
export function settleActivePiece(
  state: SessionState,
  source: LockSource,
): { state: SessionState; events: Array<DomainEvent> } {
  const locked = lockActivePiece(state, source);
  if (isGameOver(locked.state)) return locked;

  const cleared = applyLineClear(locked.state);
  const spawned = spawnNext(cleared.state);
  return {
    events: [...locked.events, ...cleared.events, ...spawned.events],
    state: spawned.state,
  };
}
