import { tryMove } from "../core/board";
import { tryRotateWithKickInfo } from "../core/rotation";
import { gridCoordAsNumber } from "../core/types";

import { settleActivePiece } from "./lock";

import type { DomainEvent } from "../events";
import type { SessionState } from "../types";

export type GameplayResult = {
  state: SessionState;
  events: Array<DomainEvent>;
  applied: boolean;
};

function unchanged(state: SessionState): GameplayResult {
  return { applied: false, events: [], state };
}

function tryShift(state: SessionState, dCol: -1 | 1): GameplayResult {
  if (!state.current) return unchanged(state);
  const moved = tryMove(state.grid, state.current, 0, dCol);
  if (!moved) return unchanged(state);
  return {
    applied: true,
    events: [
      {
        col: gridCoordAsNumber(moved.col),
        dir: dCol < 0 ? "left" : "right",
        kind: "Moved",
        row: gridCoordAsNumber(moved.row),
      },
    ],
    state: { ...state, current: moved },
  };
}

export function tryMoveLeft(state: SessionState): GameplayResult {
  return tryShift(state, -1);
}

export function tryMoveRight(state: SessionState): GameplayResult {
  return tryShift(state, 1);
}

/**
 * One row down by player input, worth softDropPoints. Blocked is a no-op:
 * soft drop never locks.
 */
export function trySoftDrop(state: SessionState): GameplayResult {
  if (!state.current) return unchanged(state);
  const moved = tryMove(state.grid, state.current, 1, 0);
  if (!moved) return unchanged(state);
  const points = state.cfg.softDropPoints;
  return {
    applied: true,
    events: [
      {
        col: gridCoordAsNumber(moved.col),
        dir: "down",
        kind: "Moved",
        row: gridCoordAsNumber(moved.row),
      },
      { kind: "SoftDropped", points },
    ],
    state: { ...state, current: moved, score: state.score + points },
  };
}

export function tryRotate(state: SessionState): GameplayResult {
  if (!state.current) return unchanged(state);
  const r = tryRotateWithKickInfo(state.grid, state.current);
  if (r.active === null) return unchanged(state);
  return {
    applied: true,
    events: [
      { kickIndex: r.kickIndex, kickOffset: r.kickOffset, kind: "Rotated" },
    ],
    state: { ...state, current: r.active },
  };
}

/**
 * Fall row by row (hardDropPointsPerRow each) until blocked, then settle.
 */
export function tryHardDrop(state: SessionState): GameplayResult {
  if (!state.current) return unchanged(state);

  let active = state.current;
  let rows = 0;
  for (;;) {
    const moved = tryMove(state.grid, active, 1, 0);
    if (!moved) break;
    active = moved;
    rows++;
  }

  const points = rows * state.cfg.hardDropPointsPerRow;
  const dropped: SessionState = {
    ...state,
    current: active,
    score: state.score + points,
  };
  const settled = settleActivePiece(dropped, "hardDrop");
  return {
    applied: true,
    events: [{ kind: "HardDropped", points, rows }, ...settled.events],
    state: settled.state,
  };
}

/**
 * Gravity step: one row down, or settle the piece when it cannot fall.
 */
export function applyGravity(state: SessionState): GameplayResult {
  if (!state.current) return unchanged(state);
  const moved = tryMove(state.grid, state.current, 1, 0);
  if (moved) {
    return {
      applied: true,
      events: [
        {
          col: gridCoordAsNumber(moved.col),
          dir: "down",
          kind: "Moved",
          row: gridCoordAsNumber(moved.row),
        },
      ],
      state: { ...state, current: moved },
    };
  }
  const settled = settleActivePiece(state, "gravity");
  return { applied: true, events: settled.events, state: settled.state };
}
