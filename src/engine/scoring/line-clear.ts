import { cloneGrid, createEmptyRow, isRowFull } from "../core/board";
import { type Grid, BOARD_ROWS } from "../core/types";
import { currentGravityMs } from "../physics/gravity";

import { levelForLines, scoreForLines } from "./score";

import type { DomainEvent } from "../events";
import type { SessionState } from "../types";

/**
 * Scan from the bottom row up. A full row is removed by shifting every row
 * above it down by one and emptying row 0; the same index is then examined
 * again, since it now holds the row that was above.
 */
export function clearFullRows(grid: Grid): { grid: Grid; cleared: number } {
  const rows = cloneGrid(grid);
  let cleared = 0;

  for (let r = BOARD_ROWS - 1; r >= 0; r--) {
    const row = rows[r];
    if (!row || !isRowFull(row)) continue;

    cleared++;
    for (let rr = r; rr > 0; rr--) {
      rows[rr] = [...(rows[rr - 1] ?? createEmptyRow())];
    }
    rows[0] = [...createEmptyRow()];
    r++; // re-check same index after shift
  }

  return { cleared, grid: cleared > 0 ? rows : grid };
}

/**
 * Clear full rows and apply the batch to score, lines and level.
 */
export function applyLineClear(state: SessionState): {
  state: SessionState;
  events: Array<DomainEvent>;
} {
  const { cleared, grid } = clearFullRows(state.grid);
  if (cleared === 0) return { events: [], state };

  const points = scoreForLines(cleared, state.level);
  const lines = state.lines + cleared;
  const level = levelForLines(lines, state.cfg.linesPerLevel);
  const next: SessionState = {
    ...state,
    grid,
    level,
    lines,
    score: state.score + points,
  };

  const events: Array<DomainEvent> = [
    { count: cleared, kind: "LinesCleared", lines, points },
  ];
  if (level !== state.level) {
    events.push({
      gravityMs: currentGravityMs(next),
      kind: "LevelChanged",
      level,
    });
  }
  return { events, state: next };
}
