import {
  type ActivePiece,
  type Cell,
  type Grid,
  type GridRow,
  type ShapeMatrix,
  BOARD_COLS,
  BOARD_ROWS,
  createGridCoord,
  gridCoordAsNumber,
} from "./types";

export function createEmptyRow(): GridRow {
  return Array<Cell>(BOARD_COLS).fill(null);
}

export function createEmptyGrid(): Grid {
  return Array.from({ length: BOARD_ROWS }, () => createEmptyRow());
}

// Fresh storage for every row; callers may hand the result to code that mutates
export function cloneGrid(grid: Grid): Array<Array<Cell>> {
  return grid.map((row) => [...row]);
}

export function getCell(grid: Grid, row: number, col: number): Cell {
  return grid[row]?.[col] ?? null;
}

/**
 * Shape-at-offset test against the grid and the walls.
 * Cells mapped above row 0 never collide: the board stores nothing up there.
 */
export function collides(
  grid: Grid,
  shape: ShapeMatrix,
  row: number,
  col: number,
): boolean {
  for (let i = 0; i < shape.length; i++) {
    const bits = shape[i] ?? [];
    for (let j = 0; j < bits.length; j++) {
      if (bits[j] === 0) continue;
      const r = row + i;
      const c = col + j;
      if (c < 0 || c >= BOARD_COLS || r >= BOARD_ROWS) return true;
      if (r >= 0 && getCell(grid, r, c) !== null) return true;
    }
  }
  return false;
}

export function canPlace(grid: Grid, active: ActivePiece): boolean {
  return !collides(
    grid,
    active.piece.shape,
    gridCoordAsNumber(active.row),
    gridCoordAsNumber(active.col),
  );
}

// Return a new position if valid; otherwise null. Keeps callers pure and branchy.
export function tryMove(
  grid: Grid,
  active: ActivePiece,
  dRow: number,
  dCol: number,
): ActivePiece | null {
  const row = gridCoordAsNumber(active.row) + dRow;
  const col = gridCoordAsNumber(active.col) + dCol;
  if (collides(grid, active.piece.shape, row, col)) return null;
  return {
    ...active,
    col: createGridCoord(col),
    row: createGridCoord(row),
  };
}

// Rows the piece can still fall before it rests
export function dropDistance(grid: Grid, active: ActivePiece): number {
  let d = 0;
  while (tryMove(grid, active, d + 1, 0) !== null) d++;
  return d;
}

/**
 * Write every filled cell of the piece into a copy of the grid.
 * Cells outside the board (including above row 0) are dropped.
 */
export function stampPiece(grid: Grid, active: ActivePiece): Grid {
  const out = cloneGrid(grid);
  const { shape, id } = active.piece;
  const baseRow = gridCoordAsNumber(active.row);
  const baseCol = gridCoordAsNumber(active.col);

  for (let i = 0; i < shape.length; i++) {
    const bits = shape[i] ?? [];
    for (let j = 0; j < bits.length; j++) {
      if (bits[j] === 0) continue;
      const r = baseRow + i;
      const c = baseCol + j;
      if (r < 0 || r >= BOARD_ROWS || c < 0 || c >= BOARD_COLS) continue;
      const target = out[r];
      if (target) target[c] = id;
    }
  }

  return out;
}

export function isRowFull(row: GridRow): boolean {
  return row.every((cell) => cell !== null);
}

export function isRowEmpty(row: GridRow): boolean {
  return row.every((cell) => cell === null);
}
