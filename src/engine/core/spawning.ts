import { collides } from "./board";
import { shapeWidth, topEmptyRows } from "./pieces";
import {
  type ActivePiece,
  type Grid,
  type Piece,
  BOARD_COLS,
  createGridCoord,
} from "./types";

// Leftmost column a wide shape may be centered to
const MIN_SPAWN_COL = -2;

// Lateral shifts tried, in order, when the centered spawn is blocked
export const SPAWN_SHIFTS: ReadonlyArray<number> = [-1, 1, -2, 2];

/**
 * Centered column and a row that hides the shape's empty leading rows
 * above the board, so the first filled row enters at row 0.
 */
export function spawnOrigin(piece: Piece): { row: number; col: number } {
  const col = Math.max(
    MIN_SPAWN_COL,
    Math.floor((BOARD_COLS - shapeWidth(piece.shape)) / 2),
  );
  const hidden = topEmptyRows(piece.shape);
  return { col, row: hidden === 0 ? 0 : -hidden };
}

export type SpawnPlacement = {
  active: ActivePiece;
  shift: number; // 0 when the centered origin was free
};

/**
 * Place a piece at its spawn origin, falling back to small lateral shifts.
 * Returns null when every candidate collides (block out).
 */
export function findSpawnPlacement(
  grid: Grid,
  piece: Piece,
): SpawnPlacement | null {
  const { col, row } = spawnOrigin(piece);
  for (const shift of [0, ...SPAWN_SHIFTS]) {
    if (!collides(grid, piece.shape, row, col + shift)) {
      return {
        active: {
          col: createGridCoord(col + shift),
          piece,
          row: createGridCoord(row),
        },
        shift,
      };
    }
  }
  return null;
}

/**
 * The unshifted spawn placement, used when reporting a block out.
 */
export function blockedSpawnPlacement(piece: Piece): ActivePiece {
  const { col, row } = spawnOrigin(piece);
  return { col: createGridCoord(col), piece, row: createGridCoord(row) };
}
