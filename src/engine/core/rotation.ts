// Rotation with a fixed kick search
//
// A rotation is a clockwise 90° transform of the shape matrix. The rotated
// shape is then tried at each offset of KICK_OFFSETS, in order; the first
// offset that does not collide wins. The order is part of the game rules:
// identical inputs must resolve to identical positions.
import { collides } from "./board";
import { PIECES, withShape } from "./pieces";
import {
  type ActivePiece,
  type Grid,
  type PieceId,
  type ShapeBit,
  type ShapeMatrix,
  createGridCoord,
  gridCoordAsNumber,
} from "./types";

// [dRow, dCol]: none, left 1, right 1, left 2, right 2, up 1, down 1
export const KICK_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [0, 0],
  [0, -1],
  [0, 1],
  [0, -2],
  [0, 2],
  [-1, 0],
  [1, 0],
];

/**
 * Clockwise rotation: new[j][n-1-i] = old[i][j]; an n×m shape becomes m×n.
 */
export function rotateShape(shape: ShapeMatrix): ShapeMatrix {
  const n = shape.length;
  const m = shape[0]?.length ?? 0;
  const out: Array<Array<ShapeBit>> = Array.from({ length: m }, () =>
    Array<ShapeBit>(n).fill(0),
  );
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < m; j++) {
      const target = out[j];
      if (target) target[n - 1 - i] = shape[i]?.[j] ?? 0;
    }
  }
  return out;
}

function sameShape(a: ShapeMatrix, b: ShapeMatrix): boolean {
  return (
    a.length === b.length &&
    a.every(
      (row, i) =>
        row.length === b[i]?.length && row.every((bit, j) => bit === b[i]?.[j]),
    )
  );
}

/**
 * True when `shape` is the canonical matrix of `id` turned 0-3 times.
 */
export function isOrientationOf(id: PieceId, shape: ShapeMatrix): boolean {
  let candidate = PIECES[id].shape;
  for (let turn = 0; turn < 4; turn++) {
    if (sameShape(candidate, shape)) return true;
    candidate = rotateShape(candidate);
  }
  return false;
}

/**
 * Result of attempting a rotation with kick information
 */
export type RotateResult = {
  active: ActivePiece | null;
  kickIndex: number; // -1 if failed, 0+ for the offset that fit
  kickOffset: readonly [number, number];
};

export function tryRotateWithKickInfo(
  grid: Grid,
  active: ActivePiece,
): RotateResult {
  const rotated = rotateShape(active.piece.shape);
  const row = gridCoordAsNumber(active.row);
  const col = gridCoordAsNumber(active.col);

  for (let i = 0; i < KICK_OFFSETS.length; i++) {
    const kick = KICK_OFFSETS[i];
    if (!kick) continue;
    const [dRow, dCol] = kick;
    if (!collides(grid, rotated, row + dRow, col + dCol)) {
      return {
        active: {
          col: createGridCoord(col + dCol),
          piece: withShape(active.piece, rotated),
          row: createGridCoord(row + dRow),
        },
        kickIndex: i,
        kickOffset: kick,
      };
    }
  }

  return { active: null, kickIndex: -1, kickOffset: [0, 0] };
}

// Perform a rotation with kicks, returns the new placement or null if no offset fits
export function tryRotate(grid: Grid, active: ActivePiece): ActivePiece | null {
  return tryRotateWithKickInfo(grid, active).active;
}
