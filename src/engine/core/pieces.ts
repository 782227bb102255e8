import { type Piece, type PieceId, type ShapeMatrix } from "./types";

import type { PieceRandomGenerator } from "./rng/interface";

type PieceDefinition = {
  readonly id: PieceId;
  readonly color: string;
  readonly shape: ShapeMatrix;
};

export const PIECES: Readonly<Record<PieceId, PieceDefinition>> = {
  I: {
    color: "#00FFFF", // cyan
    id: "I",
    shape: [
      [0, 0, 0, 0],
      [1, 1, 1, 1],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
    ],
  },
  J: {
    color: "#0000FF", // blue
    id: "J",
    shape: [
      [1, 0, 0],
      [1, 1, 1],
      [0, 0, 0],
    ],
  },
  L: {
    color: "#FFA500", // orange
    id: "L",
    shape: [
      [0, 0, 1],
      [1, 1, 1],
      [0, 0, 0],
    ],
  },
  O: {
    color: "#FFFF00", // yellow
    id: "O",
    shape: [
      [1, 1],
      [1, 1],
    ],
  },
  S: {
    color: "#00FF00", // green
    id: "S",
    shape: [
      [0, 1, 1],
      [1, 1, 0],
      [0, 0, 0],
    ],
  },
  T: {
    color: "#FF00FF", // magenta
    id: "T",
    shape: [
      [0, 1, 0],
      [1, 1, 1],
      [0, 0, 0],
    ],
  },
  Z: {
    color: "#FF0000", // red
    id: "Z",
    shape: [
      [1, 1, 0],
      [0, 1, 1],
      [0, 0, 0],
    ],
  },
};

export function copyShape(shape: ShapeMatrix): ShapeMatrix {
  return shape.map((row) => [...row]);
}

/**
 * Create a piece in its canonical orientation with its own matrix storage.
 */
export function createPiece(id: PieceId): Piece {
  const def = PIECES[id];
  return { color: def.color, id, shape: copyShape(def.shape) };
}

/**
 * Deep-independent duplicate: same id, color and logical shape, new storage.
 */
export function copyPiece(piece: Piece): Piece {
  return { color: piece.color, id: piece.id, shape: copyShape(piece.shape) };
}

// Whole-shape replacement, the only way a piece changes after creation
export function withShape(piece: Piece, shape: ShapeMatrix): Piece {
  return { ...piece, shape: copyShape(shape) };
}

export function randomPiece(rng: PieceRandomGenerator): {
  piece: Piece;
  newRng: PieceRandomGenerator;
} {
  const { newRng, piece } = rng.getNextPiece();
  return { newRng, piece: createPiece(piece) };
}

export function shapeWidth(shape: ShapeMatrix): number {
  return shape[0]?.length ?? 0;
}

export function shapeHeight(shape: ShapeMatrix): number {
  return shape.length;
}

/**
 * Number of leading rows with no filled cell.
 */
export function topEmptyRows(shape: ShapeMatrix): number {
  let empty = 0;
  for (const row of shape) {
    if (row.some((bit) => bit !== 0)) break;
    empty++;
  }
  return empty;
}
