// Board dimensions
export const BOARD_COLS = 10 as const;
export const BOARD_ROWS = 20 as const; // rows 0..19, negative rows are open sky

// Grid coordinates - for board positions (must be integers, may be negative)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };
export const gridCoordAsNumber = (g: GridCoord): number => g as number;

// GridCoord constructors and guards
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

export function isGridCoord(n: unknown): n is GridCoord {
  return typeof n === "number" && Number.isInteger(n);
}

export function assertGridCoord(n: unknown): asserts n is GridCoord {
  if (!isGridCoord(n)) throw new Error("Not a valid GridCoord");
}

// Pieces
export const PIECE_IDS = ["I", "J", "L", "O", "S", "T", "Z"] as const;
export type PieceId = (typeof PIECE_IDS)[number];

export function isPieceId(u: unknown): u is PieceId {
  return typeof u === "string" && (PIECE_IDS as ReadonlyArray<string>).includes(u);
}

export type ShapeBit = 0 | 1;
// Rectangular, row-major; 1 marks a filled cell
export type ShapeMatrix = ReadonlyArray<ReadonlyArray<ShapeBit>>;

export type Piece = {
  readonly id: PieceId;
  readonly color: string; // display tag only
  readonly shape: ShapeMatrix;
};

export type ActivePiece = {
  readonly piece: Piece;
  readonly row: GridCoord;
  readonly col: GridCoord;
};

// Grid: BOARD_ROWS rows of BOARD_COLS cells, null = empty, PieceId = occupant
export type Cell = PieceId | null;
export type GridRow = ReadonlyArray<Cell>;
export type Grid = ReadonlyArray<GridRow>;
