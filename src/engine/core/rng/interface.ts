import { type PieceId } from "../types";

/**
 * Interface for piece random generators.
 * Production sessions draw uniformly; tests substitute fixed sequences.
 */
export type PieceRandomGenerator = {
  /**
   * Get the next piece from this generator
   * Returns the piece and a new generator state (immutable pattern)
   */
  getNextPiece(): {
    piece: PieceId;
    newRng: PieceRandomGenerator;
  };
};
