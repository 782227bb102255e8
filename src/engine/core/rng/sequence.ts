import { type PieceId } from "../types";

import { type PieceRandomGenerator } from "./interface";

/**
 * RNG that yields a fixed sequence and then repeats.
 * Each call returns a new RNG instance with advanced index (immutable style).
 */
export class SequenceRng implements PieceRandomGenerator {
  constructor(
    private readonly sequence: ReadonlyArray<PieceId>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
  }

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const piece = this.sequence[this.index];
    if (piece === undefined) throw new Error("Sequence index out of bounds");
    const nextIndex = (this.index + 1) % this.sequence.length;
    return { newRng: new SequenceRng(this.sequence, nextIndex), piece };
  }
}
