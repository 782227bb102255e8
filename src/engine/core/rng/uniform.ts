import { createSeed, seedAsString, type Seed } from "../../../types/brands";

import { PIECE_IDS, type PieceId } from "../types";

import type { PieceRandomGenerator } from "./interface";

// Seedable uniform state: every draw is independent over the 7 ids
export type UniformRngState = {
  readonly seed: Seed;
  readonly internalSeed: number;
};

// Simple string hash (FNV-1a, 32-bit) for stable seeds
function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Linear Congruential Generator step
function nextRandom(seed: number): number {
  return (Math.imul(seed, 1664525) + 1013904223) >>> 0;
}

export function createUniformState(seed: Seed): UniformRngState {
  return { internalSeed: hashString(seedAsString(seed)), seed };
}

export function drawPiece(state: UniformRngState): {
  piece: PieceId;
  next: UniformRngState;
} {
  const internalSeed = nextRandom(state.internalSeed);
  // High bits mapped to [0, 7)
  const index = Math.floor((internalSeed / 4294967296) * PIECE_IDS.length);
  const piece = PIECE_IDS[index];
  if (piece === undefined) {
    throw new Error("Uniform draw produced an out-of-range index");
  }
  return { next: { ...state, internalSeed }, piece };
}

export class UniformRng implements PieceRandomGenerator {
  constructor(private readonly state: UniformRngState) {}

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const { next, piece } = drawPiece(this.state);
    return { newRng: new UniformRng(next), piece };
  }

  getState(): UniformRngState {
    return this.state;
  }
}

/**
 * Create a uniform generator. Without a seed, one is derived from the clock.
 */
export function createUniformRng(seed?: string): PieceRandomGenerator {
  const s = createSeed(
    seed ?? `${Date.now().toString(36)}:${Math.random().toString(36)}`,
  );
  return new UniformRng(createUniformState(s));
}
