import { copyPiece, randomPiece } from "../core/pieces";
import {
  blockedSpawnPlacement,
  findSpawnPlacement,
} from "../core/spawning";
import { gridCoordAsNumber } from "../core/types";
import { endSession } from "../types";

import type { DomainEvent } from "../events";
import type { SessionState } from "../types";

/**
 * Single source of truth for spawning: promote a copy of the preview piece,
 * draw a fresh preview, and place the new piece (with lateral recovery).
 * A spawn that cannot be placed ends the session with a block out.
 */
export function spawnNext(state: SessionState): {
  state: SessionState;
  events: Array<DomainEvent>;
} {
  const piece = copyPiece(state.next);
  const drawn = randomPiece(state.rng);
  const base: SessionState = { ...state, next: drawn.piece, rng: drawn.newRng };

  const placement = findSpawnPlacement(base.grid, piece);
  if (placement === null) {
    const blocked = { ...base, current: blockedSpawnPlacement(piece) };
    return {
      events: [{ kind: "GameOver", reason: "blockOut" }],
      state: endSession(blocked, "blockOut"),
    };
  }

  const { active, shift } = placement;
  return {
    events: [
      {
        col: gridCoordAsNumber(active.col),
        kind: "PieceSpawned",
        nextId: drawn.piece.id,
        pieceId: piece.id,
        row: gridCoordAsNumber(active.row),
        shift,
      },
    ],
    state: { ...base, current: active },
  };
}
