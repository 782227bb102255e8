import { endSession, isGameOver } from "../types";

import { settleActivePiece } from "./lock";

import type { DomainEvent } from "../events";
import type { SessionState } from "../types";

/**
 * HARD countdown expiry: the piece is locked where it stands, play moves on
 * to the next piece and one error is charged. Reaching maxHardErrors ends
 * the session.
 */
export function applyCountdownExpiry(state: SessionState): {
  state: SessionState;
  events: Array<DomainEvent>;
} {
  const settled = settleActivePiece(state, "countdown");
  const hardErrors = Math.min(state.cfg.maxHardErrors, state.hardErrors + 1);
  const events: Array<DomainEvent> = [
    ...settled.events,
    { errors: hardErrors, kind: "HardError" },
  ];
  let next: SessionState = { ...settled.state, hardErrors };

  if (!isGameOver(next) && hardErrors >= state.cfg.maxHardErrors) {
    next = endSession(next, "hardErrors");
    events.push({ kind: "GameOver", reason: "hardErrors" });
  }

  return { events, state: next };
}
