import {
  applyGravity,
  tryHardDrop,
  tryMoveLeft,
  tryMoveRight,
  tryRotate,
  trySoftDrop,
  type GameplayResult,
} from "../gameplay/movement";
import { applyCountdownExpiry } from "../gameplay/penalty";
import { canPause, isGameOver, isPaused } from "../types";

import type { Command } from "../commands";
import type { DomainEvent, RejectReason } from "../events";
import type { SessionState } from "../types";

export type CommandResult = {
  state: SessionState;
  events: ReadonlyArray<DomainEvent>;
  applied: boolean;
};

function rejected(
  state: SessionState,
  cmd: Command,
  reason: RejectReason,
): CommandResult {
  return {
    applied: false,
    events: [{ command: cmd.kind, kind: "CommandRejected", reason }],
    state,
  };
}

/**
 * Shared gate for everything that touches the active piece
 */
function gate(state: SessionState): RejectReason | null {
  if (isGameOver(state)) return "gameOver";
  if (isPaused(state)) return "paused";
  if (!state.current) return "noPiece";
  return null;
}

function fromGameplay(cmd: Command, r: GameplayResult): CommandResult {
  if (!r.applied) return rejected(r.state, cmd, "blocked");
  return { applied: true, events: r.events, state: r.state };
}

/**
 * Handles TogglePause command
 */
function handleTogglePause(state: SessionState): CommandResult {
  if (isGameOver(state)) {
    return {
      applied: false,
      events: [{ kind: "PauseRejected", reason: "gameOver" }],
      state,
    };
  }
  if (!canPause(state.difficulty)) {
    return {
      applied: false,
      events: [{ kind: "PauseRejected", reason: "hardMode" }],
      state,
    };
  }
  const paused = !isPaused(state);
  return {
    applied: true,
    events: [{ kind: "PauseToggled", paused }],
    state: { ...state, phase: paused ? "paused" : "active" },
  };
}

/**
 * Handles CountdownExpired command. Only HARD sessions run the countdown.
 */
function handleCountdownExpired(
  state: SessionState,
  cmd: Command,
): CommandResult {
  if (state.difficulty !== "HARD") return rejected(state, cmd, "blocked");
  const r = applyCountdownExpiry(state);
  return { applied: true, events: r.events, state: r.state };
}

/**
 * Maps commands to their appropriate handlers
 */
function getCommandHandler(cmd: Command, state: SessionState): CommandResult {
  switch (cmd.kind) {
    case "MoveLeft":
      return fromGameplay(cmd, tryMoveLeft(state));
    case "MoveRight":
      return fromGameplay(cmd, tryMoveRight(state));
    case "SoftDrop":
      return fromGameplay(cmd, trySoftDrop(state));
    case "Rotate":
      return fromGameplay(cmd, tryRotate(state));
    case "HardDrop":
      return fromGameplay(cmd, tryHardDrop(state));
    case "GravityTick":
      return fromGameplay(cmd, applyGravity(state));
    case "CountdownExpired":
      return handleCountdownExpired(state, cmd);
    case "TogglePause":
      return handleTogglePause(state);
  }
}

export function applyCommand(state: SessionState, cmd: Command): CommandResult {
  if (cmd.kind === "TogglePause") return handleTogglePause(state);
  const reason = gate(state);
  if (reason !== null) return rejected(state, cmd, reason);
  return getCommandHandler(cmd, state);
}
