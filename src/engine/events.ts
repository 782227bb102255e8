import type { CommandKind } from "./commands";
import type { GameOverReason, PieceId } from "./types";

export type LockSource = "gravity" | "hardDrop" | "countdown";

export type RejectReason = "gameOver" | "paused" | "noPiece" | "blocked";

export type DomainEvent =
  | {
      kind: "PieceSpawned";
      pieceId: PieceId;
      nextId: PieceId;
      row: number;
      col: number;
      shift: number;
    }
  | { kind: "Moved"; dir: "left" | "right" | "down"; row: number; col: number }
  | {
      kind: "Rotated";
      kickIndex: number;
      kickOffset: readonly [number, number];
    }
  | { kind: "SoftDropped"; points: number }
  | { kind: "HardDropped"; rows: number; points: number }
  | { kind: "Locked"; pieceId: PieceId; source: LockSource; lifted: number }
  | {
      kind: "LinesCleared";
      count: number;
      points: number;
      lines: number;
    }
  | { kind: "LevelChanged"; level: number; gravityMs: number }
  | { kind: "PauseToggled"; paused: boolean }
  | { kind: "PauseRejected"; reason: "hardMode" | "gameOver" }
  | { kind: "HardError"; errors: number }
  | { kind: "GameOver"; reason: GameOverReason }
  | { kind: "CommandRejected"; command: CommandKind; reason: RejectReason };
