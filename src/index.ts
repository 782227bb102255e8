// Public surface of the engine

export { GameSession } from "./runtime/session";
export type {
  DispatchResult,
  RestoreResult,
  SessionListener,
  SessionOptions,
} from "./runtime/session";
export { CountdownClock, IntervalClock } from "./runtime/clocks";
export { LifecycleMachineService } from "./runtime/lifecycle.machine";
export type { LifecycleState } from "./runtime/lifecycle.machine";
export { createScoreEntry } from "./runtime/leaderboard";
export type { LeaderboardSink, ScoreEntry } from "./runtime/leaderboard";

export { init, step, stepN } from "./engine/index";
export {
  DEFAULT_ENGINE_CONFIG,
  DIFFICULTIES,
  createEngineConfig,
  isDifficulty,
} from "./engine/config";
export type { EngineConfigOverrides } from "./engine/config";
export {
  exportSnapshot,
  parseSnapshot,
  restoreState,
  SNAPSHOT_VERSION,
} from "./engine/snapshot";
export type { GameSnapshot, ParseResult } from "./engine/snapshot";
export { encodeSnapshot, decodeSnapshot } from "./app/snapshot-codec";
export { selectSessionView, formatTimerDisplay } from "./engine/selectors";
export type { SessionView, CellView, PieceView } from "./engine/selectors";

export {
  PIECES,
  createPiece,
  copyPiece,
  randomPiece,
} from "./engine/core/pieces";
export { collides, stampPiece, tryMove } from "./engine/core/board";
export { KICK_OFFSETS, rotateShape, tryRotate } from "./engine/core/rotation";
export { clearFullRows } from "./engine/scoring/line-clear";
export { levelForLines, scoreForLines } from "./engine/scoring/score";
export { gravityIntervalMs } from "./engine/physics/gravity";
export { createUniformRng } from "./engine/core/rng/uniform";
export { SequenceRng } from "./engine/core/rng/sequence";
export { OnePieceRng } from "./engine/core/rng/one-piece";

export type { Command } from "./engine/commands";
export type { DomainEvent } from "./engine/events";
export type {
  ActivePiece,
  Difficulty,
  EngineConfig,
  Grid,
  Piece,
  PieceId,
  PieceRandomGenerator,
  SessionState,
} from "./engine/types";
