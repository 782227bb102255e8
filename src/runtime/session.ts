import { DEFAULT_ENGINE_CONFIG, isDifficulty } from "../engine/config";
import { createUniformRng } from "../engine/core/rng/uniform";
import { init, step } from "../engine/index";
import { currentGravityMs } from "../engine/physics/gravity";
import { selectSessionView, type SessionView } from "../engine/selectors";
import {
  exportSnapshot,
  parseSnapshot,
  restoreState,
  type GameSnapshot,
} from "../engine/snapshot";
import { DEFAULT_PLAYER_NAME, isGameOver } from "../engine/types";
import { debugLog } from "../utils/debug";

import { CountdownClock, IntervalClock } from "./clocks";
import {
  createScoreEntry,
  type LeaderboardSink,
  type ScoreEntry,
} from "./leaderboard";
import {
  LifecycleMachineService,
  type ClockEffect,
  type LifecycleState,
} from "./lifecycle.machine";

import type { Command } from "../engine/commands";
import type { DomainEvent } from "../engine/events";
import type {
  Difficulty,
  EngineConfig,
  PieceRandomGenerator,
  SessionState,
} from "../engine/types";
import type { Timestamp } from "../types/timestamp";

export type SessionListener = (
  view: SessionView,
  events: ReadonlyArray<DomainEvent>,
) => void;

export type SessionOptions = {
  cfg?: EngineConfig;
  /** Generator for each new or restored session; clock-seeded by default. */
  rngFactory?: () => PieceRandomGenerator;
};

export type RestoreResult =
  | { restored: true }
  | { restored: false; reason: string };

/**
 * "queued" means the command was issued from inside a listener and will run
 * after the current one.
 */
export type DispatchResult = "applied" | "rejected" | "queued";

/**
 * Hosts one live session. Input commands and clock firings are serialized
 * through a single FIFO queue; each one is a single pure engine step.
 */
export class GameSession {
  private state: SessionState | null = null;
  private readonly cfg: EngineConfig;
  private readonly rngFactory: () => PieceRandomGenerator;
  private readonly lifecycle = new LifecycleMachineService();
  private readonly gravity: IntervalClock;
  private readonly countdown: CountdownClock;
  private readonly listeners = new Set<SessionListener>();
  private queue: Array<Command> = [];
  private draining = false;

  constructor(opts: SessionOptions = {}) {
    this.cfg = opts.cfg ?? DEFAULT_ENGINE_CONFIG;
    this.rngFactory =
      opts.rngFactory ?? ((): PieceRandomGenerator => createUniformRng());
    this.gravity = new IntervalClock(
      "gravity",
      this.cfg.baseGravityMs.EASY,
      () => {
        this.dispatch({ kind: "GravityTick" });
      },
    );
    this.countdown = new CountdownClock(
      this.cfg.countdownSeconds,
      this.cfg.countdownTickMs,
      {
        onExpire: () => {
          this.dispatch({ kind: "CountdownExpired" });
        },
        onTick: () => {
          this.notify([]);
        },
      },
    );
  }

  // --- lifecycle ---

  startNew(player: string | null | undefined, difficulty: Difficulty): void {
    const r = init({
      cfg: this.cfg,
      difficulty,
      player,
      rng: this.rngFactory(),
    });
    this.replace(r.state, r.events);
  }

  /**
   * Replace the live session with a snapshot. Malformed input starts a fresh
   * session instead, keeping whatever player and difficulty could be read.
   */
  loadFromSnapshot(snapshot: unknown): RestoreResult {
    const parsed = parseSnapshot(snapshot);
    if (!parsed.ok) {
      debugLog("session", "snapshot rejected, starting fresh", {
        reason: parsed.reason,
      });
      const { difficulty, player } = salvageIdentity(snapshot);
      this.startNew(player, difficulty);
      return { reason: parsed.reason, restored: false };
    }

    const r = restoreState(parsed.snapshot, {
      cfg: this.cfg,
      rng: this.rngFactory(),
    });
    this.replace(r.state, r.events);
    debugLog("session", "snapshot restored", {
      difficulty: r.state.difficulty,
      score: r.state.score,
    });
    return { restored: true };
  }

  exportSnapshot(): GameSnapshot | null {
    return this.state ? exportSnapshot(this.state) : null;
  }

  /**
   * Halt both clocks for good. The session stays readable and playable by
   * command, but nothing restarts a clock until the next startNew or restore.
   */
  stopTimers(): void {
    this.applyEffects(this.lifecycle.send({ type: "STOP" }));
    this.haltClocks();
  }

  /** Stop the clocks and drop the session; the instance can be restarted. */
  dispose(): void {
    this.queue = [];
    this.stopTimers();
    this.state = null;
  }

  // --- commands ---

  moveLeft(): boolean {
    return this.dispatch({ kind: "MoveLeft" }) === "applied";
  }

  moveRight(): boolean {
    return this.dispatch({ kind: "MoveRight" }) === "applied";
  }

  softDrop(): boolean {
    return this.dispatch({ kind: "SoftDrop" }) === "applied";
  }

  rotate(): boolean {
    return this.dispatch({ kind: "Rotate" }) === "applied";
  }

  hardDrop(): boolean {
    return this.dispatch({ kind: "HardDrop" }) === "applied";
  }

  togglePause(): boolean {
    return this.dispatch({ kind: "TogglePause" }) === "applied";
  }

  /**
   * Enqueue a command. Outside a listener it runs to completion, together
   * with anything listeners enqueue while it is being reported.
   */
  dispatch(cmd: Command): DispatchResult {
    if (!this.state) return "rejected";
    this.queue.push(cmd);
    if (this.draining) return "queued";

    this.draining = true;
    let result: DispatchResult = "rejected";
    let first = true;
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        const applied = this.run(next);
        if (first) result = applied ? "applied" : "rejected";
        first = false;
      }
    } finally {
      this.draining = false;
    }
    return result;
  }

  // --- reads ---

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getView(): SessionView | null {
    return this.state
      ? selectSessionView(this.state, this.countdown.remaining)
      : null;
  }

  getState(): SessionState | null {
    return this.state;
  }

  getLifecycleState(): LifecycleState {
    return this.lifecycle.getState().state;
  }

  get gravityRunning(): boolean {
    return this.gravity.running;
  }

  get countdownRunning(): boolean {
    return this.countdown.running;
  }

  /**
   * Report the current score to the leaderboard collaborator.
   */
  async submitScore(
    sink: LeaderboardSink,
    timestamp?: Timestamp,
  ): Promise<ScoreEntry | null> {
    if (!this.state) return null;
    const entry = createScoreEntry(this.state, timestamp);
    await sink.submit(entry);
    debugLog("session", "score submitted", entry);
    return entry;
  }

  // --- internals ---

  private replace(
    state: SessionState,
    events: ReadonlyArray<DomainEvent>,
  ): void {
    this.queue = [];
    this.haltClocks();
    this.state = state;
    this.applyEffects(
      this.lifecycle.send({ difficulty: state.difficulty, type: "START" }),
    );
    this.react(events);
    if (isGameOver(state)) {
      this.applyEffects(this.lifecycle.send({ type: "END" }));
    }
    this.notify(events);
  }

  private run(cmd: Command): boolean {
    const state = this.state;
    if (!state) return false;
    const r = step(state, cmd);
    this.state = r.state;
    this.react(r.events);
    if (r.events.length > 0) this.notify(r.events);
    return r.applied;
  }

  // Clock side of the domain events
  private react(events: ReadonlyArray<DomainEvent>): void {
    for (const e of events) {
      switch (e.kind) {
        case "PieceSpawned":
          if (
            this.state?.difficulty === "HARD" &&
            this.getLifecycleState() === "running"
          ) {
            this.countdown.restart();
          }
          break;
        case "LevelChanged":
          this.gravity.setPeriod(e.gravityMs);
          break;
        case "PauseToggled":
          this.applyEffects(
            this.lifecycle.send({ type: e.paused ? "PAUSE" : "RESUME" }),
          );
          break;
        case "GameOver":
          this.applyEffects(this.lifecycle.send({ type: "END" }));
          debugLog("session", "game over", { reason: e.reason });
          break;
        default:
          break;
      }
    }
  }

  private applyEffects(effects: ReadonlyArray<ClockEffect>): void {
    for (const effect of effects) {
      switch (effect) {
        case "startClocks":
          this.startClocks();
          break;
        case "suspendClocks":
          this.gravity.stop();
          this.countdown.setSuspended(true);
          break;
        case "resumeClocks":
          this.gravity.start();
          this.countdown.setSuspended(false);
          break;
        case "stopClocks":
          this.haltClocks();
          break;
      }
    }
  }

  private haltClocks(): void {
    this.gravity.stop();
    this.countdown.stop();
  }

  private startClocks(): void {
    const state = this.state;
    if (!state) return;
    this.gravity.setPeriod(currentGravityMs(state));
    this.gravity.start();
    if (state.difficulty === "HARD") {
      this.countdown.restart();
    } else {
      this.countdown.stop();
      this.countdown.reset();
    }
  }

  private notify(events: ReadonlyArray<DomainEvent>): void {
    const view = this.getView();
    if (!view) return;
    for (const listener of [...this.listeners]) listener(view, events);
  }
}

function salvageIdentity(u: unknown): {
  player: string;
  difficulty: Difficulty;
} {
  if (typeof u !== "object" || u === null) {
    return { difficulty: "EASY", player: DEFAULT_PLAYER_NAME };
  }
  const player = "player" in u ? u.player : undefined;
  const difficulty = "difficulty" in u ? u.difficulty : undefined;
  return {
    difficulty: isDifficulty(difficulty) ? difficulty : "EASY",
    player: typeof player === "string" ? player : DEFAULT_PLAYER_NAME,
  };
}
