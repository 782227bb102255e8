/*
 * Session lifecycle state machine (robot3)
 *
 * idle → running (START)
 * running ⇄ paused (PAUSE / RESUME; PAUSE is guarded off in HARD)
 * running | paused → over (END)
 * any → running (START: a new or restored session replaces the old one)
 * any → idle (STOP)
 *
 * The machine owns no clocks. Its actions push clock effects onto a queue that
 * the session host drains after each send(), so every clock change follows
 * from a lifecycle transition.
 */

import {
  createMachine,
  state,
  transition,
  guard,
  reduce,
  action,
  interpret,
} from "robot3";

import { canPause } from "../engine/types";
import { debugLog } from "../utils/debug";

import type { Difficulty } from "../engine/types";
import type { MachineState, MachineStates, Machine, Service } from "robot3";

export type LifecycleState = "idle" | "running" | "paused" | "over";

export type LifecycleContext = {
  difficulty: Difficulty | undefined;
  runs: number; // START transitions so far
};

export type LifecycleEvent =
  | { type: "START"; difficulty: Difficulty }
  | { type: "PAUSE" }
  | { type: "RESUME" }
  | { type: "END" }
  | { type: "STOP" };

export type ClockEffect =
  | "startClocks"
  | "suspendClocks"
  | "resumeClocks"
  | "stopClocks";

// Guards

const isPausable = (ctx: LifecycleContext, _event: LifecycleEvent): boolean =>
  ctx.difficulty !== undefined && canPause(ctx.difficulty);

// Reducers

export const updateContextStart = (
  ctx: LifecycleContext,
  event: LifecycleEvent,
): LifecycleContext => {
  if (event.type === "START") {
    return { ...ctx, difficulty: event.difficulty, runs: ctx.runs + 1 };
  }
  return ctx;
};

export const updateContextStop = (
  ctx: LifecycleContext,
  event: LifecycleEvent,
): LifecycleContext => {
  void event;
  return { ...ctx, difficulty: undefined };
};

// Action creators

const createEmit =
  (effect: ClockEffect, onEffect?: (effect: ClockEffect) => void) =>
  (_ctx: LifecycleContext, _event: LifecycleEvent): void => {
    onEffect?.(effect);
  };

const createLifecycleActions = (
  onEffect?: (effect: ClockEffect) => void,
): Record<
  ClockEffect,
  (ctx: LifecycleContext, event: LifecycleEvent) => void
> => ({
  resumeClocks: createEmit("resumeClocks", onEffect),
  startClocks: createEmit("startClocks", onEffect),
  stopClocks: createEmit("stopClocks", onEffect),
  suspendClocks: createEmit("suspendClocks", onEffect),
});

type LifecycleActions = ReturnType<typeof createLifecycleActions>;
type LifecycleEventType = LifecycleEvent["type"];

// State builders

const createIdleState = (
  actions: LifecycleActions,
): MachineState<LifecycleEventType> =>
  state(
    transition(
      "START",
      "running",
      reduce(updateContextStart),
      action(actions.startClocks),
    ),
  );

const createRunningState = (
  actions: LifecycleActions,
): MachineState<LifecycleEventType> =>
  state(
    transition(
      "START",
      "running",
      reduce(updateContextStart),
      action(actions.startClocks),
    ),
    transition(
      "PAUSE",
      "paused",
      guard(isPausable),
      action(actions.suspendClocks),
    ),
    transition("END", "over", action(actions.stopClocks)),
    transition(
      "STOP",
      "idle",
      reduce(updateContextStop),
      action(actions.stopClocks),
    ),
  );

const createPausedState = (
  actions: LifecycleActions,
): MachineState<LifecycleEventType> =>
  state(
    transition(
      "START",
      "running",
      reduce(updateContextStart),
      action(actions.startClocks),
    ),
    transition("RESUME", "running", action(actions.resumeClocks)),
    transition("END", "over", action(actions.stopClocks)),
    transition(
      "STOP",
      "idle",
      reduce(updateContextStop),
      action(actions.stopClocks),
    ),
  );

const createOverState = (
  actions: LifecycleActions,
): MachineState<LifecycleEventType> =>
  state(
    transition(
      "START",
      "running",
      reduce(updateContextStart),
      action(actions.startClocks),
    ),
    transition(
      "STOP",
      "idle",
      reduce(updateContextStop),
      action(actions.stopClocks),
    ),
  );

type LifecycleStatesObject = Record<
  LifecycleState,
  MachineState<LifecycleEventType>
>;
export type LifecycleMachine = Machine<
  LifecycleStatesObject,
  LifecycleContext,
  LifecycleState,
  LifecycleEventType
>;

export const createLifecycleMachine = (
  initialContext: LifecycleContext,
  onEffect?: (effect: ClockEffect) => void,
): LifecycleMachine => {
  const actions = createLifecycleActions(onEffect);

  const states = {
    idle: createIdleState(actions),
    over: createOverState(actions),
    paused: createPausedState(actions),
    running: createRunningState(actions),
  } as const;

  // robot3 widens the event type to string; cast back to the typed machine
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<
      LifecycleStatesObject,
      LifecycleEventType
    >,
    (_ctx: LifecycleContext): LifecycleContext => initialContext,
  ) as unknown as LifecycleMachine;
};

export const createDefaultLifecycleContext = (): LifecycleContext => ({
  difficulty: undefined,
  runs: 0,
});

type LifecycleService = Service<LifecycleMachine>;

/**
 * Thin wrapper around the robot3 service: send() returns the clock effects
 * produced by the transition, in order.
 */
export class LifecycleMachineService {
  private service: LifecycleService;
  private effectQueue: Array<ClockEffect> = [];
  private currentStateName: LifecycleState = "idle";

  constructor() {
    const machine = createLifecycleMachine(
      createDefaultLifecycleContext(),
      (effect) => {
        this.effectQueue.push(effect);
      },
    );
    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  send(event: LifecycleEvent): Array<ClockEffect> {
    const before = this.currentStateName;
    this.service.send(event);
    const effects = [...this.effectQueue];
    this.effectQueue = [];
    if (before !== this.currentStateName) {
      debugLog("lifecycle", `${before} -> ${this.currentStateName}`, {
        event: event.type,
      });
    }
    return effects;
  }

  getState(): { state: LifecycleState; context: LifecycleContext } {
    return {
      context: { ...this.service.context },
      state: this.currentStateName,
    };
  }
}
