import { describe, expect, test } from "@jest/globals";

import { createPiece } from "@/engine/core/pieces";
import { gridCoordAsNumber } from "@/engine/core/types";
import {
  applyGravity,
  tryHardDrop,
  tryMoveLeft,
  tryMoveRight,
  tryRotate,
  trySoftDrop,
} from "@/engine/gameplay/movement";

import {
  createActive,
  createTestState,
  eventKinds,
  gridFromRows,
  occupiedCells,
} from "../../test-helpers";

describe("@/engine/gameplay/movement — shifts", () => {
  test("left and right move one column", () => {
    const state = createTestState({ current: createActive("T", 0, 3) });
    const left = tryMoveLeft(state);
    expect(left.applied).toBe(true);
    expect(left.events).toEqual([
      { col: 2, dir: "left", kind: "Moved", row: 0 },
    ]);
    const right = tryMoveRight(left.state);
    const col = right.state.current?.col;
    expect(col === undefined ? null : gridCoordAsNumber(col)).toBe(3);
  });

  test("blocked shift is a no-op", () => {
    const state = createTestState({ current: createActive("O", 0, 8) });
    const r = tryMoveRight(state);
    expect(r.applied).toBe(false);
    expect(r.state).toBe(state);
    expect(r.events).toEqual([]);
  });
});

describe("@/engine/gameplay/movement — soft drop", () => {
  test("one row down for one point", () => {
    const state = createTestState({
      current: createActive("O", 0, 4),
      score: 10,
    });
    const r = trySoftDrop(state);
    expect(r.state.score).toBe(11);
    expect(r.events).toEqual([
      { col: 4, dir: "down", kind: "Moved", row: 1 },
      { kind: "SoftDropped", points: 1 },
    ]);
  });

  test("never locks when blocked", () => {
    const state = createTestState({ current: createActive("O", 18, 4) });
    const r = trySoftDrop(state);
    expect(r.applied).toBe(false);
    expect(r.state.current).toBe(state.current);
    expect(r.state.score).toBe(0);
  });
});

describe("@/engine/gameplay/movement — rotate", () => {
  test("reports the kick used", () => {
    const state = createTestState({ current: createActive("T", 18, 3) });
    const r = tryRotate(state);
    expect(r.applied).toBe(true);
    expect(r.events).toEqual([
      { kickIndex: 5, kickOffset: [-1, 0], kind: "Rotated" },
    ]);
  });
});

describe("@/engine/gameplay/movement — hard drop", () => {
  test("O from the top of an empty board", () => {
    const state = createTestState({
      current: createActive("O", 0, 4),
      next: createPiece("T"),
    });
    const r = tryHardDrop(state);
    expect(r.applied).toBe(true);
    expect(r.state.score).toBe(36);
    expect(r.events[0]).toEqual({ kind: "HardDropped", points: 36, rows: 18 });
    expect(eventKinds(r.events)).toEqual([
      "HardDropped",
      "Locked",
      "PieceSpawned",
    ]);
    expect(occupiedCells(r.state.grid)).toEqual([
      "18,4",
      "18,5",
      "19,4",
      "19,5",
    ]);
    expect(r.state.current?.piece.id).toBe("T");
  });

  test("a piece already resting drops zero rows and still locks", () => {
    const state = createTestState({ current: createActive("O", 18, 0) });
    const r = tryHardDrop(state);
    expect(r.events[0]).toEqual({ kind: "HardDropped", points: 0, rows: 0 });
    expect(occupiedCells(r.state.grid)).toEqual([
      "18,0",
      "18,1",
      "19,0",
      "19,1",
    ]);
  });

  test("lands on the stack", () => {
    const grid = gridFromRows(["....Z.....", "....Z....."]);
    const state = createTestState({ current: createActive("O", 0, 4), grid });
    const r = tryHardDrop(state);
    expect(r.state.score).toBe(32);
    expect(occupiedCells(r.state.grid)).toEqual([
      "16,4",
      "16,5",
      "17,4",
      "17,5",
      "18,4",
      "19,4",
    ]);
  });
});

describe("@/engine/gameplay/movement — gravity", () => {
  test("falls one row when free", () => {
    const state = createTestState({ current: createActive("I", -1, 3) });
    const r = applyGravity(state);
    expect(r.events).toEqual([{ col: 3, dir: "down", kind: "Moved", row: 0 }]);
  });

  test("settles when resting", () => {
    const state = createTestState({ current: createActive("O", 18, 4) });
    const r = applyGravity(state);
    expect(eventKinds(r.events)).toEqual(["Locked", "PieceSpawned"]);
    expect(r.events[0]).toMatchObject({ source: "gravity" });
  });
});
