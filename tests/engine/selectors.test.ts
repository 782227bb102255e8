import { describe, expect, test } from "@jest/globals";

import { createPiece, PIECES } from "@/engine/core/pieces";
import {
  formatTimerDisplay,
  selectActive,
  selectGridCells,
  selectSessionView,
} from "@/engine/selectors";

import { createActive, createTestState, gridFromRows } from "../test-helpers";

describe("@/engine/selectors — HUD", () => {
  test("timer display", () => {
    expect(formatTimerDisplay("HARD", 30)).toBe("30s");
    expect(formatTimerDisplay("HARD", 0)).toBe("0s");
    expect(formatTimerDisplay("EASY", 30)).toBe("-");
    expect(formatTimerDisplay("MEDIUM", 12)).toBe("-");
  });

  test("HARD hides the preview and cannot pause", () => {
    const view = selectSessionView(
      createTestState({ difficulty: "HARD", hardErrors: 2 }),
      17,
    );
    expect(view.previewVisible).toBe(false);
    expect(view.canPause).toBe(false);
    expect(view.timerDisplay).toBe("17s");
    expect(view.hardErrors).toBe(2);
    expect(view.maxHardErrors).toBe(3);
    expect(view.gravityMs).toBe(180);
  });

  test("EASY view", () => {
    const view = selectSessionView(
      createTestState({
        level: 2,
        lines: 14,
        next: createPiece("I"),
        phase: "paused",
        score: 950,
      }),
      30,
    );
    expect(view).toMatchObject({
      canPause: true,
      difficulty: "EASY",
      gameOver: false,
      gravityMs: 570,
      level: 2,
      lines: 14,
      paused: true,
      player: "Tester",
      previewVisible: true,
      score: 950,
      timerDisplay: "-",
    });
    expect(view.preview).toEqual({
      color: PIECES.I.color,
      id: "I",
      shape: PIECES.I.shape,
    });
    expect(view.active).toBeNull();
  });
});

describe("@/engine/selectors — board", () => {
  test("cells carry id and color", () => {
    const cells = selectGridCells(
      createTestState({ grid: gridFromRows(["S........."]) }),
    );
    expect(cells[19]?.[0]).toEqual({ color: PIECES.S.color, id: "S" });
    expect(cells[19]?.[1]).toBeNull();
  });

  test("active piece with its landing row", () => {
    const active = selectActive(
      createTestState({
        current: createActive("O", 2, 4),
        grid: gridFromRows(["....Z....."]),
      }),
    );
    expect(active).toEqual({
      col: 4,
      color: PIECES.O.color,
      ghostRow: 17,
      id: "O",
      row: 2,
      shape: PIECES.O.shape,
    });
  });
});
