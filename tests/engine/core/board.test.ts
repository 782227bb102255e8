import { describe, expect, test } from "@jest/globals";

import {
  canPlace,
  cloneGrid,
  collides,
  createEmptyGrid,
  dropDistance,
  getCell,
  isRowEmpty,
  isRowFull,
  stampPiece,
  tryMove,
} from "@/engine/core/board";
import { PIECES } from "@/engine/core/pieces";
import { gridCoordAsNumber } from "@/engine/core/types";

import {
  createActive,
  fullRow,
  gridFromRows,
  occupiedCells,
} from "../../test-helpers";

const O = PIECES.O.shape;

describe("@/engine/core/board — grid", () => {
  test("empty grid is 20 rows of 10 empty cells", () => {
    const grid = createEmptyGrid();
    expect(grid).toHaveLength(20);
    expect(grid.every((row) => row.length === 10 && isRowEmpty(row))).toBe(
      true,
    );
  });

  test("cloneGrid copies every row", () => {
    const grid = gridFromRows(["T........."]);
    const copy = cloneGrid(grid);
    expect(copy).toEqual(grid);
    expect(copy[19]).not.toBe(grid[19]);
  });

  test("getCell reads null outside the board", () => {
    const grid = gridFromRows(["J........."]);
    expect(getCell(grid, 19, 0)).toBe("J");
    expect(getCell(grid, -1, 0)).toBeNull();
    expect(getCell(grid, 19, 10)).toBeNull();
  });

  test("row predicates", () => {
    const grid = gridFromRows([fullRow("I"), "I........."]);
    const [top, bottom] = [grid[18], grid[19]];
    expect(top && isRowFull(top)).toBe(true);
    expect(bottom && isRowFull(bottom)).toBe(false);
    expect(bottom && isRowEmpty(bottom)).toBe(false);
  });
});

describe("@/engine/core/board — collides", () => {
  const empty = createEmptyGrid();

  test("cells above row 0 never collide", () => {
    expect(collides(empty, O, -2, 4)).toBe(false);
    expect(collides(empty, O, -1, 4)).toBe(false);
  });

  test("walls and floor collide", () => {
    expect(collides(empty, O, 0, -1)).toBe(true);
    expect(collides(empty, O, 0, 9)).toBe(true);
    expect(collides(empty, O, 19, 4)).toBe(true);
    expect(collides(empty, O, 18, 8)).toBe(false);
  });

  test("walls collide even above the board", () => {
    expect(collides(empty, O, -5, -1)).toBe(true);
  });

  test("occupied cells collide; empty shape cells do not", () => {
    const grid = gridFromRows(["S........."]);
    expect(collides(grid, O, 18, 0)).toBe(true);
    expect(collides(grid, O, 18, 1)).toBe(false);
  });

  test("an empty cell of the shape may overlap an occupied one", () => {
    const grid = gridFromRows(["S.........", ".........."]);
    // T's top-left cell is blank and lands on (18,0)
    expect(collides(grid, PIECES.T.shape, 18, 0)).toBe(false);
    expect(collides(grid, O, 17, 0)).toBe(true);
  });

  test("canPlace mirrors collides for an active piece", () => {
    expect(canPlace(empty, createActive("O", 18, 8))).toBe(true);
    expect(canPlace(empty, createActive("O", 18, 9))).toBe(false);
  });
});

describe("@/engine/core/board — tryMove", () => {
  const grid = createEmptyGrid();

  test("returns the moved piece when free", () => {
    const active = createActive("T", 0, 3);
    const moved = tryMove(grid, active, 1, -1);
    expect(moved).not.toBeNull();
    expect(moved && gridCoordAsNumber(moved.row)).toBe(1);
    expect(moved && gridCoordAsNumber(moved.col)).toBe(2);
    expect(gridCoordAsNumber(active.row)).toBe(0);
  });

  test("returns null when blocked", () => {
    expect(tryMove(grid, createActive("O", 0, 0), 0, -1)).toBeNull();
    expect(tryMove(grid, createActive("O", 18, 4), 1, 0)).toBeNull();
  });

  test("dropDistance counts rows to the resting place", () => {
    expect(dropDistance(grid, createActive("O", 0, 4))).toBe(18);
    const stacked = gridFromRows(["....O.....", "....O....."]);
    expect(dropDistance(stacked, createActive("O", 0, 4))).toBe(16);
  });
});

describe("@/engine/core/board — stampPiece", () => {
  test("writes the piece id into a new grid", () => {
    const grid = createEmptyGrid();
    const stamped = stampPiece(grid, createActive("O", 18, 4));
    expect(occupiedCells(stamped)).toEqual(["18,4", "18,5", "19,4", "19,5"]);
    expect(getCell(stamped, 18, 4)).toBe("O");
    expect(occupiedCells(grid)).toEqual([]);
  });

  test("clips cells above the board", () => {
    const stamped = stampPiece(createEmptyGrid(), createActive("O", -1, 0));
    expect(occupiedCells(stamped)).toEqual(["0,0", "0,1"]);
  });
});
