/**
 * Shared fixtures for maze tests.
 */

import type { RandomSource } from "@labyrinth/contracts";
import { type Cell, Direction, MazeGrid } from "../src";

/**
 * Random source that replays `values` in a loop.
 */
export function scriptedRandom(...values: number[]): RandomSource {
  let index = 0;
  return {
    next() {
      const value = values[index % values.length] ?? 0;
      index++;
      return value;
    },
  };
}

/**
 * Grid with every interior wall removed, except edges for which `keepWall`
 * returns true.
 */
export function openGrid(
  width: number,
  height: number,
  keepWall: (a: Cell, b: Cell) => boolean = () => false,
): MazeGrid {
  const grid = new MazeGrid(width, height);
  grid.forEachCell((c) => {
    const right = { row: c.row, col: c.col + 1 };
    const down = { row: c.row + 1, col: c.col };
    if (grid.contains(right) && !keepWall(c, right)) grid.removeWall(c, Direction.RIGHT);
    if (grid.contains(down) && !keepWall(c, down)) grid.removeWall(c, Direction.DOWN);
  });
  return grid;
}

export function touches(target: Cell): (a: Cell, b: Cell) => boolean {
  return (a, b) =>
    (a.row === target.row && a.col === target.col) ||
    (b.row === target.row && b.col === target.col);
}

/**
 * 3x3 maze carved with a source that always picks the first candidate.
 * Passages: (0,0)-(0,1)-(0,2)-(1,2)-(2,2)-(2,1)-(1,1)-(1,0)-(2,0).
 */
export const SERPENTINE_WALL_MASKS = [13, 5, 3, 9, 3, 10, 14, 12, 6] as const;

export const SERPENTINE_ORDER: readonly Cell[] = [
  { row: 0, col: 0 },
  { row: 0, col: 1 },
  { row: 0, col: 2 },
  { row: 1, col: 2 },
  { row: 2, col: 2 },
  { row: 2, col: 1 },
  { row: 1, col: 1 },
  { row: 1, col: 0 },
  { row: 2, col: 0 },
];

export function serpentineGrid(): MazeGrid {
  return MazeGrid.fromWallMasks(3, 3, SERPENTINE_WALL_MASKS);
}
