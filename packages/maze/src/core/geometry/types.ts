/**
 * Cell coordinates and the four grid directions.
 * All types are immutable value objects.
 */

/**
 * Grid coordinate, 0-indexed. `row` grows downwards, `col` to the right.
 */
export interface Cell {
  readonly row: number;
  readonly col: number;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * The four directions in their fixed cyclic order. Every neighbour scan in
 * generation and search walks them in this order, which is what makes
 * traversal order reproducible.
 */
export const Direction = {
  UP: 0,
  RIGHT: 1,
  DOWN: 2,
  LEFT: 3,
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

export const DIRECTIONS: readonly Direction[] = [
  Direction.UP,
  Direction.RIGHT,
  Direction.DOWN,
  Direction.LEFT,
];

/**
 * Row/column step for each direction, indexed by `Direction`.
 */
export const DIRECTION_OFFSETS: Readonly<Record<Direction, { readonly dRow: number; readonly dCol: number }>> = {
  [Direction.UP]: { dRow: -1, dCol: 0 },
  [Direction.RIGHT]: { dRow: 0, dCol: 1 },
  [Direction.DOWN]: { dRow: 1, dCol: 0 },
  [Direction.LEFT]: { dRow: 0, dCol: -1 },
};

export const DIRECTION_NAMES: Readonly<Record<Direction, string>> = {
  [Direction.UP]: "up",
  [Direction.RIGHT]: "right",
  [Direction.DOWN]: "down",
  [Direction.LEFT]: "left",
};

export function oppositeDirection(direction: Direction): Direction {
  return DIRECTIONS[(direction + 2) % 4] ?? direction;
}

export function cell(row: number, col: number): Cell {
  return { row, col };
}

/**
 * Cell reached by one step in `direction`. No bounds check.
 */
export function step(from: Cell, direction: Direction): Cell {
  const offset = DIRECTION_OFFSETS[direction];
  return { row: from.row + offset.dRow, col: from.col + offset.dCol };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Numeric key for a cell, unique within a grid of the given width.
 *
 * @example
 * ```typescript
 * cellKey({ row: 2, col: 3 }, 10);  // 23
 * ```
 */
export function cellKey(c: Cell, width: number): number {
  return c.row * width + c.col;
}

export function cellFromKey(key: number, width: number): Cell {
  return { row: Math.floor(key / width), col: key % width };
}

export function formatCell(c: Cell): string {
  return `(${c.row}, ${c.col})`;
}
