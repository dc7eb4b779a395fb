/**
 * Grid interfaces for maze wall storage.
 */

import type { Cell, Dimensions, Direction } from "../geometry/types";

/**
 * Wall mask with all four walls present. Bit `d` of a cell's mask is set
 * while the wall on side `d` stands.
 */
export const ALL_WALLS = 0b1111;

/**
 * Read-only grid interface.
 *
 * Search code and external renderers receive this type, so nothing outside
 * generation can carve a passage.
 *
 * @example
 * ```typescript
 * function countDeadEnds(grid: ReadonlyMazeGrid): number {
 *   let deadEnds = 0;
 *   grid.forEachCell((c) => {
 *     if (grid.openDirections(c).length === 1) deadEnds++;
 *   });
 *   return deadEnds;
 * }
 * ```
 */
export interface ReadonlyMazeGrid {
  readonly width: number;
  readonly height: number;
  readonly isSealed: boolean;

  // Bounds checking
  isInBounds(row: number, col: number): boolean;
  contains(c: Cell): boolean;

  // Wall queries
  wallPresent(c: Cell, direction: Direction): boolean;
  wallMask(c: Cell): number;
  hasPassage(c: Cell, direction: Direction): boolean;
  openDirections(c: Cell): Direction[];

  // Neighbors
  neighbor(c: Cell, direction: Direction): Cell | null;

  // Utility (read-only)
  countPassages(): number;
  forEachCell(callback: (c: Cell, wallMask: number) => void): void;
  getRawDataCopy(): Uint8Array;
  getDimensions(): Dimensions;
}

/**
 * Mutable grid interface. Only the generator works against this type.
 */
export interface MutableMazeGrid extends ReadonlyMazeGrid {
  removeWall(c: Cell, direction: Direction): void;
  seal(): void;
}
