/**
 * Wall storage for rectangular mazes.
 * One byte per cell in a flat Uint8Array; the low four bits are the walls.
 */

import { MazeError } from "@labyrinth/contracts";
import {
  type Cell,
  DIRECTION_NAMES,
  DIRECTIONS,
  type Dimensions,
  Direction,
  formatCell,
  oppositeDirection,
  step,
} from "../geometry/types";
import { ALL_WALLS, type MutableMazeGrid } from "./types";

/**
 * Rectangular maze grid that starts fully walled.
 *
 * Walls are kept symmetric: `removeWall` always clears both halves of an
 * edge, so `wallPresent(a, d)` equals `wallPresent(neighbor(a, d), opposite(d))`
 * for every in-bounds pair.
 *
 * @remarks
 * Once `seal()` has been called the grid is read-only and `removeWall`
 * throws `GRID_SEALED`. `Maze` seals its grid after generation.
 */
export class MazeGrid implements MutableMazeGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;
  private sealed = false;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw MazeError.configInvalid(`Invalid grid dimensions: ${width}x${height}`, {
        width,
        height,
      });
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height).fill(ALL_WALLS);
  }

  /**
   * Rebuild a grid from per-cell wall masks in row-major order.
   * Rejects input whose walls are not symmetric or that leaves a border open.
   */
  static fromWallMasks(
    width: number,
    height: number,
    masks: ArrayLike<number>,
  ): MazeGrid {
    const grid = new MazeGrid(width, height);
    if (masks.length !== width * height) {
      throw MazeError.configInvalid(
        `Expected ${width * height} wall masks, got ${masks.length}`,
      );
    }
    for (let i = 0; i < masks.length; i++) {
      grid.data[i] = (masks[i] ?? ALL_WALLS) & ALL_WALLS;
    }

    grid.forEachCell((c) => {
      for (const direction of DIRECTIONS) {
        const next = grid.neighbor(c, direction);
        const here = grid.wallPresent(c, direction);
        if (next === null) {
          if (!here) {
            throw MazeError.configInvalid(
              `Border wall missing at ${formatCell(c)} (${DIRECTION_NAMES[direction]})`,
            );
          }
        } else if (here !== grid.wallPresent(next, oppositeDirection(direction))) {
          throw MazeError.configInvalid(
            `Asymmetric wall between ${formatCell(c)} and ${formatCell(next)}`,
          );
        }
      }
    });

    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.height && col >= 0 && col < this.width;
  }

  contains(c: Cell): boolean {
    return this.isInBounds(c.row, c.col);
  }

  private indexOf(c: Cell, caller: string): number {
    if (!this.contains(c)) {
      throw MazeError.outOfBounds(
        `${caller}: cell ${formatCell(c)} outside ${this.width}x${this.height} grid`,
        { row: c.row, col: c.col, width: this.width, height: this.height },
      );
    }
    return c.row * this.width + c.col;
  }

  // ===========================================================================
  // WALL QUERIES
  // ===========================================================================

  /**
   * Whether the wall on side `direction` of `c` stands.
   * @throws {MazeError} OUT_OF_BOUNDS when `c` is outside the grid
   */
  wallPresent(c: Cell, direction: Direction): boolean {
    const mask = this.data[this.indexOf(c, "wallPresent")] ?? ALL_WALLS;
    return (mask & (1 << direction)) !== 0;
  }

  wallMask(c: Cell): number {
    return this.data[this.indexOf(c, "wallMask")] ?? ALL_WALLS;
  }

  /**
   * True when an in-bounds neighbour exists in `direction` and no wall
   * separates it from `c`.
   */
  hasPassage(c: Cell, direction: Direction): boolean {
    return !this.wallPresent(c, direction) && this.neighbor(c, direction) !== null;
  }

  openDirections(c: Cell): Direction[] {
    return DIRECTIONS.filter((direction) => this.hasPassage(c, direction));
  }

  neighbor(c: Cell, direction: Direction): Cell | null {
    const next = step(c, direction);
    return this.contains(next) ? next : null;
  }

  // ===========================================================================
  // MUTATION
  // ===========================================================================

  /**
   * Open the edge between `c` and its neighbour in `direction`, clearing
   * both halves of the wall.
   *
   * @throws {MazeError} OUT_OF_BOUNDS when either cell is outside the grid
   * @throws {MazeError} GRID_SEALED after `seal()`
   */
  removeWall(c: Cell, direction: Direction): void {
    if (this.sealed) {
      throw MazeError.gridSealed(
        `removeWall: grid is sealed, cannot open ${formatCell(c)} ${DIRECTION_NAMES[direction]}`,
      );
    }
    const here = this.indexOf(c, "removeWall");
    const there = this.indexOf(step(c, direction), "removeWall");

    this.data[here] = (this.data[here] ?? ALL_WALLS) & ~(1 << direction);
    this.data[there] =
      (this.data[there] ?? ALL_WALLS) & ~(1 << oppositeDirection(direction));
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  /**
   * Number of open edges. Only RIGHT and DOWN are counted so every edge is
   * seen once.
   */
  countPassages(): number {
    let passages = 0;
    this.forEachCell((c) => {
      if (this.hasPassage(c, Direction.RIGHT)) passages++;
      if (this.hasPassage(c, Direction.DOWN)) passages++;
    });
    return passages;
  }

  forEachCell(callback: (c: Cell, wallMask: number) => void): void {
    for (let row = 0; row < this.height; row++) {
      for (let col = 0; col < this.width; col++) {
        callback({ row, col }, this.data[row * this.width + col] ?? ALL_WALLS);
      }
    }
  }

  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  getDimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  /**
   * Unsealed copy with the same walls.
   */
  clone(): MazeGrid {
    return MazeGrid.fromWallMasks(this.width, this.height, this.data);
  }
}
