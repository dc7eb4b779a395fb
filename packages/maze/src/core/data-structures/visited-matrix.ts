import type { Cell } from "../geometry/types";

/**
 * Read-only view of a visited matrix, handed to observers of a search.
 */
export interface ReadonlyVisitedMatrix {
  readonly width: number;
  readonly height: number;
  /** Number of cells marked so far. */
  readonly count: number;
  has(c: Cell): boolean;
  toRows(): boolean[][];
}

/**
 * `height x width` boolean matrix packed into a bit set (one bit per cell).
 *
 * Each traversal allocates its own instance; nothing is reused between
 * runs, so a new search never sees marks left by an earlier one.
 */
export class VisitedMatrix implements ReadonlyVisitedMatrix {
  readonly width: number;
  readonly height: number;
  private readonly bits: Uint32Array;
  private marked = 0;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.bits = new Uint32Array(Math.ceil((width * height) / 32));
  }

  /**
   * Out-of-bounds cells are never visited.
   */
  has(c: Cell): boolean {
    if (!this.inBounds(c)) return false;
    const key = c.row * this.width + c.col;
    const word = this.bits[key >>> 5] ?? 0;
    return (word & (1 << (key & 31))) !== 0;
  }

  /**
   * Mark a cell. Returns false if it was already marked or lies outside
   * the matrix.
   */
  add(c: Cell): boolean {
    if (!this.inBounds(c) || this.has(c)) return false;
    const key = c.row * this.width + c.col;
    const index = key >>> 5;
    this.bits[index] = (this.bits[index] ?? 0) | (1 << (key & 31));
    this.marked++;
    return true;
  }

  get count(): number {
    return this.marked;
  }

  /**
   * Plain `boolean[row][col]` copy, e.g. for a renderer.
   */
  toRows(): boolean[][] {
    const rows: boolean[][] = [];
    for (let row = 0; row < this.height; row++) {
      const line: boolean[] = [];
      for (let col = 0; col < this.width; col++) {
        line.push(this.has({ row, col }));
      }
      rows.push(line);
    }
    return rows;
  }

  private inBounds(c: Cell): boolean {
    return c.row >= 0 && c.row < this.height && c.col >= 0 && c.col < this.width;
  }
}
