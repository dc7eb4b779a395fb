import { MazeError } from "@labyrinth/contracts";
import { type Cell, formatCell } from "../core/geometry/types";

/**
 * Predecessor of a visited cell. The search origin is the only cell whose
 * predecessor is `root`; every other entry names the cell it was reached from.
 */
export type Predecessor =
  | { readonly kind: "root" }
  | { readonly kind: "cell"; readonly cell: Cell };

export const ROOT_PREDECESSOR: Predecessor = Object.freeze({ kind: "root" });

/**
 * Read-only view of a parent map, handed to observers of a search.
 */
export interface ReadonlyParentMap {
  readonly size: number;
  has(c: Cell): boolean;
  get(c: Cell): Predecessor | undefined;
  entries(): IterableIterator<readonly [Cell, Predecessor]>;
}

/**
 * Visited cell -> predecessor, keyed by the cell's row-major index.
 */
export class ParentMap implements ReadonlyParentMap {
  private readonly byKey = new Map<number, readonly [Cell, Predecessor]>();

  constructor(
    readonly width: number,
    readonly height: number,
  ) {}

  get size(): number {
    return this.byKey.size;
  }

  has(c: Cell): boolean {
    const key = this.keyOf(c);
    return key !== null && this.byKey.has(key);
  }

  get(c: Cell): Predecessor | undefined {
    const key = this.keyOf(c);
    return key === null ? undefined : this.byKey.get(key)?.[1];
  }

  setRoot(c: Cell): void {
    this.set(c, ROOT_PREDECESSOR);
  }

  setParent(c: Cell, parent: Cell): void {
    this.set(c, { kind: "cell", cell: parent });
  }

  entries(): IterableIterator<readonly [Cell, Predecessor]> {
    return this.byKey.values();
  }

  /**
   * Detached copy; later writes to this map do not show up in it.
   */
  clone(): ParentMap {
    const copy = new ParentMap(this.width, this.height);
    for (const [c, predecessor] of this.byKey.values()) {
      copy.set(c, predecessor);
    }
    return copy;
  }

  private set(c: Cell, predecessor: Predecessor): void {
    const key = this.keyOf(c);
    if (key === null) {
      throw MazeError.outOfBounds(
        `ParentMap: cell ${formatCell(c)} outside ${this.width}x${this.height} grid`,
        { row: c.row, col: c.col },
      );
    }
    this.byKey.set(key, Object.freeze([c, predecessor] as const));
  }

  private keyOf(c: Cell): number | null {
    if (c.row < 0 || c.row >= this.height || c.col < 0 || c.col >= this.width) {
      return null;
    }
    return c.row * this.width + c.col;
  }
}
