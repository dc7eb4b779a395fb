/**
 * Frontier expansion shared by the synchronous solver and the stepper.
 *
 * One call to `expandNext` is one unit of work: dequeue the head of the
 * frontier and, unless it is the end cell, discover its open, unvisited
 * neighbours in UP, RIGHT, DOWN, LEFT order. Both drivers call exactly this,
 * so they dequeue cells in the same order.
 */

import { MazeError } from "@labyrinth/contracts";
import { FrontierQueue } from "../core/data-structures/frontier-queue";
import { VisitedMatrix } from "../core/data-structures/visited-matrix";
import {
  type Cell,
  cellsEqual,
  DIRECTIONS,
  formatCell,
} from "../core/geometry/types";
import type { ReadonlyMazeGrid } from "../core/grid/types";
import { ParentMap } from "./parent-map";

/**
 * Outcome of a single expansion.
 */
export interface Expansion {
  /** Cell taken off the frontier. */
  readonly current: Cell;
  /** True when `current` is the end cell; its neighbours were not expanded. */
  readonly isEnd: boolean;
  /** Cells enqueued by this expansion, in discovery order. */
  readonly discovered: readonly Cell[];
}

function assertInBounds(grid: ReadonlyMazeGrid, c: Cell, role: string): void {
  if (!grid.contains(c)) {
    throw MazeError.outOfBounds(
      `search: ${role} ${formatCell(c)} outside ${grid.width}x${grid.height} grid`,
      { row: c.row, col: c.col },
    );
  }
}

/**
 * State of one breadth-first search: frontier, visited matrix and parent
 * map, all owned by this instance.
 */
export class BreadthFirstSearch {
  readonly frontier: FrontierQueue<Cell>;
  readonly visited: VisitedMatrix;
  readonly parents: ParentMap;
  private expansions = 0;

  constructor(
    readonly grid: ReadonlyMazeGrid,
    readonly start: Cell,
    readonly end: Cell,
  ) {
    assertInBounds(grid, start, "start");
    assertInBounds(grid, end, "end");

    this.frontier = FrontierQueue.of(start);
    this.visited = new VisitedMatrix(grid.width, grid.height);
    this.visited.add(start);
    this.parents = new ParentMap(grid.width, grid.height);
    this.parents.setRoot(start);
  }

  /**
   * Number of cells dequeued so far.
   */
  get expansionCount(): number {
    return this.expansions;
  }

  /**
   * Run one expansion step.
   * @returns null once the frontier is empty
   */
  expandNext(): Expansion | null {
    const current = this.frontier.dequeue();
    if (current === undefined) return null;
    this.expansions++;

    if (cellsEqual(current, this.end)) {
      return { current, isEnd: true, discovered: [] };
    }

    const discovered: Cell[] = [];
    for (const direction of DIRECTIONS) {
      const next = this.grid.neighbor(current, direction);
      if (next === null || this.visited.has(next)) continue;
      if (this.grid.wallPresent(current, direction)) continue;

      this.visited.add(next);
      this.parents.setParent(next, current);
      this.frontier.enqueue(next);
      discovered.push(next);
    }

    return { current, isEnd: false, discovered };
  }
}
