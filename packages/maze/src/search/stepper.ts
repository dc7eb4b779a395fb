import { MazeError } from "@labyrinth/contracts";
import type { ReadonlyVisitedMatrix } from "../core/data-structures/visited-matrix";
import { type Cell, formatCell } from "../core/geometry/types";
import type { ReadonlyMazeGrid } from "../core/grid/types";
import { BreadthFirstSearch } from "./breadth-first";
import type { ReadonlyParentMap } from "./parent-map";
import { type Path, reconstructPath } from "./reconstruct";

/**
 * What an observer sees after one step of a stepwise search.
 *
 * `visited` and `parents` are live read-only views of the search state:
 * they reflect this step until the next `step()` call mutates them. Copy
 * them (`visited.toRows()`, `parents` via `ParentMap.clone`) to keep a frozen
 * frame.
 */
export interface SearchStep {
  /** 0-based dequeue index. */
  readonly index: number;
  readonly current: Cell;
  /** True when `current` is the end cell; the search stops here. */
  readonly isEnd: boolean;
  readonly discovered: readonly Cell[];
  readonly visited: ReadonlyVisitedMatrix;
  readonly parents: ReadonlyParentMap;
}

/**
 * Caller-driven breadth-first search.
 *
 * Each `step()` performs exactly one expansion and hands control back, so a
 * visualiser can draw between steps. The end cell is reported as a step of
 * its own (with `isEnd` set) and no further expansion happens after it.
 * Stopping early needs no cleanup: just stop calling `step()`.
 *
 * @example
 * ```typescript
 * const stepper = new BfsStepper(grid, start, end);
 * for (const step of stepper) {
 *   draw(step.current, step.visited);
 * }
 * const path = stepper.found ? stepper.reconstructPath() : null;
 * ```
 */
export class BfsStepper implements Iterable<SearchStep> {
  private readonly search: BreadthFirstSearch;
  private last: SearchStep | null = null;
  private finished = false;
  private reachedEnd = false;

  constructor(grid: ReadonlyMazeGrid, start: Cell, end: Cell) {
    this.search = new BreadthFirstSearch(grid, start, end);
  }

  /**
   * Advance by one expansion.
   * @returns null once the end has been reported or the frontier ran dry
   */
  step(): SearchStep | null {
    if (this.finished) return null;

    const expansion = this.search.expandNext();
    if (expansion === null) {
      this.finished = true;
      return null;
    }

    const step: SearchStep = {
      index: this.search.expansionCount - 1,
      current: expansion.current,
      isEnd: expansion.isEnd,
      discovered: expansion.discovered,
      visited: this.search.visited,
      parents: this.search.parents,
    };
    this.last = step;

    if (expansion.isEnd) {
      this.finished = true;
      this.reachedEnd = true;
    }
    return step;
  }

  /**
   * Step until done and return how many steps were taken.
   */
  runToCompletion(): number {
    let steps = 0;
    while (this.step() !== null) steps++;
    return steps;
  }

  get lastStep(): SearchStep | null {
    return this.last;
  }

  get done(): boolean {
    return this.finished;
  }

  /** True once the end cell has been dequeued. */
  get found(): boolean {
    return this.reachedEnd;
  }

  get stepsTaken(): number {
    return this.search.expansionCount;
  }

  get start(): Cell {
    return this.search.start;
  }

  get end(): Cell {
    return this.search.end;
  }

  get visited(): ReadonlyVisitedMatrix {
    return this.search.visited;
  }

  get parents(): ReadonlyParentMap {
    return this.search.parents;
  }

  /** Queued cells in dequeue order (copy). */
  get frontier(): readonly Cell[] {
    return this.search.frontier.toArray();
  }

  /**
   * Route to the end cell.
   * @throws {MazeError} MISSING_KEY if the end has not been reached yet
   */
  reconstructPath(): Path {
    if (!this.reachedEnd) {
      throw MazeError.missingKey(
        `BfsStepper: end ${formatCell(this.search.end)} has not been reached`,
        { stepsTaken: this.stepsTaken },
      );
    }
    return reconstructPath(this.search.parents, this.search.end);
  }

  *[Symbol.iterator](): Iterator<SearchStep> {
    for (let step = this.step(); step !== null; step = this.step()) {
      yield step;
    }
  }
}
