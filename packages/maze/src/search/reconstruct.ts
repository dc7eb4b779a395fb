import { MazeError } from "@labyrinth/contracts";
import { type Cell, formatCell } from "../core/geometry/types";
import type { ReadonlyParentMap } from "./parent-map";

/**
 * Cells from start to end inclusive; consecutive cells share an open passage.
 */
export type Path = readonly Cell[];

/**
 * Follow predecessor links from `end` back to the search origin and return
 * the route in start-to-end order.
 *
 * @throws {MazeError} MISSING_KEY if `end` or one of its ancestors has no
 *   entry, which means the search never reached `end`
 *
 * @example
 * ```typescript
 * const stepper = maze.stepwise();
 * for (const step of stepper) {
 *   if (step.isEnd) return reconstructPath(step.parents, step.current);
 * }
 * ```
 */
export function reconstructPath(parents: ReadonlyParentMap, end: Cell): Path {
  const reversed: Cell[] = [];
  let current = end;

  for (;;) {
    const predecessor = parents.get(current);
    if (predecessor === undefined) {
      throw MazeError.missingKey(
        `reconstructPath: ${formatCell(current)} has no recorded predecessor`,
        { row: current.row, col: current.col, target: { row: end.row, col: end.col } },
      );
    }
    reversed.push(current);
    if (predecessor.kind === "root") break;

    // A chain longer than the map itself can only loop.
    if (reversed.length >= parents.size) {
      throw MazeError.missingKey(
        `reconstructPath: predecessor chain from ${formatCell(end)} never reaches the origin`,
        { row: end.row, col: end.col },
      );
    }
    current = predecessor.cell;
  }

  return Object.freeze(reversed.reverse());
}
