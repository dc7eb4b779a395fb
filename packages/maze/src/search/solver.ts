import { type Cell, formatCell } from "../core/geometry/types";
import type { ReadonlyMazeGrid } from "../core/grid/types";
import { NoOpTraceCollector } from "../trace/collector";
import type { TraceCollector } from "../trace/types";
import { type Expansion, BreadthFirstSearch } from "./breadth-first";
import { type Path, reconstructPath } from "./reconstruct";

export interface FindPathOptions {
  /** Called after every expansion, end cell included, in dequeue order. */
  readonly onExpand?: (expansion: Expansion, index: number) => void;
  readonly trace?: TraceCollector;
}

/**
 * Shortest path from `start` to `end` through open passages.
 *
 * Breadth-first, so the first time `end` is dequeued its recorded route has
 * the fewest possible edges. An unreachable end is a normal outcome and
 * yields `null`.
 *
 * @throws {MazeError} OUT_OF_BOUNDS if `start` or `end` is outside the grid
 *
 * @example
 * ```typescript
 * const path = findPath(maze.grid, maze.start, maze.end);
 * if (path === null) {
 *   console.warn("no route");
 * }
 * ```
 */
export function findPath(
  grid: ReadonlyMazeGrid,
  start: Cell,
  end: Cell,
  options: FindPathOptions = {},
): Path | null {
  const trace = options.trace ?? new NoOpTraceCollector();
  const startedAt = performance.now();
  trace.start("search");

  const search = new BreadthFirstSearch(grid, start, end);
  let path: Path | null = null;

  for (let expansion = search.expandNext(); expansion !== null; expansion = search.expandNext()) {
    options.onExpand?.(expansion, search.expansionCount - 1);
    if (expansion.isEnd) {
      path = reconstructPath(search.parents, end);
      break;
    }
  }

  if (path === null) {
    trace.warning(
      "search",
      `end ${formatCell(end)} unreachable from ${formatCell(start)} after ${search.expansionCount} expansions`,
    );
  }
  trace.end("search", performance.now() - startedAt);
  return path;
}
