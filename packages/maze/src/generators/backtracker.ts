/**
 * Recursive-backtracker maze carving.
 *
 * Randomized depth-first traversal with an explicit stack. Each step looks
 * at the cell on top of the stack, picks one unvisited neighbour uniformly
 * at random and opens the wall towards it; a cell with no unvisited
 * neighbours is popped. Since the grid graph is connected, every cell is
 * visited exactly once and the carved passages form a spanning tree.
 */

import { choice, MazeError, type RandomSource } from "@labyrinth/contracts";
import { VisitedMatrix } from "../core/data-structures/visited-matrix";
import {
  type Cell,
  DIRECTION_NAMES,
  DIRECTIONS,
  type Direction,
  formatCell,
} from "../core/geometry/types";
import type { MutableMazeGrid } from "../core/grid/types";
import { NoOpTraceCollector } from "../trace/collector";
import type { TraceCollector } from "../trace/types";

export interface GenerationOptions {
  /** Receives one decision per carved passage. */
  readonly trace?: TraceCollector;
}

export interface GenerationStats {
  readonly cellsVisited: number;
  readonly passagesCarved: number;
  /** Cells left with a single open side. */
  readonly deadEnds: number;
  readonly maxStackDepth: number;
}

interface Candidate {
  readonly direction: Direction;
  readonly cell: Cell;
}

/**
 * Carve a perfect maze into `grid`, starting from `start`.
 *
 * The grid is expected to be fully walled; randomness comes only from `rng`,
 * so the same grid size, start and seed always yield the same walls.
 *
 * @throws {MazeError} OUT_OF_BOUNDS if `start` is outside the grid
 * @throws {MazeError} CONFIG_INVALID if `rng` yields a value outside [0, 1)
 *
 * @example
 * ```typescript
 * const grid = new MazeGrid(8, 8);
 * carvePerfectMaze(grid, { row: 0, col: 0 }, new SeededRandom(7));
 * grid.countPassages();  // 63
 * ```
 */
export function carvePerfectMaze(
  grid: MutableMazeGrid,
  start: Cell,
  rng: RandomSource,
  options: GenerationOptions = {},
): GenerationStats {
  if (!grid.contains(start)) {
    throw MazeError.outOfBounds(
      `carvePerfectMaze: start ${formatCell(start)} outside ${grid.width}x${grid.height} grid`,
      { row: start.row, col: start.col },
    );
  }

  const trace = options.trace ?? new NoOpTraceCollector();
  const startedAt = performance.now();
  trace.start("generation");

  const visited = new VisitedMatrix(grid.width, grid.height);
  const stack: Cell[] = [start];
  visited.add(start);

  let passagesCarved = 0;
  let maxStackDepth = 1;

  while (stack.length > 0) {
    const current = stack[stack.length - 1];
    if (current === undefined) break;

    const candidates: Candidate[] = [];
    for (const direction of DIRECTIONS) {
      const next = grid.neighbor(current, direction);
      if (next !== null && !visited.has(next)) {
        candidates.push({ direction, cell: next });
      }
    }

    if (candidates.length === 0) {
      stack.pop();
      continue;
    }

    const sample = rng.next();
    const chosen = choice(() => sample, candidates);
    if (chosen === undefined) {
      throw MazeError.configInvalid(
        `carvePerfectMaze: random source returned ${sample} outside [0, 1)`,
        { sample },
      );
    }

    grid.removeWall(current, chosen.direction);
    visited.add(chosen.cell);
    stack.push(chosen.cell);
    passagesCarved++;
    if (stack.length > maxStackDepth) maxStackDepth = stack.length;

    if (trace.enabled) {
      trace.decision("generation", {
        question: `Which neighbour of ${formatCell(current)} to carve into?`,
        options: candidates.map((c) => DIRECTION_NAMES[c.direction]),
        chosen: DIRECTION_NAMES[chosen.direction],
        reason: "uniform pick among unvisited neighbours",
        rngConsumed: 1,
      });
    }
  }

  let deadEnds = 0;
  grid.forEachCell((c) => {
    if (grid.openDirections(c).length === 1) deadEnds++;
  });

  trace.end("generation", performance.now() - startedAt);

  return {
    cellsVisited: visited.count,
    passagesCarved,
    deadEnds,
    maxStackDepth,
  };
}
