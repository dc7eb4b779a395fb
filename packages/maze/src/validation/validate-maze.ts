/**
 * Structural checks for generated mazes.
 *
 * A grid passes when its walls are symmetric, its outer border is closed
 * and its passages form a spanning tree: connected, acyclic, and exactly
 * `width * height - 1` of them.
 */

import { UnionFind } from "../core/algorithms/union-find";
import {
  type Cell,
  cellKey,
  DIRECTION_NAMES,
  DIRECTIONS,
  Direction,
  formatCell,
  oppositeDirection,
} from "../core/geometry/types";
import type { ReadonlyMazeGrid } from "../core/grid/types";
import {
  hasErrorViolations,
  type MazeValidationResult,
  type Violation,
} from "./result-types";

export interface ValidateMazeOptions {
  /**
   * Report cycles and disconnected regions as warnings instead of errors.
   * For grids that were never meant to be perfect.
   */
  readonly allowImperfect?: boolean;
}

export function validateMaze(
  grid: ReadonlyMazeGrid,
  options: ValidateMazeOptions = {},
): MazeValidationResult {
  const violations: Violation[] = [];
  const treeSeverity = options.allowImperfect ? "warning" : "error";
  const sets = new UnionFind(grid.width * grid.height);
  let cycles = 0;

  grid.forEachCell((c) => {
    for (const direction of DIRECTIONS) {
      const next = grid.neighbor(c, direction);
      const walled = grid.wallPresent(c, direction);

      if (next === null) {
        if (!walled) {
          violations.push({
            type: "border-open",
            message: `Border wall missing at ${formatCell(c)} (${DIRECTION_NAMES[direction]})`,
            severity: "error",
          });
        }
        continue;
      }

      // Each edge is examined once, from its upper or left cell.
      if (direction !== Direction.RIGHT && direction !== Direction.DOWN) continue;

      if (walled !== grid.wallPresent(next, oppositeDirection(direction))) {
        violations.push({
          type: "wall-asymmetry",
          message: `Wall between ${formatCell(c)} and ${formatCell(next)} is open on one side only`,
          severity: "error",
        });
        continue;
      }

      if (!walled && !sets.union(key(grid, c), key(grid, next))) {
        cycles++;
      }
    }
  });

  if (cycles > 0) {
    violations.push({
      type: "cycle",
      message: `Passages contain ${cycles} cycle(s)`,
      severity: treeSeverity,
    });
  }

  if (sets.componentCount > 1) {
    violations.push({
      type: "disconnected",
      message: `Passages split the grid into ${sets.componentCount} regions`,
      severity: treeSeverity,
    });
  }

  const expected = grid.width * grid.height - 1;
  const passages = grid.countPassages();
  if (passages !== expected) {
    violations.push({
      type: "passage-count",
      message: `Expected ${expected} passages, found ${passages}`,
      severity: treeSeverity,
    });
  }

  return hasErrorViolations(violations)
    ? { success: false, violations }
    : { success: true, violations };
}

function key(grid: ReadonlyMazeGrid, c: Cell): number {
  return cellKey(c, grid.width);
}
