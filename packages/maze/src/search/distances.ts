/**
 * BFS Distance Calculation
 *
 * Full breadth-first sweep with no early exit. Gives the exact passage
 * distance from one cell to every other, which validation and tests use as
 * the reference for shortest paths.
 */

import { MazeError } from "@labyrinth/contracts";
import { type Cell, cellFromKey, cellKey, formatCell } from "../core/geometry/types";
import type { ReadonlyMazeGrid } from "../core/grid/types";

/**
 * Result of BFS distance calculation.
 */
export interface BFSDistanceResult<TNodeId> {
  /** Map from node ID to distance from source */
  readonly distances: Map<TNodeId, number>;
  /** Maximum distance from source */
  readonly maxDistance: number;
}

/**
 * Calculate distances from a source node using BFS.
 *
 * @param getNeighbors - Nodes reachable in one hop from a node
 */
export function calculateBFSDistances<TNodeId>(
  sourceId: TNodeId,
  getNeighbors: (nodeId: TNodeId) => readonly TNodeId[],
): BFSDistanceResult<TNodeId> {
  const distances = new Map<TNodeId, number>([[sourceId, 0]]);
  const queue: TNodeId[] = [sourceId];
  let maxDistance = 0;

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    const nextDistance = (distances.get(current) ?? 0) + 1;

    for (const neighbor of getNeighbors(current)) {
      if (distances.has(neighbor)) continue;
      distances.set(neighbor, nextDistance);
      if (nextDistance > maxDistance) maxDistance = nextDistance;
      queue.push(neighbor);
    }
  }

  return { distances, maxDistance };
}

/**
 * Distance field of a maze from one cell.
 */
export interface MazeDistanceField {
  readonly source: Cell;
  readonly maxDistance: number;
  /** Cell at `maxDistance`, first in BFS order among ties. */
  readonly farthest: Cell;
  /** Number of cells reachable from the source, the source included. */
  readonly reachable: number;
  /** Edge count to `c`, or null when unreachable or out of bounds. */
  distanceTo(c: Cell): number | null;
}

/**
 * Passage distances from `source` to every reachable cell.
 *
 * @throws {MazeError} OUT_OF_BOUNDS if `source` is outside the grid
 */
export function computeDistances(grid: ReadonlyMazeGrid, source: Cell): MazeDistanceField {
  if (!grid.contains(source)) {
    throw MazeError.outOfBounds(
      `computeDistances: source ${formatCell(source)} outside ${grid.width}x${grid.height} grid`,
      { row: source.row, col: source.col },
    );
  }

  const width = grid.width;
  const { distances, maxDistance } = calculateBFSDistances(cellKey(source, width), (key) => {
    const here = cellFromKey(key, width);
    const neighbors: number[] = [];
    for (const direction of grid.openDirections(here)) {
      const next = grid.neighbor(here, direction);
      if (next !== null) neighbors.push(cellKey(next, width));
    }
    return neighbors;
  });

  let farthest = source;
  for (const [key, distance] of distances) {
    if (distance === maxDistance) {
      farthest = cellFromKey(key, width);
      break;
    }
  }

  return {
    source,
    maxDistance,
    farthest,
    reachable: distances.size,
    distanceTo(c: Cell): number | null {
      if (!grid.contains(c)) return null;
      return distances.get(cellKey(c, width)) ?? null;
    },
  };
}
