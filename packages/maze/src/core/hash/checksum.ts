/**
 * Maze Checksum Calculator
 *
 * Two mazes with equal checksums have the same dimensions, endpoints and
 * wall layout. Used to check that a seed reproduces its maze exactly.
 *
 * Format: "v{version}:{hash}". Bump `CHECKSUM_VERSION` whenever the hashed
 * fields or their order change.
 */

import type { Cell } from "../geometry/types";
import type { ReadonlyMazeGrid } from "../grid/types";
import { FNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

export function parseChecksum(checksum: string): {
  version: number;
  hash: string;
} | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]{16})$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: parseInt(match[1], 10),
    hash: match[2],
  };
}

/**
 * Hash dimensions, start, end and every cell's wall mask.
 */
export function calculateMazeChecksum(
  grid: ReadonlyMazeGrid,
  start: Cell,
  end: Cell,
): string {
  const hasher = new FNV64Hasher()
    .updateInt32(CHECKSUM_VERSION)
    .updateInt32(grid.width)
    .updateInt32(grid.height)
    .updateInt32(start.row)
    .updateInt32(start.col)
    .updateInt32(end.row)
    .updateInt32(end.col)
    .updateBytes(grid.getRawDataCopy());

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
