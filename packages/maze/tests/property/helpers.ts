import { SeededRandom } from "@labyrinth/contracts";
import { type Cell, Maze } from "../../src";

export const PROPERTY_RUNS = 40;

export interface MazeCase {
  readonly maze: Maze;
  readonly seed: number;
}

/**
 * Generated mazes of random size and endpoints, drawn from a fixed source so
 * every run checks the same cases.
 */
export function* mazeCases(runs: number = PROPERTY_RUNS): Generator<MazeCase> {
  const rng = new SeededRandom(0x5eedc0de);
  for (let i = 0; i < runs; i++) {
    const width = rng.range(1, 24);
    const height = rng.range(1, 24);
    const start: Cell = { row: rng.range(0, height - 1), col: rng.range(0, width - 1) };
    const end: Cell = { row: rng.range(0, height - 1), col: rng.range(0, width - 1) };
    const seed = rng.range(0, 0x7fffffff);

    const maze = new Maze({ width, height, start, end });
    maze.generate(seed);
    yield { maze, seed };
  }
}

export function describeCase({ maze, seed }: MazeCase): string {
  return `${maze.width}x${maze.height} seed=${seed}`;
}
