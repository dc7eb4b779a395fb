/**
 * Perfect maze generation and breadth-first solving.
 *
 * @example
 * ```typescript
 * import { Maze } from "@labyrinth/maze";
 *
 * const result = Maze.create({ width: 30, height: 20, seed: 42 });
 * if (result.success) {
 *   const path = result.value.maze.solve();
 *   console.log(`Path of ${path?.length ?? 0} cells`);
 * }
 * ```
 */

export * from "./core";
export * from "./generators";
export * from "./maze";
export * from "./search";
export * from "./seed";
export * from "./trace";
export * from "./validation";

export {
  MazeError,
  type MazeErrorCode,
  type RandomSource,
  SeededRandom,
} from "@labyrinth/contracts";
