/**
 * Maze facade: owns the grid and its endpoints, runs generation once and
 * exposes both search drivers.
 */

import {
  buildMazeConfig,
  buildMazeLayout,
  MazeError,
  type MazeConfigInput,
  type RandomSource,
  type Result,
  SeededRandom,
} from "@labyrinth/contracts";
import { type Cell, formatCell } from "./core/geometry/types";
import { MazeGrid } from "./core/grid/grid";
import type { ReadonlyMazeGrid } from "./core/grid/types";
import { calculateMazeChecksum } from "./core/hash/checksum";
import {
  carvePerfectMaze,
  type GenerationOptions,
  type GenerationStats,
} from "./generators/backtracker";
import { computeDistances, type MazeDistanceField } from "./search/distances";
import type { ReadonlyParentMap } from "./search/parent-map";
import { type Path, reconstructPath } from "./search/reconstruct";
import { findPath, type FindPathOptions } from "./search/solver";
import { BfsStepper, type SearchStep } from "./search/stepper";
import { assertSeed } from "./seed";
import type { MazeValidationResult } from "./validation/result-types";
import { validateMaze } from "./validation/validate-maze";

const DEV_MODE = process.env.NODE_ENV !== "production";

export type MazeOptions = Omit<MazeConfigInput, "seed">;

/**
 * A rectangular maze with fixed start and end cells.
 *
 * The grid starts fully walled. `generate` carves it into a perfect maze
 * exactly once and seals it; after that the maze is read-only and can be
 * searched any number of times, each search with its own state.
 *
 * @example
 * ```typescript
 * const maze = new Maze({ width: 20, height: 20 });
 * maze.generate(1234);
 * const path = maze.solve();
 *
 * // Or let a visualiser drive the search one step at a time
 * const stepper = maze.stepwise();
 * for (const step of stepper) {
 *   render(step.current, step.visited);
 * }
 * ```
 */
export class Maze {
  readonly width: number;
  readonly height: number;
  readonly start: Cell;
  readonly end: Cell;
  private readonly cells: MazeGrid;
  private generation: GenerationStats | null = null;

  /**
   * @throws {MazeError} CONFIG_INVALID for bad dimensions or endpoints
   *   outside the grid
   */
  constructor(options: MazeOptions = {}) {
    const layout = buildMazeLayout(options).getOrThrow();
    this.width = layout.width;
    this.height = layout.height;
    this.start = Object.freeze({ row: layout.start.row, col: layout.start.col });
    this.end = Object.freeze({ row: layout.end.row, col: layout.end.col });
    this.cells = new MazeGrid(this.width, this.height);
  }

  /**
   * Build, validate and generate in one go. A missing seed is drawn at
   * random; the seed actually used is returned with the maze.
   */
  static create(
    input: MazeConfigInput = {},
    options: GenerationOptions = {},
  ): Result<{ maze: Maze; seed: number }, MazeError> {
    return buildMazeConfig(input).map((config) => {
      const maze = new Maze(config);
      maze.generate(config.seed, options);
      return { maze, seed: config.seed };
    });
  }

  get grid(): ReadonlyMazeGrid {
    return this.cells;
  }

  get isGenerated(): boolean {
    return this.generation !== null;
  }

  get generationStats(): GenerationStats | null {
    return this.generation;
  }

  /**
   * Carve the maze from `start`. Accepts a uint32 seed or any random source.
   *
   * @throws {MazeError} SEED_INVALID for a seed outside uint32
   * @throws {MazeError} GRID_SEALED when called a second time
   */
  generate(source: RandomSource | number, options: GenerationOptions = {}): GenerationStats {
    if (this.cells.isSealed) {
      throw MazeError.gridSealed("Maze.generate: maze has already been generated");
    }
    const rng = typeof source === "number" ? new SeededRandom(assertSeed(source)) : source;

    const stats = carvePerfectMaze(this.cells, this.start, rng, options);
    this.cells.seal();
    this.generation = stats;
    return stats;
  }

  /**
   * Shortest path from start to end, or null when none exists.
   */
  solve(options: FindPathOptions = {}): Path | null {
    this.warnIfUngenerated("solve");
    return findPath(this.cells, this.start, this.end, options);
  }

  /**
   * Fresh stepwise search from start to end.
   */
  stepwise(): BfsStepper {
    this.warnIfUngenerated("stepwise");
    return new BfsStepper(this.cells, this.start, this.end);
  }

  /**
   * Route to this maze's end cell from a parent map observed during a
   * stepwise search.
   *
   * @throws {MazeError} MISSING_KEY if the search never reached the end
   */
  reconstructPath(parents: ReadonlyParentMap): Path {
    return reconstructPath(parents, this.end);
  }

  /**
   * Drive a stepwise search to completion, reporting every step to
   * `observer` (the end step included), and return the final path.
   */
  explore(observer: (step: SearchStep) => void = () => {}): Path | null {
    const stepper = this.stepwise();
    for (const step of stepper) {
      observer(step);
      if (step.isEnd) {
        return this.reconstructPath(step.parents);
      }
    }
    return null;
  }

  distancesFrom(source: Cell = this.start): MazeDistanceField {
    return computeDistances(this.cells, source);
  }

  checksum(): string {
    return calculateMazeChecksum(this.cells, this.start, this.end);
  }

  validate(): MazeValidationResult {
    return validateMaze(this.cells);
  }

  private warnIfUngenerated(caller: string): void {
    if (DEV_MODE && !this.isGenerated) {
      console.warn(
        `Maze.${caller}: searching an ungenerated ${this.width}x${this.height} grid from ${formatCell(this.start)}`,
      );
    }
  }
}
