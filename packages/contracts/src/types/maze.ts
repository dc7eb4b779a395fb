/**
 * Plain (row, col) coordinate as it appears in configuration input.
 */
export interface CellCoordinate {
  readonly row: number;
  readonly col: number;
}

/**
 * Caller-facing maze configuration. Every field is optional; the builder
 * fills in a 20x20 maze from the top-left to the bottom-right corner.
 */
export interface MazeConfigInput {
  width?: number;
  height?: number;
  start?: CellCoordinate;
  end?: CellCoordinate;
  seed?: number;
}

export const DEFAULT_MAZE_WIDTH = 20;
export const DEFAULT_MAZE_HEIGHT = 20;
export const MAX_MAZE_DIMENSION = 1000;
