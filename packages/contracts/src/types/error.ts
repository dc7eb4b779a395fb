/**
 * Error codes for maze construction, generation and search.
 *
 * "No path found" is deliberately absent: an unreachable end cell is a
 * normal search outcome and is reported as a `null` path.
 */
export type MazeErrorCode =
  | "OUT_OF_BOUNDS"
  | "MISSING_KEY"
  | "CONFIG_INVALID"
  | "SEED_INVALID"
  | "GRID_SEALED";

/**
 * Unified error type for the maze packages.
 *
 * @example
 * ```typescript
 * throw MazeError.outOfBounds("wallPresent: cell (5, 2) outside 4x4 grid", {
 *   row: 5,
 *   col: 2,
 * });
 * ```
 */
export class MazeError extends Error {
  readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static outOfBounds(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("OUT_OF_BOUNDS", message, details);
  }

  static missingKey(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("MISSING_KEY", message, details);
  }

  static configInvalid(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("CONFIG_INVALID", message, details);
  }

  static seedInvalid(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("SEED_INVALID", message, details);
  }

  static gridSealed(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("GRID_SEALED", message, details);
  }

  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
