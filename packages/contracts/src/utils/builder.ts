import type { z } from "zod";
import {
  MazeConfigSchema,
  MazeLayoutSchema,
  type ValidatedMazeConfig,
  type ValidatedMazeLayout,
} from "../schemas/maze";
import { randomUint32 } from "../random/system-random";
import { MazeError } from "../types/error";
import {
  DEFAULT_MAZE_HEIGHT,
  DEFAULT_MAZE_WIDTH,
  type MazeConfigInput,
} from "../types/maze";
import { Err, Ok, type Result } from "../types/result";

/**
 * Flatten zod issues into `path: message` lines for error details.
 */
export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.map(String).join(".")}: ${issue.message}`
      : issue.message,
  );
}

function invalid(error: z.ZodError): MazeError {
  const issues = formatConfigIssues(error);
  return MazeError.configInvalid(`Invalid maze configuration: ${issues.join("; ")}`, {
    issues,
  });
}

function withLayoutDefaults(input: MazeConfigInput) {
  const width = input.width ?? DEFAULT_MAZE_WIDTH;
  const height = input.height ?? DEFAULT_MAZE_HEIGHT;
  return {
    width,
    height,
    start: input.start ?? { row: 0, col: 0 },
    end: input.end ?? { row: height - 1, col: width - 1 },
  };
}

/**
 * Apply layout defaults (20x20, top-left to bottom-right) and validate.
 * The end cell defaults to the bottom-right corner of the final dimensions.
 */
export function buildMazeLayout(
  input: Omit<MazeConfigInput, "seed"> = {},
): Result<ValidatedMazeLayout, MazeError> {
  const parsed = MazeLayoutSchema.safeParse(withLayoutDefaults(input));
  return parsed.success ? Ok(parsed.data) : Err(invalid(parsed.error));
}

/**
 * Layout defaults plus a seed. A missing seed is drawn from the platform
 * RNG so the resulting config still records which seed produced the maze.
 */
export function buildMazeConfig(
  input: MazeConfigInput = {},
): Result<ValidatedMazeConfig, MazeError> {
  const parsed = MazeConfigSchema.safeParse({
    ...withLayoutDefaults(input),
    seed: input.seed ?? randomUint32(),
  });
  return parsed.success ? Ok(parsed.data) : Err(invalid(parsed.error));
}
