import { z } from "zod";
import { MAX_MAZE_DIMENSION } from "../types/maze";
import { MazeSeedSchema } from "./seed";

const DimensionSchema = z
  .number()
  .int({ error: "Dimensions must be integers" })
  .min(1, { error: "Dimensions must be at least 1" })
  .max(MAX_MAZE_DIMENSION, {
    error: `Dimensions cannot exceed ${MAX_MAZE_DIMENSION}`,
  });

export const CellCoordinateSchema = z.object({
  row: z.number().int().min(0),
  col: z.number().int().min(0),
});

const LayoutFields = {
  width: DimensionSchema,
  height: DimensionSchema,
  start: CellCoordinateSchema,
  end: CellCoordinateSchema,
};

const LayoutObjectSchema = z.object(LayoutFields);

type LayoutShape = z.infer<typeof LayoutObjectSchema>;

interface EndpointIssue {
  readonly message: string;
  readonly path: ["start" | "end"];
}

/**
 * Start and end must both lie inside the grid; anything else would make
 * generation and search address cells that do not exist.
 */
function endpointIssues(data: LayoutShape): EndpointIssue[] {
  const issues: EndpointIssue[] = [];
  for (const key of ["start", "end"] as const) {
    const cell = data[key];
    if (cell.row >= data.height || cell.col >= data.width) {
      issues.push({
        message: `${key} (${cell.row}, ${cell.col}) lies outside the ${data.width}x${data.height} grid`,
        path: [key],
      });
    }
  }
  return issues;
}

/**
 * Dimensions and endpoints of a maze, without a seed.
 */
export const MazeLayoutSchema = LayoutObjectSchema.superRefine((data, ctx) => {
  for (const issue of endpointIssues(data)) {
    ctx.addIssue({ code: "custom", message: issue.message, path: issue.path });
  }
});

/**
 * Fully specified maze configuration.
 */
export const MazeConfigSchema = z
  .object({ ...LayoutFields, seed: MazeSeedSchema })
  .superRefine((data, ctx) => {
    for (const issue of endpointIssues(data)) {
      ctx.addIssue({ code: "custom", message: issue.message, path: issue.path });
    }
  });

export type ValidatedMazeLayout = z.infer<typeof MazeLayoutSchema>;
export type ValidatedMazeConfig = z.infer<typeof MazeConfigSchema>;
