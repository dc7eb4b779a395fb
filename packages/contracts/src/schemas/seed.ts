import { z } from "zod";

const UINT32_MAX = 0xffffffff;

export const MazeSeedSchema = z
  .number()
  .int({ error: "Seed must be an integer" })
  .min(0, { error: "Seed must be non-negative" })
  .max(UINT32_MAX, { error: "Seed must fit in uint32" });

export type MazeSeed = z.infer<typeof MazeSeedSchema>;
