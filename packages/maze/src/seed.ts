/**
 * Seed Creation Utilities
 */

import { MazeError, MazeSeedSchema } from "@labyrinth/contracts";

/**
 * Seed from a string (DJB2), so a maze can be shared as a word or phrase.
 */
export function createSeedFromString(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Validate a numeric seed.
 * @throws {MazeError} SEED_INVALID unless `seed` is a uint32
 */
export function assertSeed(seed: number): number {
  const parsed = MazeSeedSchema.safeParse(seed);
  if (!parsed.success) {
    throw MazeError.seedInvalid(`Invalid seed ${seed}`, {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}
