/**
 * Helpers for drawing from any uniform [0, 1) number source.
 */

/**
 * Random integer between min and max (inclusive)
 * @param rng - Function returning a float in [0, 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Uniform pick from an array. Consumes exactly one draw when the array is
 * non-empty and none otherwise.
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}
