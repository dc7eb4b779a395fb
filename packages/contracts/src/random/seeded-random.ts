import { choice, range } from "./rng";

/**
 * Minimal surface every randomness consumer in the maze packages accepts.
 * `SeededRandom` satisfies it; tests may pass a scripted source instead.
 */
export interface RandomSource {
  /** Next float in [0, 1). */
  next(): number;
}

/**
 * SplitMix32, used only to spread a single 32-bit seed over the four
 * xoshiro state words.
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * Four 32-bit words of xoshiro128++ state.
 */
export type RngState = [number, number, number, number];

/**
 * Deterministic PRNG (xoshiro128++) seeded from a uint32.
 *
 * Two instances built from the same seed produce the same sequence, which
 * is what makes a maze reproducible from its seed alone.
 *
 * @example
 * ```typescript
 * const rng = new SeededRandom(42);
 * const maze = new Maze({ width: 10, height: 10 });
 * maze.generate(rng);
 * ```
 */
export class SeededRandom implements RandomSource {
  private s: RngState;
  private draws = 0;

  constructor(seed: number) {
    const mix = splitmix32(seed >>> 0);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro needs at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;
    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  next(): number {
    this.draws++;
    return this.next32() / 0x100000000;
  }

  /**
   * Random integer between min and max (inclusive)
   */
  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(() => this.next(), array);
  }

  /**
   * Number of floats drawn since construction. Used by tracing to report
   * how much randomness a decision consumed.
   */
  get drawCount(): number {
    return this.draws;
  }

  getState(): RngState {
    return [this.s[0], this.s[1], this.s[2], this.s[3]];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
