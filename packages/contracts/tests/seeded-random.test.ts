import { describe, expect, it } from "vitest";
import { choice, range, SeededRandom } from "../src";

describe("SeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const a = new SeededRandom(99);
    const b = new SeededRandom(99);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it("diverges for different seeds", () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).not.toEqual(seqB);
  });

  it("stays within [0, 1)", () => {
    const rng = new SeededRandom(0);
    for (let i = 0; i < 1000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("restores a saved state", () => {
    const rng = new SeededRandom(5);
    rng.next();
    const saved = rng.getState();
    const expected = [rng.next(), rng.next(), rng.next()];
    rng.setState(saved);
    expect([rng.next(), rng.next(), rng.next()]).toEqual(expected);
  });

  it("counts draws", () => {
    const rng = new SeededRandom(5);
    rng.next();
    rng.range(0, 10);
    rng.choice([1, 2, 3]);
    rng.choice([]);
    expect(rng.drawCount).toBe(3);
  });

  it("keeps range inclusive on both ends", () => {
    const rng = new SeededRandom(11);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const value = rng.range(2, 4);
      expect(value).toBeGreaterThanOrEqual(2);
      expect(value).toBeLessThanOrEqual(4);
      seen.add(value);
    }
    expect([...seen].sort()).toEqual([2, 3, 4]);
  });
});

describe("rng helpers", () => {
  it("maps the low end of the source to the first element", () => {
    expect(choice(() => 0, ["a", "b", "c"])).toBe("a");
    expect(choice(() => 0.999, ["a", "b", "c"])).toBe("c");
  });

  it("returns undefined for an empty array", () => {
    expect(choice(() => 0.5, [])).toBeUndefined();
  });

  it("scales the source over the inclusive range", () => {
    expect(range(() => 0.5, 0, 3)).toBe(2);
  });
});
