import { describe, expect, it } from "vitest";
import { calculateMazeChecksum, fnv64Hash, MazeGrid, parseChecksum } from "../src";
import { serpentineGrid } from "./helpers";

describe("fnv64Hash", () => {
  it("matches the FNV-1a 64 reference values", () => {
    expect(fnv64Hash(new Uint8Array())).toBe("cbf29ce484222325");
    expect(fnv64Hash(Uint8Array.of(0x61))).toBe("af63dc4c8601ec8c");
  });
});

describe("calculateMazeChecksum", () => {
  const start = { row: 0, col: 0 };
  const end = { row: 2, col: 2 };

  it("is versioned", () => {
    const checksum = calculateMazeChecksum(serpentineGrid(), start, end);
    expect(parseChecksum(checksum)?.version).toBe(1);
  });

  it("is stable for equal mazes", () => {
    expect(calculateMazeChecksum(serpentineGrid(), start, end)).toBe(
      calculateMazeChecksum(serpentineGrid(), start, end),
    );
  });

  it("changes with walls and endpoints", () => {
    const base = calculateMazeChecksum(serpentineGrid(), start, end);
    expect(calculateMazeChecksum(new MazeGrid(3, 3), start, end)).not.toBe(base);
    expect(calculateMazeChecksum(serpentineGrid(), start, { row: 2, col: 0 })).not.toBe(base);
  });
});

describe("parseChecksum", () => {
  it("splits version and hash", () => {
    expect(parseChecksum("v1:cbf29ce484222325")).toEqual({
      version: 1,
      hash: "cbf29ce484222325",
    });
  });

  it("rejects malformed input", () => {
    expect(parseChecksum("cbf29ce484222325")).toBeNull();
    expect(parseChecksum("v1:xyz")).toBeNull();
  });
});
