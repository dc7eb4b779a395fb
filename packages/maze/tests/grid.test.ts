/**
 * MazeGrid unit tests
 */

import { describe, expect, it } from "vitest";
import { ALL_WALLS, DIRECTIONS, Direction, MazeError, MazeGrid, oppositeDirection } from "../src";
import { openGrid } from "./helpers";

function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return MazeError.isMazeError(error) ? error.code : "not-a-maze-error";
  }
  return undefined;
}

describe("MazeGrid", () => {
  describe("construction", () => {
    it("creates grid with correct dimensions", () => {
      const grid = new MazeGrid(7, 4);
      expect(grid.width).toBe(7);
      expect(grid.height).toBe(4);
      expect(grid.getDimensions()).toEqual({ width: 7, height: 4 });
    });

    it("starts fully walled", () => {
      const grid = new MazeGrid(3, 2);
      expect([...grid.getRawDataCopy()]).toEqual(Array(6).fill(ALL_WALLS));
      for (const direction of DIRECTIONS) {
        expect(grid.wallPresent({ row: 1, col: 2 }, direction)).toBe(true);
      }
      expect(grid.countPassages()).toBe(0);
    });

    it("rejects empty or fractional dimensions", () => {
      expect(thrownCode(() => new MazeGrid(0, 3))).toBe("CONFIG_INVALID");
      expect(thrownCode(() => new MazeGrid(2, 1.5))).toBe("CONFIG_INVALID");
    });
  });

  describe("wallPresent", () => {
    it("throws OUT_OF_BOUNDS outside the grid", () => {
      const grid = new MazeGrid(3, 3);
      expect(thrownCode(() => grid.wallPresent({ row: 3, col: 0 }, Direction.UP))).toBe(
        "OUT_OF_BOUNDS",
      );
      expect(thrownCode(() => grid.wallPresent({ row: 0, col: -1 }, Direction.UP))).toBe(
        "OUT_OF_BOUNDS",
      );
    });
  });

  describe("removeWall", () => {
    it("clears both halves of the edge", () => {
      const grid = new MazeGrid(3, 3);
      grid.removeWall({ row: 1, col: 1 }, Direction.UP);

      expect(grid.wallPresent({ row: 1, col: 1 }, Direction.UP)).toBe(false);
      expect(grid.wallPresent({ row: 0, col: 1 }, Direction.DOWN)).toBe(false);
      expect(grid.wallMask({ row: 1, col: 1 })).toBe(0b1110);
      expect(grid.wallMask({ row: 0, col: 1 })).toBe(0b1011);
      expect(grid.countPassages()).toBe(1);
    });

    it("keeps walls symmetric for every edge", () => {
      const grid = openGrid(4, 3, (a) => a.col === 1);
      grid.forEachCell((c) => {
        for (const direction of DIRECTIONS) {
          const next = grid.neighbor(c, direction);
          if (next === null) continue;
          expect(grid.wallPresent(c, direction)).toBe(
            grid.wallPresent(next, oppositeDirection(direction)),
          );
        }
      });
    });

    it("refuses to open the outer border and leaves the grid untouched", () => {
      const grid = new MazeGrid(2, 2);
      expect(thrownCode(() => grid.removeWall({ row: 0, col: 1 }, Direction.RIGHT))).toBe(
        "OUT_OF_BOUNDS",
      );
      expect(grid.wallPresent({ row: 0, col: 1 }, Direction.RIGHT)).toBe(true);
    });

    it("throws GRID_SEALED after sealing", () => {
      const grid = new MazeGrid(2, 2);
      grid.seal();
      expect(grid.isSealed).toBe(true);
      expect(thrownCode(() => grid.removeWall({ row: 0, col: 0 }, Direction.RIGHT))).toBe(
        "GRID_SEALED",
      );
    });
  });

  describe("neighbors and passages", () => {
    it("returns null past the edge", () => {
      const grid = new MazeGrid(2, 2);
      expect(grid.neighbor({ row: 0, col: 0 }, Direction.UP)).toBeNull();
      expect(grid.neighbor({ row: 0, col: 0 }, Direction.RIGHT)).toEqual({ row: 0, col: 1 });
    });

    it("lists open directions in fixed order", () => {
      const grid = openGrid(3, 3);
      expect(grid.openDirections({ row: 1, col: 1 })).toEqual([
        Direction.UP,
        Direction.RIGHT,
        Direction.DOWN,
        Direction.LEFT,
      ]);
      expect(grid.openDirections({ row: 0, col: 0 })).toEqual([Direction.RIGHT, Direction.DOWN]);
      expect(grid.hasPassage({ row: 0, col: 0 }, Direction.UP)).toBe(false);
    });

    it("counts each open edge once", () => {
      expect(openGrid(3, 3).countPassages()).toBe(12);
    });
  });

  describe("fromWallMasks", () => {
    it("round-trips through clone", () => {
      const grid = openGrid(3, 2, (a, b) => a.row !== b.row);
      const copy = grid.clone();
      expect(copy.getRawDataCopy()).toEqual(grid.getRawDataCopy());
      expect(copy.isSealed).toBe(false);
    });

    it("rejects asymmetric walls", () => {
      // (0,0) open to the right, (0,1) still walled on the left
      expect(thrownCode(() => MazeGrid.fromWallMasks(2, 1, [0b1101, 0b1111]))).toBe(
        "CONFIG_INVALID",
      );
    });

    it("rejects an open border", () => {
      expect(thrownCode(() => MazeGrid.fromWallMasks(1, 1, [0b1110]))).toBe("CONFIG_INVALID");
    });

    it("rejects the wrong number of masks", () => {
      expect(thrownCode(() => MazeGrid.fromWallMasks(2, 2, [15, 15, 15]))).toBe(
        "CONFIG_INVALID",
      );
    });
  });
});
