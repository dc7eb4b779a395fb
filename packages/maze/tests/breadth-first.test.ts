import { describe, expect, it } from "vitest";
import { BreadthFirstSearch, type Cell, MazeError } from "../src";
import { openGrid } from "./helpers";

function drain(search: BreadthFirstSearch): Cell[] {
  const popped: Cell[] = [];
  for (let e = search.expandNext(); e !== null; e = search.expandNext()) {
    popped.push(e.current);
    if (e.isEnd) break;
  }
  return popped;
}

describe("BreadthFirstSearch", () => {
  it("starts with only the origin queued, visited and rooted", () => {
    const search = new BreadthFirstSearch(openGrid(3, 3), { row: 1, col: 1 }, { row: 0, col: 0 });
    expect(search.frontier.toArray()).toEqual([{ row: 1, col: 1 }]);
    expect(search.visited.count).toBe(1);
    expect(search.parents.get({ row: 1, col: 1 })).toEqual({ kind: "root" });
    expect(search.expansionCount).toBe(0);
  });

  it("discovers neighbours in up, right, down, left order", () => {
    const search = new BreadthFirstSearch(openGrid(3, 3), { row: 1, col: 1 }, { row: 0, col: 0 });
    const first = search.expandNext();
    expect(first).toEqual({
      current: { row: 1, col: 1 },
      isEnd: false,
      discovered: [
        { row: 0, col: 1 },
        { row: 1, col: 2 },
        { row: 2, col: 1 },
        { row: 1, col: 0 },
      ],
    });
    expect(search.parents.get({ row: 1, col: 2 })).toEqual({
      kind: "cell",
      cell: { row: 1, col: 1 },
    });
  });

  it("breaks ties by FIFO order", () => {
    const search = new BreadthFirstSearch(openGrid(3, 3), { row: 0, col: 0 }, { row: 2, col: 2 });
    expect(drain(search)).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 0, col: 2 },
      { row: 1, col: 1 },
      { row: 2, col: 0 },
      { row: 1, col: 2 },
      { row: 2, col: 1 },
      { row: 2, col: 2 },
    ]);
  });

  it("does not expand the end cell", () => {
    const search = new BreadthFirstSearch(openGrid(2, 1), { row: 0, col: 0 }, { row: 0, col: 1 });
    search.expandNext();
    const end = search.expandNext();
    expect(end).toEqual({ current: { row: 0, col: 1 }, isEnd: true, discovered: [] });
  });

  it("never crosses a wall", () => {
    const grid = openGrid(2, 2, (a, b) => a.row === 0 && b.row === 1);
    const search = new BreadthFirstSearch(grid, { row: 0, col: 0 }, { row: 1, col: 1 });
    expect(drain(search)).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
    ]);
    expect(search.visited.has({ row: 1, col: 0 })).toBe(false);
  });

  it("rejects endpoints outside the grid", () => {
    expect(
      () => new BreadthFirstSearch(openGrid(2, 2), { row: 0, col: 0 }, { row: 5, col: 5 }),
    ).toThrow(MazeError);
  });
});
