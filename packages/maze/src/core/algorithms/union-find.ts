/**
 * Disjoint-set forest over cell keys, used to check that a grid's passages
 * form a single tree: every `union` that returns false closes a cycle.
 *
 * @example
 * ```typescript
 * const sets = new UnionFind(4);
 * sets.union(0, 1);      // true
 * sets.union(1, 0);      // false, already joined
 * sets.componentCount;   // 3
 * ```
 */
export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;
  private components: number;

  constructor(size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);
    this.components = size;
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  /**
   * Root of the set containing `x`, with path halving.
   */
  find(x: number): number {
    let node = x;
    let parent = this.parent[node] ?? node;
    while (parent !== node) {
      const grandparent = this.parent[parent] ?? parent;
      this.parent[node] = grandparent;
      node = grandparent;
      parent = this.parent[node] ?? node;
    }
    return node;
  }

  /**
   * Merge the sets of `x` and `y` by rank.
   * @returns False when they were already in the same set
   */
  union(x: number, y: number): boolean {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) return false;

    const rankX = this.rank[rootX] ?? 0;
    const rankY = this.rank[rootY] ?? 0;
    if (rankX < rankY) {
      this.parent[rootX] = rootY;
    } else if (rankX > rankY) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX] = rankX + 1;
    }
    this.components--;
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }

  get componentCount(): number {
    return this.components;
  }
}
