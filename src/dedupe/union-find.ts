/**
 * Disjoint-set forest over dense integer indices.
 *
 * Parent and rank live in typed arrays; callers map their own ids onto
 * 0..size-1 first.
 *
 * @module dedupe/union-find
 */

export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;

  /**
   * @param size - Number of elements, each starting in its own set
   */
  constructor(readonly size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  /**
   * Root of the set containing `index` (path halving).
   */
  find(index: number): number {
    this.assertInRange(index);
    let current = index;
    while (this.parent[current] !== current) {
      this.parent[current] = this.parent[this.parent[current]];
      current = this.parent[current];
    }
    return current;
  }

  /**
   * Merge the sets of `x` and `y` (union by rank).
   *
   * @returns true if two distinct sets were merged
   */
  union(x: number, y: number): boolean {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) {
      return false;
    }

    if (this.rank[rootX] < this.rank[rootY]) {
      this.parent[rootX] = rootY;
    } else if (this.rank[rootX] > this.rank[rootY]) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX]++;
    }
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }

  /**
   * Current partition as lists of indices. Each list is ascending and the
   * lists are ordered by their smallest index, so the result depends only
   * on the partition, not on the order of union calls.
   */
  components(): number[][] {
    const byRoot = new Map<number, number[]>();
    for (let i = 0; i < this.size; i++) {
      const root = this.find(i);
      const members = byRoot.get(root) ?? [];
      members.push(i);
      byRoot.set(root, members);
    }
    return [...byRoot.values()].sort((x, y) => x[0] - y[0]);
  }

  private assertInRange(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Index ${index} is outside 0..${this.size - 1}`);
    }
  }
}
