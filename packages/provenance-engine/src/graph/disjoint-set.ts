/**
 * Disjoint-set forest (union-find) with path compression and union by rank
 */
export class DisjointSet<T> {
  private readonly parent = new Map<T, T>();
  private readonly rank = new Map<T, number>();

  add(item: T): void {
    if (!this.parent.has(item)) {
      this.parent.set(item, item);
      this.rank.set(item, 0);
    }
  }

  find(item: T): T {
    this.add(item);

    let root = item;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }

    // Path compression
    let current = item;
    while (current !== root) {
      const parent = this.parent.get(current);
      if (parent === undefined) break;
      this.parent.set(current, root);
      current = parent;
    }

    return root;
  }

  /**
   * Merge the sets of `a` and `b`
   *
   * @returns false when they were already in the same set
   */
  union(a: T, b: T): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return false;
    }

    const rankA = this.rank.get(rootA) ?? 0;
    const rankB = this.rank.get(rootB) ?? 0;

    if (rankA < rankB) {
      this.parent.set(rootA, rootB);
    } else if (rankA > rankB) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootB, rootA);
      this.rank.set(rootA, rankA + 1);
    }
    return true;
  }

  connected(a: T, b: T): boolean {
    return this.find(a) === this.find(b);
  }
}
