/**
 * Directed Union-Find over raw tree ids.
 *
 * Unlike a balanced union, `merge(source, target)` always keeps the
 * target's root as the canonical id: the tree that grew into another one
 * takes the other tree's identity. Lookups compress paths, so chains of
 * merges (A into B, then B into C) resolve in near-constant time.
 *
 * @example
 * ```typescript
 * const partition = new TreePartition(3); // ids 1, 2, 3
 * partition.merge(1, 2);
 * partition.merge(2, 3);
 * partition.find(1); // 3
 * partition.canonicalIds(); // [3]
 * ```
 */
export class TreePartition {
  private readonly parent: Map<number, number> = new Map();

  /**
   * @param treeCount - Number of trees; ids are 1..treeCount
   */
  constructor(treeCount: number) {
    for (let id = 1; id <= treeCount; id++) {
      this.parent.set(id, id);
    }
  }

  /**
   * Number of raw ids tracked
   */
  get size(): number {
    return this.parent.size;
  }

  /**
   * Resolve a raw id to its canonical id. Unknown ids resolve to themselves.
   */
  find(id: number): number {
    let root = id;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }

    // Path compression
    let current = id;
    while (current !== root) {
      const following = this.parent.get(current);
      if (following === undefined) break;
      this.parent.set(current, root);
      current = following;
    }

    return root;
  }

  /**
   * Map every id that resolves to `source` onto the canonical id of `target`.
   * @returns False when both already share a canonical id
   */
  merge(source: number, target: number): boolean {
    const sourceRoot = this.find(source);
    const targetRoot = this.find(target);
    if (sourceRoot === targetRoot) return false;
    if (!this.parent.has(sourceRoot) || !this.parent.has(targetRoot)) {
      return false;
    }

    this.parent.set(sourceRoot, targetRoot);
    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /**
   * Distinct canonical ids, ascending
   */
  canonicalIds(): number[] {
    const roots = new Set<number>();
    for (const id of this.parent.keys()) {
      roots.add(this.find(id));
    }
    return [...roots].sort((a, b) => a - b);
  }
}
