import type { Point } from "../../core/geometry/types";

/**
 * Frontier positions keyed by canonical tree id.
 *
 * A tree is live while it has an entry here. `settle` retires a tree whose
 * frontier ran dry; `transfer` hands a merged tree's positions to the tree
 * it merged into, reviving that tree if it had already finished.
 *
 * `get` returns the stored array itself, so a caller walking a frontier can
 * tell a transfer happened by comparing identities.
 */
export class FrontierArena {
  private readonly frontiers: Map<number, Point[]> = new Map();

  get size(): number {
    return this.frontiers.size;
  }

  has(tree: number): boolean {
    return this.frontiers.has(tree);
  }

  get(tree: number): Point[] | undefined {
    return this.frontiers.get(tree);
  }

  /**
   * Live trees in the order they were planted or revived
   */
  trees(): number[] {
    return [...this.frontiers.keys()];
  }

  plant(tree: number, positions: readonly Point[]): void {
    this.frontiers.set(tree, [...positions]);
  }

  /**
   * Append freshly grown heads to a tree's frontier.
   * @returns True when the tree has nothing left and was retired
   */
  settle(tree: number, heads: readonly Point[]): boolean {
    const frontier = this.frontiers.get(tree) ?? [];
    frontier.push(...heads);

    if (frontier.length === 0) {
      this.frontiers.delete(tree);
      return true;
    }
    this.frontiers.set(tree, frontier);
    return false;
  }

  transfer(source: number, target: number): void {
    const moving = this.frontiers.get(source) ?? [];
    this.frontiers.delete(source);

    const absorbing = this.frontiers.get(target);
    if (absorbing) {
      absorbing.push(...moving);
    } else {
      this.frontiers.set(target, [...moving]);
    }
  }
}
