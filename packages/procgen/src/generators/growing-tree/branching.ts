import { BranchingStrategy, type RandomSource } from "@sapling/contracts";

/**
 * Pick which viable moves become branches.
 *
 * - RANDOM: every move when there are at most one, otherwise a subset
 *   whose size is uniform in [1, n - 1]
 * - PARTIAL: up to two moves
 * - FULL: every move
 *
 * Subsets are drawn without replacement, in draw order.
 */
export function selectBranches<T>(
  moves: readonly T[],
  strategy: BranchingStrategy,
  rng: RandomSource,
): T[] {
  switch (strategy) {
    case BranchingStrategy.FULL:
      return [...moves];
    case BranchingStrategy.PARTIAL:
      return rng.sample(moves, Math.min(moves.length, 2));
    case BranchingStrategy.RANDOM:
      if (moves.length <= 1) return [...moves];
      return rng.sample(moves, rng.range(1, moves.length - 1));
  }
}
