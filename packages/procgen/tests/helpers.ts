/**
 * Shared test fixtures.
 */

import { type RandomSource, sample } from "@sapling/contracts";

/**
 * Random source that replays a fixed list of numbers, then throws.
 */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  get consumed(): number {
    return this.index;
  }

  next(): number {
    const value = this.values[this.index];
    if (value === undefined) {
      throw new Error(`Script exhausted after ${this.index} values`);
    }
    this.index++;
    return value;
  }

  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  sample<T>(array: readonly T[], count: number): T[] {
    return sample(() => this.next(), array, count);
  }
}

/** Two trees on a 10x5 grid whose growth fronts meet after one step */
export const MERGE_CONFIG = {
  width: 10,
  height: 5,
  treeCount: 2,
  growthRate: 1,
  strategy: "full",
  seed: 1,
  seedPositions: [
    { x: 2, y: 2 },
    { x: 7, y: 2 },
  ],
};

/** One tree in the middle of a 10x10 grid */
export const SINGLE_TREE_CONFIG = {
  width: 10,
  height: 10,
  treeCount: 1,
  growthRate: 1,
  strategy: "full",
  seed: 1,
  seedPositions: [{ x: 5, y: 5 }],
};
