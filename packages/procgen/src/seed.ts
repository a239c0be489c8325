/**
 * Seed Creation Utilities
 */

import { randomUint32 } from "@sapling/contracts";

/**
 * Create a uint32 maze seed from a string (DJB2 hash)
 */
export function createSeedFromString(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Create a random seed using system randomness.
 * Useful for quick testing or when reproducibility is not needed.
 *
 * @example
 * ```typescript
 * const seed = randomSeed();
 * const result = generateMaze({ width: 31, height: 21, seed });
 * console.log(`Seed ${seed}`);
 * ```
 */
export function randomSeed(): number {
  return randomUint32();
}
