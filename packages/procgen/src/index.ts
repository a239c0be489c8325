/**
 * Sapling Procgen - Growing-Tree Maze Generation
 *
 * Grows competing trees of path cells from seed clusters until every tree
 * has run out of room, merging trees whose growth fronts meet.
 *
 * @example
 * ```typescript
 * import { generateMaze, renderAscii, SIMPLE_CHARSET } from "@sapling/procgen";
 *
 * const result = generateMaze({ width: 41, height: 21, treeCount: 2, seed: 12345 });
 *
 * if (result.success) {
 *   console.log(renderAscii(result.value.snapshot, { charset: SIMPLE_CHARSET }));
 * }
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Pipeline (tracing)
export * from "./pipeline";
// Utilities
export * from "./utils";

// High-level API
export * from "./api";
export * from "./seed";
export * from "./testing";
export * from "./validation";

export {
  BranchingStrategy,
  type MazeConfig,
  MazeError,
  type MazeSnapshot,
  type Point,
  type RandomSource,
  SeededRandom,
} from "@sapling/contracts";
