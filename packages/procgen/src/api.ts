/**
 * Maze API
 *
 * High-level API for maze generation. Unlike the `MazeGenerator`
 * constructor, these functions never throw on bad config.
 */

import {
  type MazeConfig,
  MazeError,
  type MazeSnapshot,
  Result,
} from "@sapling/contracts";
import { calculateMazeChecksum } from "./core/hash";
import {
  MazeGenerator,
  type MazeGeneratorOptions,
} from "./generators/growing-tree";
import { computeMazeStats, type MazeStats } from "./validation/compute-stats";

export { parseBranchingStrategy } from "@sapling/contracts";

/**
 * Successful maze result.
 */
export interface MazeSuccess<T> {
  readonly success: true;
  readonly value: T;
}

/**
 * Failed maze result.
 */
export interface MazeFailure {
  readonly success: false;
  readonly error: MazeError;
}

/**
 * Discriminated union - use `if (result.success)` to narrow.
 */
export type MazeResult<T> = MazeSuccess<T> | MazeFailure;

/**
 * A fully built maze
 */
export interface GeneratedMaze {
  readonly snapshot: MazeSnapshot;
  /** See `calculateMazeChecksum` */
  readonly checksum: string;
  readonly iterations: number;
  readonly durationMs: number;
  readonly stats: MazeStats;
}

/**
 * Create a generator without growing it.
 *
 * @example
 * ```typescript
 * const result = createMaze({ width: 31, height: 21, seed: 42 });
 * if (result.success) {
 *   while (!result.value.stepOnce()) {
 *     draw(result.value.snapshot());
 *   }
 * }
 * ```
 */
export function createMaze(
  config: MazeConfig,
  options?: MazeGeneratorOptions,
): MazeResult<MazeGenerator> {
  return Result.fromThrowable(
    () => new MazeGenerator(config, options),
    asMazeError,
  ).match<MazeResult<MazeGenerator>>(
    (value) => ({ success: true, value }),
    (error) => ({ success: false, error }),
  );
}

function asMazeError(error: unknown): MazeError {
  if (MazeError.isMazeError(error)) {
    return error;
  }
  throw error;
}

/**
 * Create and build a maze in one call.
 *
 * @example
 * ```typescript
 * const result = generateMaze({ width: 41, height: 31, treeCount: 3, seed: 7 });
 * if (result.success) {
 *   console.log(result.value.checksum, result.value.stats.density);
 * }
 * ```
 */
export function generateMaze(
  config: MazeConfig,
  options?: MazeGeneratorOptions,
): MazeResult<GeneratedMaze> {
  const created = createMaze(config, options);
  if (!created.success) {
    return created;
  }

  const maze = created.value;
  const startTime = performance.now();
  maze.build();
  const durationMs = performance.now() - startTime;

  const snapshot = maze.snapshot();
  return {
    success: true,
    value: {
      snapshot,
      checksum: calculateMazeChecksum(snapshot),
      iterations: maze.iteration,
      durationMs,
      stats: computeMazeStats(maze),
    },
  };
}
