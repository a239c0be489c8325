/**
 * Testing utilities for maze generation.
 * Separated from validation.ts to avoid circular dependencies.
 */

import type { MazeConfig } from "@sapling/contracts";
import { generateMaze } from "./api";

// =============================================================================
// DETERMINISM TESTING
// =============================================================================

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly config: MazeConfig,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

function buildChecksums(
  config: MazeConfig,
  runs: number,
): { checksums: string[]; durations: number[] } {
  if (config.seed === undefined) {
    throw new Error("Determinism checks need a seeded config");
  }

  const checksums: string[] = [];
  const durations: number[] = [];

  for (let i = 0; i < runs; i++) {
    const result = generateMaze(config);
    if (!result.success) {
      throw new Error(
        `Generation failed on run ${i + 1}: ${result.error.message}`,
      );
    }
    checksums.push(result.value.checksum);
    durations.push(result.value.durationMs);
  }

  return { checksums, durations };
}

/**
 * Assert that a seeded config always builds the same maze.
 *
 * @param config - Maze configuration (must include seed)
 * @param runs - Number of times to build (default: 3)
 * @throws {DeterminismViolationError} If different runs produce different checksums
 *
 * @example
 * ```typescript
 * it("is deterministic", () => {
 *   assertDeterministic({ width: 41, height: 31, treeCount: 2, seed: 12345 });
 * });
 * ```
 */
export function assertDeterministic(
  config: MazeConfig,
  runs: number = 3,
): void {
  const { checksums } = buildChecksums(config, runs);

  const uniqueChecksums = [...new Set(checksums)];
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, config);
  }
}

/**
 * Test determinism and return detailed results instead of throwing.
 */
export function testDeterminism(
  config: MazeConfig,
  runs: number = 3,
): {
  deterministic: boolean;
  checksums: string[];
  uniqueChecksums: string[];
  durations: number[];
  avgDuration: number;
} {
  const { checksums, durations } = buildChecksums(config, runs);

  const uniqueChecksums = [...new Set(checksums)];
  const avgDuration =
    durations.length > 0
      ? durations.reduce((a, b) => a + b, 0) / durations.length
      : 0;

  return {
    deterministic: uniqueChecksums.length <= 1,
    checksums,
    uniqueChecksums,
    durations,
    avgDuration,
  };
}
