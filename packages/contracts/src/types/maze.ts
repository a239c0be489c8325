/**
 * Shared maze types consumed by the generator and by anything that
 * renders or stores its output.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * How many of a frontier position's viable moves become new branches.
 */
export const BranchingStrategy = {
  /** A random non-empty subset, never all of them when there is a choice */
  RANDOM: "random",
  /** At most two moves */
  PARTIAL: "partial",
  /** Every viable move */
  FULL: "full",
} as const;

export type BranchingStrategy =
  (typeof BranchingStrategy)[keyof typeof BranchingStrategy];

/**
 * Minimal random source threaded through seeding and growth.
 * `SeededRandom` implements it; tests may supply scripted sources.
 */
export interface RandomSource {
  /** Uniform double in [0, 1) */
  next(): number;
  /** Uniform integer in [min, max] */
  range(min: number, max: number): number;
  /** `count` distinct elements drawn without replacement */
  sample<T>(array: readonly T[], count: number): T[];
}

/**
 * Maze generation input.
 */
export interface MazeConfig {
  readonly width: number;
  readonly height: number;
  /** Number of seed trees (default 1) */
  readonly treeCount?: number;
  /** Per-position growth probability, clamped to [0.1, 1] (default 1) */
  readonly growthRate?: number;
  /**
   * Branching strategy name. Matched case-insensitively against
   * `BranchingStrategy`; anything else means RANDOM.
   */
  readonly strategy?: string;
  /** uint32 seed for the generator's PRNG (random when omitted) */
  readonly seed?: number;
  /** Explicit seed cluster centers, one per tree */
  readonly seedPositions?: readonly Point[];
  /** Seed sub-grid spacing (default 5) */
  readonly spacing?: number;
}

/**
 * Config after defaults, clamping and strategy parsing.
 */
export interface ResolvedMazeConfig {
  readonly width: number;
  readonly height: number;
  readonly treeCount: number;
  readonly growthRate: number;
  readonly strategy: BranchingStrategy;
  readonly seed: number | undefined;
  readonly seedPositions: readonly Point[] | undefined;
  readonly spacing: number;
}

/**
 * Read-only picture of a maze at one instant.
 *
 * `cells` is row-major (`y * width + x`) occupancy: 1 for a path cell,
 * 0 for empty.
 */
export interface MazeSnapshot {
  readonly width: number;
  readonly height: number;
  readonly cells: Uint8Array;
  readonly entry: Point | null;
  readonly exit: Point | null;
  readonly iteration: number;
  readonly complete: boolean;
}
