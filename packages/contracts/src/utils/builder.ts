import {
  DIMENSION_FIELDS,
  MazeConfigSchema,
} from "../schemas/maze";
import { MazeError } from "../types/error";
import {
  BranchingStrategy,
  type MazeConfig,
  type ResolvedMazeConfig,
} from "../types/maze";
import { Err, Ok, type Result } from "../types/result";

export const DEFAULT_TREE_COUNT = 1;
export const DEFAULT_GROWTH_RATE = 1;
export const DEFAULT_SEED_SPACING = 5;
export const MIN_GROWTH_RATE = 0.1;
export const MAX_GROWTH_RATE = 1;

/**
 * Clamp a growth rate into [0.1, 1]. A rate of 0 would never grow.
 */
export function clampGrowthRate(rate: number): number {
  return Math.max(MIN_GROWTH_RATE, Math.min(MAX_GROWTH_RATE, rate));
}

/**
 * Parse a strategy name case-insensitively; unknown names mean RANDOM.
 */
export function parseBranchingStrategy(
  value: string | undefined,
): BranchingStrategy {
  switch (value?.trim().toLowerCase()) {
    case BranchingStrategy.PARTIAL:
      return BranchingStrategy.PARTIAL;
    case BranchingStrategy.FULL:
      return BranchingStrategy.FULL;
    default:
      return BranchingStrategy.RANDOM;
  }
}

/**
 * Validate a maze config and fill in its defaults.
 *
 * Issues on width or height become `INVALID_DIMENSIONS`, everything else
 * `INVALID_PARAMETER`. Grid capacity for the seeds is checked later, by
 * seed placement.
 */
export function buildMazeConfig(
  input: MazeConfig,
): Result<ResolvedMazeConfig, MazeError> {
  const parsed = MazeConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues;
    const message = issues
      .map((issue) => `${issue.path.map(String).join(".") || "config"}: ${issue.message}`)
      .join("; ");
    const details = { issues: issues.map((issue) => issue.message) };
    const dimensional = issues.some((issue) =>
      DIMENSION_FIELDS.includes(String(issue.path[0])),
    );
    return Err(
      dimensional
        ? MazeError.invalidDimensions(message, details)
        : MazeError.invalidParameter(message, details),
    );
  }

  const data = parsed.data;
  return Ok({
    width: data.width,
    height: data.height,
    treeCount: data.treeCount ?? DEFAULT_TREE_COUNT,
    growthRate: clampGrowthRate(data.growthRate ?? DEFAULT_GROWTH_RATE),
    strategy: parseBranchingStrategy(data.strategy),
    seed: data.seed,
    seedPositions: data.seedPositions,
    spacing: data.spacing ?? DEFAULT_SEED_SPACING,
  });
}
