/**
 * Seed placement for the growing-tree generator.
 */

import { MazeError, type RandomSource } from "@sapling/contracts";
import { chebyshevDistance } from "../../core/geometry/operations";
import type { Point } from "../../core/geometry/types";
import {
  MIN_SEED_DISTANCE,
  SEED_BORDER_RESERVE,
  SEED_CLUSTER_OFFSETS,
  SEED_MARGIN,
} from "./constants";

/**
 * The five cells of the plus-shaped cluster around `center`, in the
 * order they enter the tree's frontier.
 */
export function seedCluster(center: Point): Point[] {
  return SEED_CLUSTER_OFFSETS.map((offset) => ({
    x: center.x + offset.x,
    y: center.y + offset.y,
  }));
}

/**
 * Columns and rows of the coarse sub-grid random seeds are drawn from.
 */
export function seedCapacity(
  width: number,
  height: number,
  spacing: number,
): { columns: number; rows: number } {
  return {
    columns: Math.max(0, Math.floor((width - SEED_BORDER_RESERVE) / spacing)),
    rows: Math.max(0, Math.floor((height - SEED_BORDER_RESERVE) / spacing)),
  };
}

function indices(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

/**
 * Draw `count` seed centers on the sub-grid.
 *
 * Columns and rows are each sampled without replacement and paired up,
 * so no two seeds share a sub-grid row or column and clusters never
 * overlap.
 *
 * @throws {MazeError} INVALID_DIMENSIONS when the sub-grid is too small
 */
export function placeRandomSeeds(
  width: number,
  height: number,
  count: number,
  spacing: number,
  rng: RandomSource,
): Point[] {
  const { columns, rows } = seedCapacity(width, height, spacing);
  if (count > Math.min(columns, rows)) {
    throw MazeError.invalidDimensions(
      `Grid ${width}x${height} fits at most ${Math.min(columns, rows)} seed(s) at spacing ${spacing}, ${count} requested`,
      { width, height, treeCount: count, spacing, columns, rows },
    );
  }

  const xs = rng.sample(indices(columns), count);
  const ys = rng.sample(indices(rows), count);

  return xs.map((column, i) => ({
    x: SEED_MARGIN + column * spacing,
    y: SEED_MARGIN + (ys[i] ?? 0) * spacing,
  }));
}

/**
 * Check caller-supplied seed centers.
 *
 * @throws {MazeError} INVALID_DIMENSIONS for a center outside the margins,
 * INVALID_PARAMETER for two centers closer than `MIN_SEED_DISTANCE`
 */
export function validateSeedPositions(
  width: number,
  height: number,
  positions: readonly Point[],
): Point[] {
  const maxX = width - 1 - SEED_MARGIN;
  const maxY = height - 1 - SEED_MARGIN;

  for (const p of positions) {
    if (p.x < SEED_MARGIN || p.x > maxX || p.y < SEED_MARGIN || p.y > maxY) {
      throw MazeError.invalidDimensions(
        `Seed (${p.x}, ${p.y}) must lie within [${SEED_MARGIN}, ${maxX}] x [${SEED_MARGIN}, ${maxY}]`,
        { width, height, seed: p },
      );
    }
  }

  for (let i = 0; i < positions.length; i++) {
    for (let j = i + 1; j < positions.length; j++) {
      const a = positions[i];
      const b = positions[j];
      if (!a || !b) continue;
      if (chebyshevDistance(a, b) < MIN_SEED_DISTANCE) {
        throw MazeError.invalidParameter(
          `Seeds (${a.x}, ${a.y}) and (${b.x}, ${b.y}) are closer than ${MIN_SEED_DISTANCE} cells`,
          { first: a, second: b },
        );
      }
    }
  }

  return positions.map((p) => ({ x: p.x, y: p.y }));
}
