/**
 * Core geometry types for maze generation.
 * All types are immutable value objects.
 */

import type { Point } from "@sapling/contracts";

export type { Point };

/**
 * Bounding box defined by min/max corners (inclusive)
 */
export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

/**
 * Unit step along one axis
 */
export interface Direction {
  readonly dx: number;
  readonly dy: number;
}

/**
 * Growth directions in the order a frontier position tries them:
 * east, west, south, north.
 */
export const GROWTH_DIRECTIONS = [
  { dx: 1, dy: 0 },
  { dx: -1, dy: 0 },
  { dx: 0, dy: 1 },
  { dx: 0, dy: -1 },
] as const satisfies readonly Direction[];

/**
 * 4-connected neighbor offsets
 */
export const DIRECTIONS_4 = [
  { x: 0, y: -1 }, // North
  { x: 1, y: 0 }, // East
  { x: 0, y: 1 }, // South
  { x: -1, y: 0 }, // West
] as const;
