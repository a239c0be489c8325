/**
 * Geometry operations - pure functions over points and directions.
 */

import type { Direction, Point } from "./types";

/**
 * Chebyshev (king-move) distance between two points
 */
export function chebyshevDistance(a: Point, b: Point): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

/**
 * Step `distance` cells from `origin` along `direction`
 */
export function stepPoint(
  origin: Point,
  direction: Direction,
  distance: number,
): Point {
  return {
    x: origin.x + direction.dx * distance,
    y: origin.y + direction.dy * distance,
  };
}

/**
 * The three cells `distance` steps ahead of `origin`, spread across the
 * axis perpendicular to `direction`, in offset order -1, 0, +1.
 */
export function perpendicularWindow(
  origin: Point,
  direction: Direction,
  distance: number,
): [Point, Point, Point] {
  const center = stepPoint(origin, direction, distance);
  // Perpendicular unit vector: swap the axes
  const px = Math.abs(direction.dy);
  const py = Math.abs(direction.dx);
  return [
    { x: center.x - px, y: center.y - py },
    center,
    { x: center.x + px, y: center.y + py },
  ];
}
