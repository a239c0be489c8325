/**
 * Flood fill over occupied cells, for connectivity checks.
 */

import { DIRECTIONS_4, type Bounds, type Point } from "../geometry/types";
import type { ReadonlyTreeGrid, Region } from "./types";

/**
 * Collect the 4-connected occupied cells reachable from (startX, startY).
 * Returns an empty array when the start is out of bounds or empty.
 */
export function floodFillOccupied(
  grid: ReadonlyTreeGrid,
  startX: number,
  startY: number,
  visited: Uint8Array = new Uint8Array(grid.width * grid.height),
): Point[] {
  if (!grid.isInBounds(startX, startY) || !grid.isOccupied(startX, startY)) {
    return [];
  }

  const points: Point[] = [];
  const stack: Point[] = [{ x: startX, y: startY }];
  visited[startY * grid.width + startX] = 1;

  let current = stack.pop();
  while (current) {
    points.push(current);

    for (const dir of DIRECTIONS_4) {
      const nx = current.x + dir.x;
      const ny = current.y + dir.y;
      if (!grid.isInBounds(nx, ny)) continue;
      const index = ny * grid.width + nx;
      if (visited[index] === 1 || !grid.isOccupied(nx, ny)) continue;
      visited[index] = 1;
      stack.push({ x: nx, y: ny });
    }

    current = stack.pop();
  }

  return points;
}

function boundsOf(points: readonly Point[]): Bounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }
  return { minX, minY, maxX, maxY };
}

/**
 * Split the occupied cells into 4-connected regions, scanning rows top
 * to bottom. Region ids are assigned in discovery order starting at 0.
 */
export function findOccupiedRegions(grid: ReadonlyTreeGrid): Region[] {
  const visited = new Uint8Array(grid.width * grid.height);
  const regions: Region[] = [];

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (visited[y * grid.width + x] === 1 || !grid.isOccupied(x, y)) {
        continue;
      }
      const points = floodFillOccupied(grid, x, y, visited);
      regions.push({
        id: regions.length,
        points,
        bounds: boundsOf(points),
        size: points.length,
      });
    }
  }

  return regions;
}

/**
 * Check whether two cells belong to the same occupied region
 */
export function areConnected(
  grid: ReadonlyTreeGrid,
  a: Point,
  b: Point,
): boolean {
  if (!grid.isOccupied(b.x, b.y)) return false;
  return floodFillOccupied(grid, a.x, a.y).some(
    (p) => p.x === b.x && p.y === b.y,
  );
}
