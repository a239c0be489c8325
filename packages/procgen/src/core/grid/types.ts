/**
 * Grid types for maze generation.
 */

import type { Bounds, Point } from "../geometry/types";

/**
 * Value of an unoccupied cell. Occupied cells hold a positive raw tree id.
 */
export const EMPTY_CELL = 0;

/**
 * Region represents a 4-connected set of occupied cells.
 */
export interface Region {
  readonly id: number;
  readonly points: readonly Point[];
  readonly bounds: Bounds;
  readonly size: number;
}

/**
 * Read-only grid interface.
 *
 * Values are raw tree ids as painted during growth. They are historical:
 * resolve them through the tree partition before comparing trees.
 *
 * @example
 * ```typescript
 * function countPathCells(grid: ReadonlyTreeGrid): number {
 *   return grid.countOccupied();
 * }
 * ```
 */
export interface ReadonlyTreeGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): number;
  getAt(p: Point): number;
  isOccupied(x: number, y: number): boolean;

  countOccupied(): number;
  forEach(callback: (x: number, y: number, value: number) => void): void;
  getOccupancy(): Uint8Array;
  getRawDataCopy(): Int32Array;
}

/**
 * Mutable grid interface. Only the generator writes cells.
 */
export interface MutableTreeGrid extends ReadonlyTreeGrid {
  set(x: number, y: number, value: number): void;
  setAt(p: Point, value: number): void;
}
