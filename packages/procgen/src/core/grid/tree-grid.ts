/**
 * Flat-array grid of raw tree ids.
 */

import type { Point } from "../geometry/types";
import { EMPTY_CELL, type MutableTreeGrid } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * 2D grid stored row-major in an Int32Array (`y * width + x`).
 *
 * @remarks
 * Reads outside the grid return `EMPTY_CELL`; writes outside it are
 * dropped (with a warning in development).
 */
export class TreeGrid implements MutableTreeGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Int32Array;

  constructor(width: number, height: number) {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Int32Array(width * height);
  }

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  get(x: number, y: number): number {
    if (!this.isInBounds(x, y)) return EMPTY_CELL;
    return this.data[y * this.width + x] ?? EMPTY_CELL;
  }

  getAt(p: Point): number {
    return this.get(p.x, p.y);
  }

  isOccupied(x: number, y: number): boolean {
    return this.get(x, y) !== EMPTY_CELL;
  }

  set(x: number, y: number, value: number): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `TreeGrid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = value;
  }

  setAt(p: Point, value: number): void {
    this.set(p.x, p.y, value);
  }

  countOccupied(): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== EMPTY_CELL) count++;
    }
    return count;
  }

  forEach(callback: (x: number, y: number, value: number) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        callback(x, y, this.data[y * this.width + x] ?? EMPTY_CELL);
      }
    }
  }

  /**
   * Row-major occupancy copy: 1 for occupied, 0 for empty
   */
  getOccupancy(): Uint8Array {
    const cells = new Uint8Array(this.data.length);
    for (let i = 0; i < this.data.length; i++) {
      cells[i] = this.data[i] === EMPTY_CELL ? 0 : 1;
    }
    return cells;
  }

  getRawDataCopy(): Int32Array {
    return new Int32Array(this.data);
  }
}
