/**
 * Maze Checksum Calculator
 *
 * Deterministic checksums for maze snapshots, used to verify that a seed
 * reproduces the same maze. Format: "v{version}:{hash}".
 */

import type { MazeSnapshot, Point } from "@sapling/contracts";

/**
 * Increment when changing what data is hashed or how.
 */
export const CHECKSUM_VERSION = 1;

const FNV64_OFFSET_BASIS = 14695981039346656037n;
const FNV64_PRIME = 1099511628211n;
const MASK_64 = (1n << 64n) - 1n;

/**
 * FNV-1a 64 over the parts of a maze that define its layout.
 * Integers are fed little-endian, four bytes each.
 */
export class MazeHasher {
  private state = FNV64_OFFSET_BASIS;

  private byte(value: number): this {
    this.state ^= BigInt(value & 0xff);
    this.state = (this.state * FNV64_PRIME) & MASK_64;
    return this;
  }

  private int32(value: number): this {
    for (let shift = 0; shift < 32; shift += 8) {
      this.byte(value >>> shift);
    }
    return this;
  }

  dimensions(width: number, height: number): this {
    return this.int32(width).int32(height);
  }

  /** One byte per cell, row-major */
  occupancy(cells: Uint8Array): this {
    for (const cell of cells) {
      this.byte(cell);
    }
    return this;
  }

  /** A missing endpoint hashes as a single zero byte */
  endpoint(point: Point | null): this {
    return point === null ? this.byte(0) : this.byte(1).int32(point.x).int32(point.y);
  }

  /** 16 lowercase hex digits */
  digest(): string {
    return this.state.toString(16).padStart(16, "0");
  }
}

/**
 * Parse a versioned checksum into its components.
 */
export function parseChecksum(checksum: string): {
  version: number;
  hash: string;
} | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]+)$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: parseInt(match[1], 10),
    hash: match[2],
  };
}

/**
 * Checksum over dimensions, occupancy, entry and exit.
 *
 * Tree ids are left out: two runs that carve the same corridors hash the
 * same even if their merges resolved to different canonical ids.
 */
export function calculateMazeChecksum(snapshot: MazeSnapshot): string {
  const hash = new MazeHasher()
    .dimensions(snapshot.width, snapshot.height)
    .occupancy(snapshot.cells)
    .endpoint(snapshot.entry)
    .endpoint(snapshot.exit)
    .digest();
  return `v${CHECKSUM_VERSION}:${hash}`;
}
