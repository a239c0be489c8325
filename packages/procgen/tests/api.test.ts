import { describe, expect, it } from "vitest";
import {
  createMaze,
  generateMaze,
  parseBranchingStrategy,
} from "../src/api";
import { calculateMazeChecksum } from "../src/core/hash";
import { createSeedFromString, randomSeed } from "../src/seed";
import { MERGE_CONFIG } from "./helpers";

describe("createMaze", () => {
  it("returns an unbuilt generator", () => {
    const result = createMaze(MERGE_CONFIG);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.iteration).toBe(0);
      expect(result.value.isComplete()).toBe(false);
    }
  });

  it("returns errors instead of throwing", () => {
    const result = createMaze({ width: 10, height: 10, treeCount: 3 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("INVALID_DIMENSIONS");
      expect(result.error.message).toBe(
        "Grid 10x10 fits at most 1 seed(s) at spacing 5, 3 requested",
      );
    }
  });

  it("reports schema issues with their path", () => {
    const result = createMaze({ width: 10.5, height: 10 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("INVALID_DIMENSIONS");
      expect(result.error.message).toBe("width: Dimensions must be integers");
    }
  });
});

describe("generateMaze", () => {
  it("builds the maze and summarizes it", () => {
    const result = generateMaze(MERGE_CONFIG);
    expect(result.success).toBe(true);
    if (!result.success) return;

    const maze = result.value;
    expect(maze.iterations).toBe(3);
    expect(maze.snapshot.complete).toBe(true);
    expect(maze.stats.occupiedCells).toBe(16);
    expect(maze.checksum).toMatch(/^v1:[0-9a-f]{16}$/);
    expect(maze.checksum).toBe(calculateMazeChecksum(maze.snapshot));
    expect(maze.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("passes generator failures through", () => {
    const result = generateMaze({ width: 10, height: 10, growthRate: Number.NaN });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("INVALID_PARAMETER");
    }
  });
});

describe("parseBranchingStrategy", () => {
  it("is re-exported for callers", () => {
    expect(parseBranchingStrategy("Partial")).toBe("partial");
  });
});

describe("seeds", () => {
  it("hashes strings with DJB2", () => {
    expect(createSeedFromString("")).toBe(5381);
    expect(createSeedFromString("a")).toBe(177670);
    expect(createSeedFromString("maze")).toBe(createSeedFromString("maze"));
  });

  it("draws uint32 random seeds", () => {
    const seed = randomSeed();
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
  });
});
