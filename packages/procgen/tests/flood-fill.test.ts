import { describe, expect, it } from "vitest";
import {
  areConnected,
  findOccupiedRegions,
  floodFillOccupied,
  TreeGrid,
} from "../src/core/grid";

function gridFrom(rows: string[]): TreeGrid {
  const width = rows[0]?.length ?? 0;
  const grid = new TreeGrid(width, rows.length);
  rows.forEach((row, y) => {
    for (let x = 0; x < row.length; x++) {
      if (row[x] === "#") grid.set(x, y, 1);
    }
  });
  return grid;
}

describe("floodFillOccupied", () => {
  it("collects 4-connected cells only", () => {
    const grid = gridFrom([
      "##...",
      ".#...",
      "..#..",
    ]);
    const points = floodFillOccupied(grid, 0, 0);
    expect(points).toHaveLength(3);
    expect(points).toContainEqual({ x: 1, y: 1 });
    expect(points).not.toContainEqual({ x: 2, y: 2 });
  });

  it("returns nothing from an empty or out-of-bounds start", () => {
    const grid = gridFrom(["#.", ".."]);
    expect(floodFillOccupied(grid, 1, 1)).toEqual([]);
    expect(floodFillOccupied(grid, -1, 0)).toEqual([]);
  });
});

describe("findOccupiedRegions", () => {
  it("numbers regions in scan order", () => {
    const grid = gridFrom([
      "##...",
      "...#.",
      "...##",
    ]);
    const regions = findOccupiedRegions(grid);

    expect(regions).toHaveLength(2);
    expect(regions[0]?.id).toBe(0);
    expect(regions[0]?.size).toBe(2);
    expect(regions[0]?.bounds).toEqual({ minX: 0, minY: 0, maxX: 1, maxY: 0 });
    expect(regions[1]?.size).toBe(3);
    expect(regions[1]?.bounds).toEqual({ minX: 3, minY: 1, maxX: 4, maxY: 2 });
  });

  it("finds no regions on an empty grid", () => {
    expect(findOccupiedRegions(new TreeGrid(3, 3))).toEqual([]);
  });
});

describe("areConnected", () => {
  it("follows paths around corners", () => {
    const grid = gridFrom([
      "###",
      "..#",
      "###",
    ]);
    expect(areConnected(grid, { x: 0, y: 0 }, { x: 0, y: 2 })).toBe(true);
    expect(areConnected(grid, { x: 0, y: 0 }, { x: 0, y: 1 })).toBe(false);
  });
});
