import { afterEach, describe, expect, it, vi } from "vitest";
import { EMPTY_CELL, TreeGrid } from "../src/core/grid";

describe("TreeGrid", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts empty", () => {
    const grid = new TreeGrid(4, 3);
    expect(grid.countOccupied()).toBe(0);
    expect(grid.get(3, 2)).toBe(EMPTY_CELL);
    expect(grid.width).toBe(4);
  });

  it("rejects non-positive dimensions", () => {
    expect(() => new TreeGrid(0, 3)).toThrow("Invalid grid dimensions: 0x3");
  });

  it("stores tree ids row-major", () => {
    const grid = new TreeGrid(4, 3);
    grid.set(1, 2, 7);
    grid.setAt({ x: 3, y: 0 }, 2);

    expect(grid.get(1, 2)).toBe(7);
    expect(grid.getAt({ x: 3, y: 0 })).toBe(2);
    expect(grid.isOccupied(1, 2)).toBe(true);
    expect(grid.isOccupied(0, 0)).toBe(false);
    expect(grid.countOccupied()).toBe(2);
    expect([...grid.getRawDataCopy()]).toEqual([0, 0, 0, 2, 0, 0, 0, 0, 0, 7, 0, 0]);
  });

  it("reads empty outside the grid", () => {
    const grid = new TreeGrid(3, 3);
    grid.set(0, 0, 1);
    expect(grid.get(-1, 0)).toBe(EMPTY_CELL);
    expect(grid.get(0, 3)).toBe(EMPTY_CELL);
    expect(grid.isOccupied(3, 0)).toBe(false);
  });

  it("drops writes outside the grid with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const grid = new TreeGrid(3, 3);
    grid.set(5, 1, 1);

    expect(grid.countOccupied()).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "TreeGrid.set: out of bounds (5, 1) for grid 3x3",
    );
  });

  it("exports occupancy as 0/1 bytes", () => {
    const grid = new TreeGrid(3, 2);
    grid.set(0, 0, 4);
    grid.set(2, 1, 1);
    expect([...grid.getOccupancy()]).toEqual([1, 0, 0, 0, 0, 1]);
  });

  it("visits every cell in row order", () => {
    const grid = new TreeGrid(2, 2);
    grid.set(1, 0, 5);
    const visited: string[] = [];
    grid.forEach((x, y, value) => visited.push(`${x},${y}=${value}`));
    expect(visited).toEqual(["0,0=0", "1,0=5", "0,1=0", "1,1=0"]);
  });

  it("copies raw data", () => {
    const grid = new TreeGrid(2, 1);
    const copy = grid.getRawDataCopy();
    copy[0] = 9;
    expect(grid.get(0, 0)).toBe(EMPTY_CELL);
  });
});
