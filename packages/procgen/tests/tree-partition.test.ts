import { describe, expect, it } from "vitest";
import { TreePartition } from "../src/core/algorithms/tree-partition";

describe("TreePartition", () => {
  it("starts with every id canonical", () => {
    const partition = new TreePartition(4);
    expect(partition.size).toBe(4);
    expect(partition.canonicalIds()).toEqual([1, 2, 3, 4]);
    expect(partition.find(3)).toBe(3);
  });

  it("keeps the target as canonical id", () => {
    const partition = new TreePartition(3);
    expect(partition.merge(1, 3)).toBe(true);
    expect(partition.find(1)).toBe(3);
    expect(partition.canonicalIds()).toEqual([2, 3]);
  });

  it("resolves chains of merges", () => {
    const partition = new TreePartition(3);
    partition.merge(1, 2);
    partition.merge(2, 3);
    expect(partition.find(1)).toBe(3);
    expect(partition.find(2)).toBe(3);
    expect(partition.canonicalIds()).toEqual([3]);
  });

  it("merges a non-canonical source through its root", () => {
    const partition = new TreePartition(4);
    partition.merge(1, 2);
    partition.merge(1, 4);
    expect(partition.find(2)).toBe(4);
    expect(partition.connected(1, 4)).toBe(true);
    expect(partition.connected(3, 4)).toBe(false);
  });

  it("returns false when already unified", () => {
    const partition = new TreePartition(2);
    partition.merge(2, 1);
    expect(partition.merge(1, 2)).toBe(false);
    expect(partition.merge(2, 2)).toBe(false);
    expect(partition.canonicalIds()).toEqual([1]);
  });

  it("resolves unknown ids to themselves without merging them", () => {
    const partition = new TreePartition(2);
    expect(partition.find(99)).toBe(99);
    expect(partition.merge(1, 99)).toBe(false);
    expect(partition.find(1)).toBe(1);
  });
});
