import { BranchingStrategy } from "@sapling/contracts";
import { describe, expect, it } from "vitest";
import { selectBranches } from "../src/generators/growing-tree/branching";
import { ScriptedRandom } from "./helpers";

describe("selectBranches", () => {
  const moves = ["a", "b", "c"];

  it("takes every move under FULL without drawing", () => {
    const rng = new ScriptedRandom([]);
    const picked = selectBranches(moves, BranchingStrategy.FULL, rng);
    expect(picked).toEqual(["a", "b", "c"]);
    expect(picked).not.toBe(moves);
    expect(rng.consumed).toBe(0);
  });

  it("samples two moves under PARTIAL", () => {
    const rng = new ScriptedRandom([0.99, 0]);
    expect(selectBranches(moves, BranchingStrategy.PARTIAL, rng)).toEqual([
      "c",
      "b",
    ]);
    expect(rng.consumed).toBe(2);
  });

  it("takes a lone move under PARTIAL", () => {
    const rng = new ScriptedRandom([0.5]);
    expect(selectBranches(["a"], BranchingStrategy.PARTIAL, rng)).toEqual([
      "a",
    ]);
  });

  it("draws a subset size in [1, n - 1] under RANDOM", () => {
    // size = 2, then sample: keep "a", swap "b" and "c"
    const rng = new ScriptedRandom([0.5, 0, 0.7]);
    expect(selectBranches(moves, BranchingStrategy.RANDOM, rng)).toEqual([
      "a",
      "c",
    ]);
    expect(rng.consumed).toBe(3);
  });

  it("keeps zero or one move under RANDOM without drawing", () => {
    const rng = new ScriptedRandom([]);
    expect(selectBranches([], BranchingStrategy.RANDOM, rng)).toEqual([]);
    expect(selectBranches(["a"], BranchingStrategy.RANDOM, rng)).toEqual(["a"]);
    expect(rng.consumed).toBe(0);
  });

  it("never returns more than n - 1 moves under RANDOM", () => {
    const rng = new ScriptedRandom([0.999, 0, 0, 0]);
    const picked = selectBranches(
      ["n", "e", "s", "w"],
      BranchingStrategy.RANDOM,
      rng,
    );
    expect(picked).toEqual(["n", "e", "s"]);
  });
});
