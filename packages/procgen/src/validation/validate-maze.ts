import type { Point } from "@sapling/contracts";
import { findOccupiedRegions } from "../core/grid/flood-fill";
import type { MazeView } from "../generators/growing-tree/generator";
import type { Violation } from "../pipeline/types";
import {
  hasErrorViolations,
  type MazeValidationResult,
} from "./result-types";

function checkEndpoint(
  maze: MazeView,
  type: "entry" | "exit",
  endpoint: Point | null,
  expectedX: number,
): Violation[] {
  if (endpoint === null) return [];

  const label = type === "entry" ? "Entry" : "Exit";
  const violations: Violation[] = [];

  if (endpoint.x !== expectedX) {
    violations.push({
      type: `invariant.${type}.edge`,
      message: `${label} at (${endpoint.x}, ${endpoint.y}) is not on column ${expectedX}`,
      severity: "error",
    });
  }
  if (!maze.grid.isOccupied(endpoint.x, endpoint.y)) {
    violations.push({
      type: `invariant.${type}.occupied`,
      message: `${label} at (${endpoint.x}, ${endpoint.y}) is not a path cell`,
      severity: "error",
    });
  }

  return violations;
}

/**
 * Validate a maze against its structural invariants.
 *
 * Checks:
 * - Entry on column 0 and exit on the last column, both path cells
 * - Every path cell resolves to a canonical tree in [1, treeCount]
 * - No more connected regions than canonical trees
 * - A complete maze has no live trees
 *
 * A missing entry or exit is a warning: a tree may finish before
 * reaching either edge.
 */
export function validateMaze(maze: MazeView): MazeValidationResult {
  const violations: Violation[] = [];

  violations.push(...checkEndpoint(maze, "entry", maze.entry, 0));
  violations.push(...checkEndpoint(maze, "exit", maze.exit, maze.width - 1));

  if (maze.isComplete()) {
    if (maze.entry === null) {
      violations.push({
        type: "invariant.entry.missing",
        message: "Maze completed without an entry",
        severity: "warning",
      });
    }
    if (maze.exit === null) {
      violations.push({
        type: "invariant.exit.missing",
        message: "Maze completed without an exit",
        severity: "warning",
      });
    }
  }

  let strayCells = 0;
  maze.grid.forEach((x, y, value) => {
    if (value === 0) return;
    const tree = maze.treeAt(x, y);
    if (tree < 1 || tree > maze.treeCount) strayCells++;
  });
  if (strayCells > 0) {
    violations.push({
      type: "invariant.tree.unknown",
      message: `${strayCells} path cell(s) resolve to no known tree`,
      severity: "error",
    });
  }

  const canonical = maze.canonicalTrees().length;
  const regions = findOccupiedRegions(maze.grid).length;
  if (regions > canonical) {
    violations.push({
      type: "invariant.tree.split",
      message: `${regions} disconnected regions for ${canonical} tree(s)`,
      severity: "error",
    });
  }

  if (maze.isComplete() && maze.liveTrees().length > 0) {
    violations.push({
      type: "invariant.tree.live",
      message: "Complete maze still has live trees",
      severity: "error",
    });
  }

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
