import { areConnected, findOccupiedRegions } from "../core/grid/flood-fill";
import type { MazeView } from "../generators/growing-tree/generator";

/**
 * Statistics for analyzing a maze
 */
export interface MazeStats {
  readonly width: number;
  readonly height: number;
  readonly occupiedCells: number;
  /** Occupied cells / total cells */
  readonly density: number;
  readonly treeCount: number;
  readonly canonicalTrees: number;
  readonly regionCount: number;
  readonly largestRegion: number;
  readonly iterations: number;
  readonly hasEntry: boolean;
  readonly hasExit: boolean;
  /** Entry and exit lie in the same occupied region */
  readonly entryReachesExit: boolean;
}

/**
 * Compute statistics for a maze, finished or not
 */
export function computeMazeStats(maze: MazeView): MazeStats {
  const occupiedCells = maze.grid.countOccupied();
  const regions = findOccupiedRegions(maze.grid);

  let largestRegion = 0;
  for (const region of regions) {
    if (region.size > largestRegion) largestRegion = region.size;
  }

  return {
    width: maze.width,
    height: maze.height,
    occupiedCells,
    density: occupiedCells / (maze.width * maze.height),
    treeCount: maze.treeCount,
    canonicalTrees: maze.canonicalTrees().length,
    regionCount: regions.length,
    largestRegion,
    iterations: maze.iteration,
    hasEntry: maze.entry !== null,
    hasExit: maze.exit !== null,
    entryReachesExit:
      maze.entry !== null &&
      maze.exit !== null &&
      areConnected(maze.grid, maze.entry, maze.exit),
  };
}
