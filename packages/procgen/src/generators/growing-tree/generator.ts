/**
 * Growing-Tree Maze Generator
 *
 * Grows several trees of path cells outward from seed clusters. Each
 * iteration every live tree tries to branch from its frontier positions;
 * branches keep one empty cell between them, and when two trees' growth
 * fronts meet they are bridged and merged into one tree.
 */

import {
  buildMazeConfig,
  type BranchingStrategy,
  type MazeConfig,
  type MazeSnapshot,
  type RandomSource,
  randomUint32,
  type ResolvedMazeConfig,
  SeededRandom,
} from "@sapling/contracts";
import { TreePartition } from "../../core/algorithms/tree-partition";
import {
  perpendicularWindow,
  stepPoint,
} from "../../core/geometry/operations";
import {
  type Direction,
  GROWTH_DIRECTIONS,
  type Point,
} from "../../core/geometry/types";
import { TreeGrid } from "../../core/grid/tree-grid";
import { EMPTY_CELL, type ReadonlyTreeGrid } from "../../core/grid/types";
import { createTraceCollector } from "../../pipeline/trace";
import type { TraceCollector } from "../../pipeline/types";
import { selectBranches } from "./branching";
import { PROBE_DISTANCE } from "./constants";
import { FrontierArena } from "./frontier-arena";
import {
  placeRandomSeeds,
  seedCluster,
  validateSeedPositions,
} from "./seeding";

const [EAST, WEST, SOUTH, NORTH] = GROWTH_DIRECTIONS;

export interface MazeGeneratorOptions {
  /** Random source; defaults to a SeededRandom on `config.seed` */
  readonly random?: RandomSource;
  readonly trace?: TraceCollector;
}

/**
 * Read-only view of a maze, for validation, stats and rendering.
 */
export interface MazeView {
  readonly width: number;
  readonly height: number;
  readonly treeCount: number;
  /** Raw tree ids as painted; resolve with `treeAt` */
  readonly grid: ReadonlyTreeGrid;
  readonly entry: Point | null;
  readonly exit: Point | null;
  readonly iteration: number;
  /** Canonical tree id at (x, y), 0 when empty */
  treeAt(x: number, y: number): number;
  isComplete(): boolean;
  liveTrees(): number[];
  canonicalTrees(): number[];
  snapshot(): MazeSnapshot;
}

/**
 * @example
 * ```typescript
 * const maze = new MazeGenerator({ width: 41, height: 31, treeCount: 3, seed: 7 });
 * maze.build();
 * console.log(maze.entry, maze.exit);
 * ```
 */
export class MazeGenerator implements MazeView {
  readonly config: ResolvedMazeConfig;
  readonly width: number;
  readonly height: number;
  readonly treeCount: number;
  /** Seed cluster centers; tree i + 1 grew from seeds[i] */
  readonly seeds: readonly Point[];

  private readonly cells: TreeGrid;
  private readonly partition: TreePartition;
  private readonly frontiers = new FrontierArena();
  private readonly rng: RandomSource;
  private readonly trace: TraceCollector;
  private entryPoint: Point | null = null;
  private exitPoint: Point | null = null;
  private iterations = 0;

  /**
   * @throws {MazeError} INVALID_DIMENSIONS or INVALID_PARAMETER; nothing
   * is built on failure
   */
  constructor(config: MazeConfig, options: MazeGeneratorOptions = {}) {
    this.config = buildMazeConfig(config).getOrThrow();
    this.width = this.config.width;
    this.height = this.config.height;
    this.treeCount = this.config.treeCount;
    this.rng =
      options.random ?? new SeededRandom(this.config.seed ?? randomUint32());
    this.trace = options.trace ?? createTraceCollector(false);

    this.seeds = this.config.seedPositions
      ? validateSeedPositions(this.width, this.height, this.config.seedPositions)
      : placeRandomSeeds(
          this.width,
          this.height,
          this.treeCount,
          this.config.spacing,
          this.rng,
        );

    this.cells = new TreeGrid(this.width, this.height);
    this.partition = new TreePartition(this.treeCount);
    this.plantSeeds();
  }

  /**
   * Positional constructor mirroring the classic
   * `initialize(width, height, treeCount, growthRate, strategy)` call.
   */
  static initialize(
    width: number,
    height: number,
    treeCount: number,
    growthRate: number,
    strategy: BranchingStrategy | string,
    options: MazeGeneratorOptions & { seed?: number } = {},
  ): MazeGenerator {
    const { seed, ...rest } = options;
    return new MazeGenerator(
      { width, height, treeCount, growthRate, strategy, seed },
      rest,
    );
  }

  private plantSeeds(): void {
    this.seeds.forEach((center, i) => {
      const tree = i + 1;
      const cluster = seedCluster(center);
      for (const cell of cluster) {
        this.cells.setAt(cell, tree);
      }
      this.frontiers.plant(tree, cluster);
    });

    this.trace.decision(
      "seeding",
      "Where do the trees start?",
      [],
      this.seeds,
      this.config.seedPositions
        ? "explicit seed positions"
        : `sampled on a ${this.config.spacing}-cell sub-grid`,
    );
  }

  // ===========================================================================
  // READ-ONLY VIEW
  // ===========================================================================

  get grid(): ReadonlyTreeGrid {
    return this.cells;
  }

  get entry(): Point | null {
    return this.entryPoint;
  }

  get exit(): Point | null {
    return this.exitPoint;
  }

  /**
   * Growth iterations performed so far
   */
  get iteration(): number {
    return this.iterations;
  }

  get strategy(): BranchingStrategy {
    return this.config.strategy;
  }

  get growthRate(): number {
    return this.config.growthRate;
  }

  treeAt(x: number, y: number): number {
    const raw = this.cells.get(x, y);
    return raw === EMPTY_CELL ? EMPTY_CELL : this.partition.find(raw);
  }

  /**
   * Resolve a raw tree id to the id of the tree it was merged into
   */
  canonicalOf(rawId: number): number {
    return this.partition.find(rawId);
  }

  isComplete(): boolean {
    return this.frontiers.size === 0;
  }

  /**
   * Canonical ids of trees that still have frontier positions
   */
  liveTrees(): number[] {
    return this.frontiers.trees();
  }

  /**
   * Every distinct canonical id, live or finished
   */
  canonicalTrees(): number[] {
    return this.partition.canonicalIds();
  }

  frontierOf(tree: number): readonly Point[] {
    return [...(this.frontiers.get(this.partition.find(tree)) ?? [])];
  }

  snapshot(): MazeSnapshot {
    return {
      width: this.width,
      height: this.height,
      cells: this.cells.getOccupancy(),
      entry: this.entryPoint,
      exit: this.exitPoint,
      iteration: this.iterations,
      complete: this.isComplete(),
    };
  }

  // ===========================================================================
  // GROWTH
  // ===========================================================================

  /**
   * Run one growth iteration.
   * @returns True once every tree has finished
   */
  stepOnce(): boolean {
    if (this.isComplete()) return true;

    this.iterations++;
    // Trees merged away mid-iteration are skipped when their turn comes
    for (const tree of this.frontiers.trees()) {
      if (this.frontiers.has(tree)) {
        this.growTree(tree);
      }
    }

    return this.isComplete();
  }

  /**
   * Grow until every tree has finished.
   */
  build(): void {
    this.trace.start("build");
    const startTime = performance.now();

    let done = this.isComplete();
    while (!done) {
      done = this.stepOnce();
    }

    this.trace.end("build", performance.now() - startTime);
  }

  private growTree(tree: number): void {
    const frontier = this.frontiers.get(tree);
    if (!frontier) return;

    const heads: Point[] = [];
    for (let i = frontier.length - 1; i >= 0; i--) {
      // The tree merged into another one; its frontier moved with it
      if (this.frontiers.get(tree) !== frontier) break;
      if (this.rng.next() >= this.config.growthRate) continue;

      const [position] = frontier.splice(i, 1);
      if (position) {
        heads.push(...this.branchOut(position, tree));
      }
    }

    const owner = this.partition.find(tree);
    if (this.frontiers.settle(owner, heads)) {
      this.trace.finish({ iteration: this.iterations, tree: owner });
    }
  }

  private branchOut(position: Point, tree: number): Point[] {
    const moves = selectBranches(
      this.freeMoves(position, tree),
      this.config.strategy,
      this.rng,
    );
    const id = this.partition.find(tree);
    for (const move of moves) {
      this.cells.setAt(move, id);
    }
    return moves;
  }

  /**
   * Viable moves from `position`. Also places the exit or entry when the
   * position reaches the east or west edge, and bridges into other trees
   * found by the join probe.
   */
  private freeMoves(position: Point, tree: number): Point[] {
    const { x, y } = position;
    const moves: Point[] = [];

    if (x + 2 === this.width) {
      if (this.exitPoint === null) {
        this.exitPoint = { x: x + 1, y };
        this.cells.setAt(this.exitPoint, this.partition.find(tree));
        this.trace.decision(
          "growth",
          "Where is the exit?",
          [],
          this.exitPoint,
          "first branch to reach the east edge",
        );
      }
      return moves;
    }

    if (this.canGrow(position, EAST, tree)) {
      moves.push(stepPoint(position, EAST, 1));
    }

    if (x > 1) {
      if (this.canGrow(position, WEST, tree)) {
        moves.push(stepPoint(position, WEST, 1));
      }
    } else if (this.entryPoint === null) {
      this.entryPoint = { x: 0, y };
      this.cells.setAt(this.entryPoint, this.partition.find(tree));
      this.trace.decision(
        "growth",
        "Where is the entry?",
        [],
        this.entryPoint,
        "first branch to reach the west edge",
      );
      return [];
    }

    if (y + 2 < this.height && this.canGrow(position, SOUTH, tree)) {
      moves.push(stepPoint(position, SOUTH, 1));
    }

    if (y > 1 && this.canGrow(position, NORTH, tree)) {
      moves.push(stepPoint(position, NORTH, 1));
    }

    return moves;
  }

  /**
   * A direction is viable when the window one step ahead is empty and the
   * join probe two steps ahead finds nothing.
   */
  private canGrow(position: Point, direction: Direction, tree: number): boolean {
    const window = perpendicularWindow(position, direction, 1);
    if (window.some((cell) => this.cells.isOccupied(cell.x, cell.y))) {
      return false;
    }
    return this.probeAndJoin(position, direction, tree);
  }

  /**
   * Inspect the window two steps ahead. The first occupied cell decides:
   * our own tree blocks the move, another tree is bridged and merged.
   * @returns True when the window is empty
   */
  private probeAndJoin(
    position: Point,
    direction: Direction,
    tree: number,
  ): boolean {
    const current = this.partition.find(tree);

    for (const cell of perpendicularWindow(position, direction, PROBE_DISTANCE)) {
      const raw = this.cells.getAt(cell);
      if (raw === EMPTY_CELL) continue;

      if (!this.partition.connected(raw, current)) {
        const owner = this.partition.find(raw);
        const bridge = stepPoint(position, direction, PROBE_DISTANCE);
        this.cells.setAt(stepPoint(position, direction, 1), current);
        this.cells.setAt(bridge, current);
        this.mergeTrees(current, owner, bridge);
      }
      return false;
    }

    return true;
  }

  /**
   * Fold `source` into `target`: remap the partition and hand over the
   * remaining frontier. A finished target becomes live again.
   */
  private mergeTrees(source: number, target: number, at: Point): void {
    this.partition.merge(source, target);
    this.frontiers.transfer(source, target);
    this.trace.merge({ iteration: this.iterations, source, target, at });
  }
}
