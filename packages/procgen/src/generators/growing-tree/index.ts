/**
 * Growing-tree maze generator.
 */

export { selectBranches } from "./branching";
export * from "./constants";
export { FrontierArena } from "./frontier-arena";
export {
  MazeGenerator,
  type MazeGeneratorOptions,
  type MazeView,
} from "./generator";
export {
  placeRandomSeeds,
  seedCapacity,
  seedCluster,
  validateSeedPositions,
} from "./seeding";
