/**
 * Maze Validation & Statistics
 *
 * Public facade for validation and statistics utilities.
 * For determinism checks, see testing.ts.
 */

export {
  computeMazeStats,
  type MazeStats,
} from "./validation/compute-stats";
export { validateMaze } from "./validation/validate-maze";
export {
  hasErrorViolations,
  type MazeValidationResult,
  type ValidationFailure,
  type ValidationSuccess,
} from "./validation/result-types";
