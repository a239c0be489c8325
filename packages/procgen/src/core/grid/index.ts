/**
 * Grid module - tree-id grid and occupancy analysis.
 */

export * from "./flood-fill";
export { TreeGrid } from "./tree-grid";
export * from "./types";
