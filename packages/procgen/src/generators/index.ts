/**
 * Generators module - maze generation algorithms.
 */

// Growing trees with merge-on-collision
export * from "./growing-tree";
