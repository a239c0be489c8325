/**
 * Core module - foundational primitives for maze generation.
 */

export * from "./algorithms";
export * from "./geometry";
export * from "./grid";
export * from "./hash";
