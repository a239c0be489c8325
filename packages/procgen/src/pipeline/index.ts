/**
 * Pipeline module - tracing and shared result types.
 */

export * from "./trace";
export * from "./types";
