/**
 * Trace & validation types shared across the generator.
 */

import type { Point } from "@sapling/contracts";

// =============================================================================
// TRACE TYPES
// =============================================================================

/**
 * Phases of a maze run that emit trace events
 */
export type TracePhase = "seeding" | "growth" | "build";

/**
 * Trace event types
 */
export type TraceEventType =
  | "start"
  | "end"
  | "decision"
  | "merge"
  | "finish";

/**
 * Base trace event
 */
export interface TraceEvent {
  readonly timestamp: number;
  readonly phase: TracePhase;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * A tree grew into another one and took its canonical id
 */
export interface MergeRecord {
  readonly iteration: number;
  /** Canonical id that was merged away */
  readonly source: number;
  /** Canonical id that absorbed it */
  readonly target: number;
  /** Bridge cell two steps ahead of the growing position */
  readonly at: Point;
}

/**
 * A tree ran out of frontier positions
 */
export interface FinishRecord {
  readonly iteration: number;
  readonly tree: number;
}

/**
 * Trace collector interface
 */
export interface TraceCollector {
  readonly enabled: boolean;
  start(phase: TracePhase): void;
  end(phase: TracePhase, durationMs: number): void;
  decision(
    phase: TracePhase,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  merge(record: MergeRecord): void;
  finish(record: FinishRecord): void;
  getEvents(): readonly TraceEvent[];
  getMerges(): readonly MergeRecord[];
}

// =============================================================================
// VALIDATION TYPES
// =============================================================================

/**
 * Invariant violation found while validating a maze
 */
export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: "error" | "warning";
}
