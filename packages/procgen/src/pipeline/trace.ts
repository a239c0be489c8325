/**
 * Growth trace collectors.
 *
 * A build records its start and end, the seeding and entry/exit decisions,
 * every merge (which tree folded into which, and where the bridge landed)
 * and every tree that ran out of frontier. `getMerges()` keeps the merge
 * records in order for replaying how the partition evolved.
 */

import type {
  FinishRecord,
  MergeRecord,
  TraceCollector,
  TraceEvent,
  TraceEventType,
  TracePhase,
} from "./types";

/**
 * Default trace collector implementation
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly merges: MergeRecord[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(
    phase: TracePhase,
    eventType: TraceEventType,
    data?: unknown,
  ): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      phase,
      eventType,
      data,
    });
  }

  start(phase: TracePhase): void {
    this.emit(phase, "start");
  }

  end(phase: TracePhase, durationMs: number): void {
    this.emit(phase, "end", { durationMs });
  }

  decision(
    phase: TracePhase,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    this.emit(phase, "decision", { question, options, chosen, reason });
  }

  merge(record: MergeRecord): void {
    if (!this.enabled) return;
    this.merges.push(record);
    this.emit("growth", "merge", record);
  }

  finish(record: FinishRecord): void {
    this.emit("growth", "finish", record);
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  /**
   * Merges in the order they happened
   */
  getMerges(): readonly MergeRecord[] {
    return this.merges;
  }

  /**
   * Events of a single type, e.g. every "finish"
   */
  getEventsOfType(eventType: TraceEventType): readonly TraceEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_phase: TracePhase): void {}
  end(_phase: TracePhase, _durationMs: number): void {}
  decision(
    _phase: TracePhase,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  merge(_record: MergeRecord): void {}
  finish(_record: FinishRecord): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  getMerges(): readonly MergeRecord[] {
    return [];
  }
}

/**
 * Create a trace collector based on configuration
 */
export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
