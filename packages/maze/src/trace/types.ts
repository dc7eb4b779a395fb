/**
 * Trace & Debug Types
 *
 * Types for recording what generation and search did, for debugging and
 * for tests that need to see individual decisions.
 */

/**
 * Trace event types
 */
export type TraceEventType = "start" | "end" | "decision" | "warning";

/**
 * Stage that emitted an event.
 */
export type TracePhase = "generation" | "search";

/**
 * Structured decision data.
 */
export interface DecisionData {
  /** The question being answered */
  readonly question: string;
  /** Available options */
  readonly options: readonly unknown[];
  /** The chosen option */
  readonly chosen: unknown;
  /** Human-readable reason */
  readonly reason: string;
  /** Number of RNG draws consumed for this decision */
  readonly rngConsumed: number;
}

export interface TraceEvent {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly phase: TracePhase;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

export interface DecisionEvent extends TraceEvent {
  readonly eventType: "decision";
  readonly data: DecisionData;
}

export interface DecisionStats {
  readonly totalDecisions: number;
  readonly byPhase: Readonly<Record<TracePhase, number>>;
  readonly totalRngConsumed: number;
  readonly avgRngPerDecision: number;
}

/**
 * Trace collector interface
 */
export interface TraceCollector {
  readonly enabled: boolean;
  start(phase: TracePhase): void;
  end(phase: TracePhase, durationMs: number): void;
  decision(phase: TracePhase, data: DecisionData): void;
  warning(phase: TracePhase, message: string): void;
  getEvents(): readonly TraceEvent[];
  getDecisions(phase?: TracePhase): readonly DecisionEvent[];
  getDecisionStats(): DecisionStats;
  clear(): void;
}
