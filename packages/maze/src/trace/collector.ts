/**
 * Trace collector implementation for debugging and observability.
 */

import type {
  DecisionData,
  DecisionEvent,
  DecisionStats,
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
  private readonly decisions: DecisionEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = true) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(phase: TracePhase, eventType: TraceEventType, data?: unknown): void {
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

  decision(phase: TracePhase, data: DecisionData): void {
    if (!this.enabled) return;

    const event: DecisionEvent = {
      timestamp: performance.now() - this.startTime,
      phase,
      eventType: "decision",
      data,
    };
    this.events.push(event);
    this.decisions.push(event);
  }

  warning(phase: TracePhase, message: string): void {
    this.emit(phase, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  getDecisions(phase?: TracePhase): readonly DecisionEvent[] {
    return phase === undefined
      ? this.decisions
      : this.decisions.filter((e) => e.phase === phase);
  }

  getDecisionStats(): DecisionStats {
    const byPhase: Record<TracePhase, number> = { generation: 0, search: 0 };

    let totalRngConsumed = 0;
    for (const event of this.decisions) {
      byPhase[event.phase]++;
      totalRngConsumed += event.data.rngConsumed;
    }

    const totalDecisions = this.decisions.length;
    return {
      totalDecisions,
      byPhase,
      totalRngConsumed,
      avgRngPerDecision: totalDecisions > 0 ? totalRngConsumed / totalDecisions : 0,
    };
  }

  clear(): void {
    this.events.length = 0;
    this.decisions.length = 0;
  }
}

const EMPTY_DECISION_STATS: DecisionStats = {
  totalDecisions: 0,
  byPhase: { generation: 0, search: 0 },
  totalRngConsumed: 0,
  avgRngPerDecision: 0,
};

/**
 * No-op trace collector, the default when tracing is off.
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_phase: TracePhase): void {}
  end(_phase: TracePhase, _durationMs: number): void {}
  decision(_phase: TracePhase, _data: DecisionData): void {}
  warning(_phase: TracePhase, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  getDecisions(_phase?: TracePhase): readonly DecisionEvent[] {
    return [];
  }
  getDecisionStats(): DecisionStats {
    return EMPTY_DECISION_STATS;
  }
  clear(): void {}
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
