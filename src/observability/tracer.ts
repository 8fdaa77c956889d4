/**
 * @fileoverview Trace Recorder - records the timing structure of a run.
 *
 * A trace is a tree of spans: one RUN span, with PLANNER, TOOL and SYNTHESIS
 * spans beneath it. The loop emits the finalized trace at the end of every
 * run so callers can inspect where the time went.
 *
 * @module research-loop/observability/tracer
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp, TerminationReason } from '../types/core.types.js';
import { createUniqueId, createTimestamp } from '../types/core.types.js';

/**
 * A complete run trace.
 */
export interface RunTrace {
  readonly id: UniqueId;
  readonly runId: UniqueId;
  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp;
  readonly durationMs: number;
  readonly termination: TerminationReason;
  readonly spans: ReadonlyArray<TraceSpan>;
}

/**
 * A span within a trace representing a unit of work.
 */
export interface TraceSpan {
  readonly id: UniqueId;

  /** Parent span ID, if nested */
  readonly parentId: UniqueId | null;

  readonly name: string;
  readonly type: SpanType;
  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp | null;
  readonly durationMs: number | null;
  readonly status: SpanStatus;

  /** Step sequence the span belongs to; 0 outside any step */
  readonly step: number;

  readonly attributes: Readonly<Record<string, unknown>>;
  readonly events: ReadonlyArray<SpanEvent>;
}

export enum SpanType {
  RUN = 'RUN',
  PLANNER = 'PLANNER',
  TOOL = 'TOOL',
  SYNTHESIS = 'SYNTHESIS',
}

export enum SpanStatus {
  RUNNING = 'RUNNING',
  OK = 'OK',
  ERROR = 'ERROR',
  CANCELLED = 'CANCELLED',
}

/**
 * An event that occurred during a span.
 */
export interface SpanEvent {
  readonly name: string;
  readonly timestamp: Timestamp;
  readonly attributes: Readonly<Record<string, unknown>>;
}

export interface SpanOptions {
  readonly parentId?: UniqueId;
  readonly step?: number;
  readonly attributes?: Record<string, unknown>;
}

/**
 * Records spans for a single run.
 *
 * @example
 * ```typescript
 * const tracer = new TraceRecorder(runId);
 * const spanId = tracer.startSpan('planner.decide', SpanType.PLANNER, { step: 1 });
 * // ... call the planner ...
 * tracer.endSpan(spanId, SpanStatus.OK);
 * const trace = tracer.finalize(TerminationReason.FINALIZED);
 * ```
 */
export class TraceRecorder {
  private readonly traceId: UniqueId;
  private readonly runId: UniqueId;
  private readonly spans: Map<UniqueId, TraceSpan>;
  private readonly startedAt: Timestamp;
  private readonly activeSpanStack: UniqueId[];

  constructor(runId: UniqueId) {
    this.traceId = createUniqueId(uuidv4());
    this.runId = runId;
    this.spans = new Map();
    this.startedAt = createTimestamp();
    this.activeSpanStack = [];
  }

  getTraceId(): UniqueId {
    return this.traceId;
  }

  /**
   * Starts a new span, nested under the innermost active span unless a
   * parent is given.
   */
  startSpan(name: string, type: SpanType, options: SpanOptions = {}): UniqueId {
    const spanId = createUniqueId(uuidv4());
    const parentId = options.parentId ?? this.activeSpanStack[this.activeSpanStack.length - 1] ?? null;

    this.spans.set(spanId, {
      id: spanId,
      parentId,
      name,
      type,
      startedAt: createTimestamp(),
      endedAt: null,
      durationMs: null,
      status: SpanStatus.RUNNING,
      step: options.step ?? 0,
      attributes: options.attributes ?? {},
      events: [],
    });
    this.activeSpanStack.push(spanId);

    return spanId;
  }

  addEvent(spanId: UniqueId, name: string, attributes: Record<string, unknown> = {}): void {
    const span = this.spans.get(spanId);
    if (!span) return;

    this.spans.set(spanId, {
      ...span,
      events: [...span.events, { name, timestamp: createTimestamp(), attributes }],
    });
  }

  /**
   * Ends a span. Ending an unknown or already-ended span is a no-op.
   */
  endSpan(spanId: UniqueId, status: SpanStatus = SpanStatus.OK, attributes?: Record<string, unknown>): void {
    const span = this.spans.get(spanId);
    if (!span || span.endedAt !== null) return;

    const now = createTimestamp();
    this.spans.set(spanId, {
      ...span,
      endedAt: now,
      durationMs: now - span.startedAt,
      status,
      attributes: attributes ? { ...span.attributes, ...attributes } : span.attributes,
    });

    const stackIndex = this.activeSpanStack.indexOf(spanId);
    if (stackIndex !== -1) {
      this.activeSpanStack.splice(stackIndex, 1);
    }
  }

  /**
   * Closes any span still running and returns the complete trace.
   */
  finalize(termination: TerminationReason, openStatus: SpanStatus = SpanStatus.OK): RunTrace {
    for (const spanId of [...this.activeSpanStack]) {
      this.endSpan(spanId, openStatus);
    }

    const now = createTimestamp();
    return {
      id: this.traceId,
      runId: this.runId,
      startedAt: this.startedAt,
      endedAt: now,
      durationMs: now - this.startedAt,
      termination,
      spans: Array.from(this.spans.values()),
    };
  }

  getSpans(): ReadonlyArray<TraceSpan> {
    return Array.from(this.spans.values());
  }
}
