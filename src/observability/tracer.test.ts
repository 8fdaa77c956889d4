/**
 * @fileoverview Unit tests for TraceRecorder
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TraceRecorder, SpanType, SpanStatus } from './tracer.js';
import { TerminationReason, createUniqueId } from '../types/index.js';
import { v4 as uuidv4 } from 'uuid';

describe('TraceRecorder', () => {
  let recorder: TraceRecorder;
  let runId: ReturnType<typeof createUniqueId>;

  beforeEach(() => {
    runId = createUniqueId(uuidv4());
    recorder = new TraceRecorder(runId);
  });

  describe('startSpan()', () => {
    it('should create a running span and return its ID', () => {
      const spanId = recorder.startSpan('planner.decide', SpanType.PLANNER, { step: 2 });

      const spans = recorder.getSpans();
      expect(spans).toHaveLength(1);
      expect(spans[0]?.id).toBe(spanId);
      expect(spans[0]?.type).toBe(SpanType.PLANNER);
      expect(spans[0]?.status).toBe(SpanStatus.RUNNING);
      expect(spans[0]?.step).toBe(2);
    });

    it('should nest spans under the innermost active span', () => {
      const parentId = recorder.startSpan('run', SpanType.RUN);
      const childId = recorder.startSpan('tool.fetch_page', SpanType.TOOL);

      const child = recorder.getSpans().find(s => s.id === childId);
      expect(child?.parentId).toBe(parentId);
    });

    it('should honour an explicit parent', () => {
      const runSpan = recorder.startSpan('run', SpanType.RUN);
      recorder.startSpan('planner', SpanType.PLANNER);
      const synthesis = recorder.startSpan('synthesis', SpanType.SYNTHESIS, { parentId: runSpan });

      expect(recorder.getSpans().find(s => s.id === synthesis)?.parentId).toBe(runSpan);
    });
  });

  describe('endSpan()', () => {
    it('should end an active span with OK by default', () => {
      const spanId = recorder.startSpan('tool', SpanType.TOOL);

      recorder.endSpan(spanId);

      const span = recorder.getSpans().find(s => s.id === spanId);
      expect(span?.endedAt).not.toBeNull();
      expect(span?.status).toBe(SpanStatus.OK);
      expect(span?.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should merge final attributes and ignore a second end', () => {
      const spanId = recorder.startSpan('tool', SpanType.TOOL, { attributes: { tool: 'wait' } });

      recorder.endSpan(spanId, SpanStatus.ERROR, { code: 'TOOL_TIMEOUT' });
      recorder.endSpan(spanId, SpanStatus.OK);

      const span = recorder.getSpans().find(s => s.id === spanId);
      expect(span?.status).toBe(SpanStatus.ERROR);
      expect(span?.attributes).toEqual({ tool: 'wait', code: 'TOOL_TIMEOUT' });
    });
  });

  describe('addEvent()', () => {
    it('should add event to span', () => {
      const spanId = recorder.startSpan('planner', SpanType.PLANNER);

      recorder.addEvent(spanId, 'retry', { attempt: 1 });

      const span = recorder.getSpans().find(s => s.id === spanId);
      expect(span?.events).toHaveLength(1);
      expect(span?.events[0]?.name).toBe('retry');
      expect(span?.events[0]?.attributes).toEqual({ attempt: 1 });
    });
  });

  describe('finalize()', () => {
    it('should close open spans with the given status', () => {
      recorder.startSpan('run', SpanType.RUN);
      recorder.startSpan('tool', SpanType.TOOL);

      const trace = recorder.finalize(TerminationReason.CANCELLED, SpanStatus.CANCELLED);

      expect(trace.runId).toBe(runId);
      expect(trace.id).toBe(recorder.getTraceId());
      expect(trace.termination).toBe(TerminationReason.CANCELLED);
      expect(trace.spans.every(s => s.status === SpanStatus.CANCELLED)).toBe(true);
    });
  });
});
