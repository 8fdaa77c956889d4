/**
 * @fileoverview Observability module public exports.
 *
 * @module research-loop/observability
 * @version 0.1.0
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

export {
  TraceRecorder,
  SpanType,
  SpanStatus,
  type RunTrace,
  type TraceSpan,
  type SpanEvent,
  type SpanOptions,
} from './tracer.js';
