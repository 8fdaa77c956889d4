/**
 * @fileoverview Core type definitions for the research-loop agent runtime.
 *
 * These types form the vocabulary shared by the loop, the context manager,
 * the tool registry and the synthesizer. A run is described entirely by a
 * {@link Task}, its ordered {@link Step} history and the terminal
 * {@link RunResult}.
 *
 * @module research-loop/types
 * @version 0.1.0
 */

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string for global uniqueness.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Phase of a single run.
 *
 * IDLE → PLANNING → ACTING → OBSERVING → PLANNING … → SYNTHESIZING → COMPLETE
 *
 * @remarks
 * - PLANNING: waiting on the model backend for the next decision
 * - ACTING: a tool call is in flight
 * - OBSERVING: the observation is being folded into the context
 * - SYNTHESIZING: the final report is being produced
 * - COMPLETE: a report was produced (normal or best-effort)
 * - FAILED: the run ended without a report
 * - CANCELLED: an external signal stopped the run
 */
export enum RunPhase {
  IDLE = 'IDLE',
  PLANNING = 'PLANNING',
  ACTING = 'ACTING',
  OBSERVING = 'OBSERVING',
  SYNTHESIZING = 'SYNTHESIZING',
  COMPLETE = 'COMPLETE',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
}

/**
 * Outcome tag recorded on every step.
 */
export enum StepOutcome {
  SUCCESS = 'success',
  TOOL_ERROR = 'tool-error',
  TIMEOUT = 'timeout',
  /** A planner attempt failed (malformed output or unreachable backend) */
  BACKEND_ERROR = 'backend-error',
}

/**
 * Why a run stopped.
 */
export enum TerminationReason {
  FINALIZED = 'finalized',
  MAX_STEPS_EXCEEDED = 'max-steps-exceeded',
  MAX_TIME_EXCEEDED = 'max-time-exceeded',
  FATAL_ERROR = 'fatal-error',
  CANCELLED = 'cancelled',
}

/**
 * Severity levels for logging.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * The research question handed to a run. Immutable for the run's lifetime.
 */
export interface Task {
  /** Short title, used as the report heading */
  readonly title: string;

  /** The full instruction the agent must answer */
  readonly instruction: string;

  /** Extra rule that takes precedence over every other instruction */
  readonly rule?: string | undefined;
}

/**
 * The action recorded on a step.
 */
export type StepAction =
  | {
      readonly kind: 'tool_call';
      readonly toolName: string;
      readonly arguments: Readonly<Record<string, unknown>>;
      readonly rationale: string | null;
    }
  | { readonly kind: 'finalize' }
  | { readonly kind: 'planner_failure'; readonly attempt: number };

/**
 * One iteration of the loop. Steps are append-only.
 */
export interface Step {
  /** Unique identifier for this step */
  readonly id: UniqueId;

  /** 1-based position in the run's history */
  readonly sequence: number;

  /** What the planner decided (or that it failed to decide) */
  readonly action: StepAction;

  /** Observation text, error text or final answer */
  readonly observation: string | null;

  readonly outcome: StepOutcome;

  /** Error code for non-successful steps */
  readonly errorCode: string | null;

  /** When the step started */
  readonly timestamp: Timestamp;

  readonly completedAt: Timestamp;

  readonly durationMs: number;
}

/**
 * Terminal artifact of a run. The only output a presentation layer consumes.
 */
export interface RunResult {
  readonly runId: UniqueId;
  readonly task: Task;

  /** Synthesized report, or null when the run failed fatally */
  readonly finalText: string | null;

  /** True when the report was produced without the planner finalizing */
  readonly bestEffort: boolean;

  readonly termination: TerminationReason;

  /** Full, untruncated step history */
  readonly steps: ReadonlyArray<Step>;

  /** Number of tool-call steps, valid or not */
  readonly toolCallCount: number;

  /** Message of the error that ended a fatal run */
  readonly error: string | null;

  readonly startedAt: Timestamp;
  readonly completedAt: Timestamp;
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}

/**
 * Terminations that still produce a best-effort report.
 */
export const BEST_EFFORT_TERMINATIONS: ReadonlySet<TerminationReason> = new Set([
  TerminationReason.MAX_STEPS_EXCEEDED,
  TerminationReason.MAX_TIME_EXCEEDED,
  TerminationReason.CANCELLED,
]);
