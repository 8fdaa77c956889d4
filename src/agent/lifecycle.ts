/**
 * @fileoverview Run Lifecycle Controller - validated phase transitions for one run.
 *
 * The controller is the authoritative source for "what phase is this run in?".
 * The Agent Loop drives it; listeners observe it.
 *
 * State Machine:
 * ```
 *            ┌──────── retry ───────┐
 *            ▼                      │
 *   IDLE ──► PLANNING ──► ACTING ──► OBSERVING
 *            │  ▲  │                  │
 *            │  └──┼──────────────────┘
 *            │     ▼
 *            │  SYNTHESIZING ──► COMPLETE | CANCELLED | FAILED
 *            ▼
 *          FAILED | CANCELLED
 * ```
 *
 * @module research-loop/agent/lifecycle
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { RunPhase, createUniqueId, createTimestamp } from '../types/core.types.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'phase:enter': (phase: RunPhase, metadata: PhaseMetadata) => void;
  'phase:exit': (phase: RunPhase, metadata: PhaseMetadata) => void;
  'transition': (from: RunPhase, to: RunPhase, reason: string) => void;
  'error': (error: LifecycleError) => void;
}

export interface PhaseMetadata {
  readonly enteredAt: Timestamp;
  readonly iteration: number;
  readonly reason: string;
  readonly data: Readonly<Record<string, unknown>>;
}

export interface LifecycleError {
  readonly code: 'TERMINAL_STATE' | 'INVALID_TRANSITION';
  readonly message: string;
  readonly phase: RunPhase;
  readonly attemptedTransition: RunPhase;
}

/**
 * Snapshot of current lifecycle state.
 */
export interface LifecycleState {
  readonly runId: UniqueId;
  readonly currentPhase: RunPhase;
  readonly previousPhase: RunPhase | null;
  readonly iteration: number;
  readonly phaseHistory: ReadonlyArray<PhaseHistoryEntry>;
  readonly startedAt: Timestamp;
  readonly lastTransitionAt: Timestamp;
  readonly isTerminal: boolean;
}

export interface PhaseHistoryEntry {
  readonly phase: RunPhase;
  readonly iteration: number;
  readonly enteredAt: Timestamp;
  readonly exitedAt: Timestamp | null;
  readonly reason: string;
}

const VALID_TRANSITIONS: ReadonlyMap<RunPhase, ReadonlyArray<RunPhase>> = new Map([
  [RunPhase.IDLE, [RunPhase.PLANNING]],
  [RunPhase.PLANNING, [
    RunPhase.ACTING,
    RunPhase.PLANNING,
    RunPhase.SYNTHESIZING,
    RunPhase.FAILED,
    RunPhase.CANCELLED,
  ]],
  [RunPhase.ACTING, [RunPhase.OBSERVING]],
  [RunPhase.OBSERVING, [RunPhase.PLANNING]],
  [RunPhase.SYNTHESIZING, [RunPhase.COMPLETE, RunPhase.CANCELLED, RunPhase.FAILED]],
  [RunPhase.COMPLETE, []],
  [RunPhase.FAILED, []],
  [RunPhase.CANCELLED, []],
]);

const TERMINAL_PHASES: ReadonlySet<RunPhase> = new Set([
  RunPhase.COMPLETE,
  RunPhase.FAILED,
  RunPhase.CANCELLED,
]);

/**
 * Raised when the loop attempts a transition the state machine forbids.
 */
export class LifecycleTransitionError extends Error {
  readonly detail: LifecycleError;

  constructor(detail: LifecycleError) {
    super(detail.message);
    this.name = 'LifecycleTransitionError';
    this.detail = detail;
  }
}

/**
 * Tracks the phase of a single run.
 *
 * @example
 * ```typescript
 * const lifecycle = new LifecycleController(runId);
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug(`${from} → ${to}`, { reason });
 * });
 *
 * lifecycle.transition(RunPhase.PLANNING, 'Iteration 1');
 * lifecycle.transition(RunPhase.ACTING, 'web_search');
 * ```
 */
export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private readonly runId: UniqueId;
  private currentPhase: RunPhase;
  private previousPhase: RunPhase | null;
  private iteration: number;
  private readonly phaseHistory: PhaseHistoryEntry[];
  private readonly startedAt: Timestamp;
  private lastTransitionAt: Timestamp;
  private currentPhaseEntry: PhaseHistoryEntry | null;

  constructor(runId?: UniqueId) {
    super();
    this.runId = runId ?? createUniqueId(uuidv4());
    this.currentPhase = RunPhase.IDLE;
    this.previousPhase = null;
    this.iteration = 0;
    this.phaseHistory = [];
    this.startedAt = createTimestamp();
    this.lastTransitionAt = this.startedAt;
    this.currentPhaseEntry = null;

    this.enterPhase(RunPhase.IDLE, 'Run created');
  }

  getState(): LifecycleState {
    return {
      runId: this.runId,
      currentPhase: this.currentPhase,
      previousPhase: this.previousPhase,
      iteration: this.iteration,
      phaseHistory: [...this.phaseHistory],
      startedAt: this.startedAt,
      lastTransitionAt: this.lastTransitionAt,
      isTerminal: this.isTerminal(),
    };
  }

  getCurrentPhase(): RunPhase {
    return this.currentPhase;
  }

  /**
   * Number of times the run has entered PLANNING.
   */
  getIteration(): number {
    return this.iteration;
  }

  isTerminal(): boolean {
    return TERMINAL_PHASES.has(this.currentPhase);
  }

  canTransition(targetPhase: RunPhase): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentPhase);
    return validTargets !== undefined && validTargets.includes(targetPhase);
  }

  /**
   * Moves the run to a new phase.
   *
   * @throws LifecycleTransitionError if the transition is not allowed
   */
  transition(
    targetPhase: RunPhase,
    reason: string,
    data: Record<string, unknown> = {},
  ): void {
    if (this.isTerminal()) {
      this.reject({
        code: 'TERMINAL_STATE',
        message: `Cannot transition from terminal state '${this.currentPhase}'`,
        phase: this.currentPhase,
        attemptedTransition: targetPhase,
      });
    }

    if (!this.canTransition(targetPhase)) {
      this.reject({
        code: 'INVALID_TRANSITION',
        message: `Invalid transition: '${this.currentPhase}' → '${targetPhase}'`,
        phase: this.currentPhase,
        attemptedTransition: targetPhase,
      });
    }

    this.exitPhase();

    const from = this.currentPhase;
    this.previousPhase = from;
    this.currentPhase = targetPhase;
    this.lastTransitionAt = createTimestamp();

    if (targetPhase === RunPhase.PLANNING) {
      this.iteration++;
    }

    this.emit('transition', from, targetPhase, reason);
    this.enterPhase(targetPhase, reason, data);
  }

  /**
   * Forces FAILED from any non-terminal phase. No-op once terminal.
   */
  fail(reason: string): void {
    if (this.isTerminal()) {
      return;
    }

    this.exitPhase();

    const from = this.currentPhase;
    this.previousPhase = from;
    this.currentPhase = RunPhase.FAILED;
    this.lastTransitionAt = createTimestamp();

    this.emit('transition', from, RunPhase.FAILED, reason);
    this.enterPhase(RunPhase.FAILED, reason, { forced: true });
  }

  // ============ Private Methods ============

  private reject(error: LifecycleError): never {
    this.emit('error', error);
    throw new LifecycleTransitionError(error);
  }

  private enterPhase(
    phase: RunPhase,
    reason: string,
    data: Record<string, unknown> = {},
  ): void {
    const now = createTimestamp();

    this.currentPhaseEntry = {
      phase,
      iteration: this.iteration,
      enteredAt: now,
      exitedAt: null,
      reason,
    };

    this.emit('phase:enter', phase, {
      enteredAt: now,
      iteration: this.iteration,
      reason,
      data,
    });
  }

  private exitPhase(): void {
    if (!this.currentPhaseEntry) return;

    const entry = this.currentPhaseEntry;
    this.phaseHistory.push({ ...entry, exitedAt: createTimestamp() });
    this.emit('phase:exit', this.currentPhase, {
      enteredAt: entry.enteredAt,
      iteration: entry.iteration,
      reason: entry.reason,
      data: {},
    });
    this.currentPhaseEntry = null;
  }
}
