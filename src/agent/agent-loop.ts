/**
 * @fileoverview Agent Loop - drives one research run to a terminal state.
 *
 * Each iteration asks the planner for a decision, executes at most one tool
 * call through the registry and folds the observation into the bounded
 * context. The loop stops when the planner finalizes, a budget is spent,
 * the planner fails past its retry allowance, or the caller cancels.
 *
 * ```
 * IDLE → PLANNING → ACTING → OBSERVING → PLANNING … → SYNTHESIZING → COMPLETE
 *             ↘ FAILED                             ↘ CANCELLED
 * ```
 *
 * `run()` resolves with a {@link RunResult} for every outcome. Only a
 * `ConfigurationError` (invalid budgets, a context budget too small for the
 * task) rejects it, before the first planner call.
 *
 * @module research-loop/agent/agent-loop
 * @version 0.1.0
 */

import { setTimeout as delay } from 'node:timers/promises';
import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import {
  BEST_EFFORT_TERMINATIONS,
  RunPhase,
  StepOutcome,
  TerminationReason,
  createTimestamp,
  createUniqueId,
  type RunResult,
  type Step,
  type StepAction,
  type Task,
  type Timestamp,
  type UniqueId,
} from '../types/core.types.js';
import type { Decision, ToolSchema } from '../types/context.types.js';
import {
  AgentError,
  BackendUnavailableError,
  MalformedResponseError,
  ToolExecutionError,
  ToolTimeoutError,
  describeError,
} from '../types/errors.js';
import { ToolRegistry } from '../runtime/tool-registry.js';
import { ContextManager } from '../runtime/context-manager.js';
import { withDeadline } from '../runtime/deadline.js';
import { resolveRunConfig, type RunConfig } from '../config/run-config.js';
import { Logger, createLogger } from '../observability/logger.js';
import { SpanStatus, SpanType, TraceRecorder, type RunTrace } from '../observability/tracer.js';
import { LifecycleController } from './lifecycle.js';
import type { Planner } from './planner.js';
import { DigestSynthesizer, type SynthesisInput, type Synthesizer } from './synthesizer.js';
import {
  buildSystemInstructions,
  formatAction,
  formatError,
  formatObservation,
  formatPlannerFeedback,
  formatTask,
  formatToolFailure,
  renderObservation,
} from './prompt.js';

/**
 * Events emitted by the agent loop.
 */
export interface AgentLoopEvents {
  'run:start': (runId: UniqueId, task: Task) => void;
  'run:phase': (runId: UniqueId, from: RunPhase, to: RunPhase, reason: string) => void;
  'run:step': (runId: UniqueId, step: Step) => void;
  'run:complete': (result: RunResult) => void;
  'run:trace': (trace: RunTrace) => void;
}

export interface AgentLoopOptions {
  readonly registry: ToolRegistry;
  readonly planner: Planner;

  /** Defaults to the deterministic digest */
  readonly synthesizer?: Synthesizer;

  /** Overrides of {@link DEFAULT_RUN_CONFIG}, validated on construction */
  readonly config?: Partial<RunConfig>;

  readonly logger?: Logger;
}

/**
 * Per-run overrides.
 */
export interface RunOptions {
  readonly maxSteps?: number;
  readonly maxWallTimeMs?: number;

  /** Aborting interrupts a pending planner call or backoff and stops the run */
  readonly signal?: AbortSignal;
}

/**
 * How the iterations ended, before synthesis.
 */
interface LoopOutcome {
  readonly termination: TerminationReason;
  readonly answer: string | null;
  readonly error: string | null;
}

/**
 * Mutable state of one run. Never shared between runs.
 */
interface RunState {
  readonly runId: UniqueId;
  readonly task: Task;
  readonly config: RunConfig;
  readonly signal: AbortSignal | undefined;
  readonly tools: ReadonlyArray<ToolSchema>;
  readonly context: ContextManager;
  readonly lifecycle: LifecycleController;
  readonly tracer: TraceRecorder;
  readonly runSpan: UniqueId;
  readonly logger: Logger;
  readonly steps: Step[];
  readonly startedAt: Timestamp;
  toolCalls: number;
  successfulToolCalls: number;
  consecutivePlannerFailures: number;
}

/**
 * The research agent's control loop.
 *
 * @example
 * ```typescript
 * const loop = new AgentLoop({
 *   registry,
 *   planner: new BackendPlanner(createBackend({ model, anthropicApiKey })),
 *   config: { maxSteps: 8 },
 * });
 * const result = await loop.run({ title: 'Population', instruction: 'How many people live in Exampletown?' });
 * console.log(result.finalText);
 * ```
 */
export class AgentLoop extends EventEmitter<AgentLoopEvents> {
  private readonly registry: ToolRegistry;
  private readonly planner: Planner;
  private readonly synthesizer: Synthesizer;
  private readonly fallback: DigestSynthesizer;
  private readonly config: RunConfig;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError if the configuration overrides are invalid
   */
  constructor(options: AgentLoopOptions) {
    super();
    this.registry = options.registry;
    this.planner = options.planner;
    this.fallback = new DigestSynthesizer();
    this.synthesizer = options.synthesizer ?? this.fallback;
    this.config = resolveRunConfig(options.config);
    this.logger = options.logger ?? createLogger('agent.loop');
  }

  /**
   * Effective configuration, after defaults.
   */
  getConfig(): RunConfig {
    return this.config;
  }

  /**
   * Runs a task to a terminal state.
   *
   * @throws ConfigurationError for invalid per-run budgets, or when the
   * context budget cannot hold the task and the tool descriptions
   */
  async run(task: Task, options: RunOptions = {}): Promise<RunResult> {
    const state = this.createRunState(task, options);

    this.emit('run:start', state.runId, task);
    state.logger.info('Run started', {
      title: task.title,
      maxSteps: state.config.maxSteps,
      maxWallTimeMs: state.config.maxWallTimeMs,
      tools: state.tools.map(tool => tool.name),
    });

    let outcome: LoopOutcome;
    try {
      outcome = await this.iterate(state);
    } catch (error) {
      // Anything escaping iterate() is a defect in the loop itself
      const message = describeError(error);
      state.logger.error('Run aborted by an internal error', { error: message });
      state.lifecycle.fail(message);
      outcome = { termination: TerminationReason.FATAL_ERROR, answer: null, error: message };
    }

    const finalText = await this.conclude(state, outcome);
    const result: RunResult = {
      runId: state.runId,
      task,
      finalText,
      bestEffort: finalText !== null && BEST_EFFORT_TERMINATIONS.has(outcome.termination),
      termination: outcome.termination,
      steps: [...state.steps],
      toolCallCount: state.toolCalls,
      error: outcome.error,
      startedAt: state.startedAt,
      completedAt: createTimestamp(),
    };

    state.tracer.endSpan(state.runSpan, spanStatusFor(outcome.termination), {
      termination: outcome.termination,
      steps: result.steps.length,
    });
    const trace = state.tracer.finalize(outcome.termination, SpanStatus.CANCELLED);

    state.logger.info('Run finished', {
      termination: result.termination,
      steps: result.steps.length,
      toolCalls: result.toolCallCount,
      bestEffort: result.bestEffort,
      durationMs: result.completedAt - result.startedAt,
    });
    this.emit('run:trace', trace);
    this.emit('run:complete', result);

    return result;
  }

  // ============ Private Methods ============

  private createRunState(task: Task, options: RunOptions): RunState {
    const config = resolveRunConfig(
      { maxSteps: options.maxSteps, maxWallTimeMs: options.maxWallTimeMs },
      this.config,
    );
    const tools = this.registry.describe();
    const context = new ContextManager(
      [
        { role: 'system', kind: 'instructions', content: buildSystemInstructions(tools, task.rule) },
        { role: 'user', kind: 'task', content: formatTask(task) },
      ],
      {
        budgetChars: config.contextBudgetChars,
        preserveRecentSteps: config.preserveRecentSteps,
        summaryMaxChars: config.summaryMaxChars,
      },
    );

    const runId = createUniqueId(uuidv4());
    const lifecycle = new LifecycleController(runId);
    const tracer = new TraceRecorder(runId);
    const logger = this.logger.child({ runId });

    lifecycle.on('transition', (from, to, reason) => {
      logger.debug('Phase transition', { from, to, reason });
      this.emit('run:phase', runId, from, to, reason);
    });

    return {
      runId,
      task,
      config,
      signal: options.signal,
      tools,
      context,
      lifecycle,
      tracer,
      runSpan: tracer.startSpan('run', SpanType.RUN, { attributes: { title: task.title } }),
      logger,
      steps: [],
      startedAt: createTimestamp(),
      toolCalls: 0,
      successfulToolCalls: 0,
      consecutivePlannerFailures: 0,
    };
  }

  /**
   * Iterates until a terminal condition holds. Leaves the lifecycle in
   * PLANNING; {@link conclude} takes it from there.
   */
  private async iterate(state: RunState): Promise<LoopOutcome> {
    for (;;) {
      state.lifecycle.transition(RunPhase.PLANNING, `Iteration ${state.lifecycle.getIteration() + 1}`);

      const stop = this.checkBudgets(state);
      if (stop !== null) {
        return { termination: stop, answer: null, error: null };
      }

      const decision = await this.plan(state);
      if (decision === 'cancelled') {
        return { termination: TerminationReason.CANCELLED, answer: null, error: null };
      }
      if (decision instanceof AgentError) {
        if (state.consecutivePlannerFailures > state.config.maxPlannerRetries) {
          state.logger.error('Planner failed past its retry allowance', {
            attempts: state.consecutivePlannerFailures,
            code: decision.code,
          });
          return { termination: TerminationReason.FATAL_ERROR, answer: null, error: decision.message };
        }

        const delayMs = state.config.retryBackoffMs * 2 ** (state.consecutivePlannerFailures - 1);
        state.logger.warn('Planner attempt failed; retrying', {
          attempt: state.consecutivePlannerFailures,
          code: decision.code,
          error: decision.message,
          retryInMs: delayMs,
        });
        await delay(delayMs, undefined, { signal: state.signal }).catch(ignoreAbort);
        continue;
      }

      if (decision.kind === 'finalize') {
        this.recordStep(state, { kind: 'finalize' }, createTimestamp(), {
          observation: decision.answer,
          outcome: StepOutcome.SUCCESS,
          errorCode: null,
        });
        return { termination: TerminationReason.FINALIZED, answer: decision.answer, error: null };
      }

      await this.act(state, decision);
    }
  }

  /**
   * Terminal conditions checked before every planner call.
   */
  private checkBudgets(state: RunState): TerminationReason | null {
    if (state.signal?.aborted === true) {
      return TerminationReason.CANCELLED;
    }
    if (state.toolCalls >= state.config.maxSteps) {
      return TerminationReason.MAX_STEPS_EXCEEDED;
    }
    if (Date.now() - state.startedAt >= state.config.maxWallTimeMs) {
      return TerminationReason.MAX_TIME_EXCEEDED;
    }
    return null;
  }

  /**
   * One planner attempt. A failure is recorded as a step and returned;
   * failures caused by cancellation are reported as `'cancelled'` instead.
   */
  private async plan(state: RunState): Promise<Decision | AgentError | 'cancelled'> {
    const startedAt = createTimestamp();
    const attempt = state.consecutivePlannerFailures + 1;
    const spanId = state.tracer.startSpan('planner.decide', SpanType.PLANNER, {
      parentId: state.runSpan,
      step: state.steps.length + 1,
      attributes: { attempt },
    });

    try {
      const view = state.context.view();
      const decision = await withDeadline(
        signal => this.planner.decide({ view, tools: state.tools, signal }),
        {
          timeoutMs: state.config.plannerTimeoutMs,
          signal: state.signal,
          onTimeout: () => new BackendUnavailableError(
            `Planner did not decide within ${state.config.plannerTimeoutMs}ms`,
          ),
        },
      );
      state.tracer.endSpan(spanId, SpanStatus.OK, { decision: decision.kind });
      state.consecutivePlannerFailures = 0;

      return state.signal?.aborted === true ? 'cancelled' : decision;
    } catch (error) {
      if (state.signal?.aborted === true) {
        state.tracer.endSpan(spanId, SpanStatus.CANCELLED);
        return 'cancelled';
      }

      const failure = error instanceof AgentError
        ? error
        : new BackendUnavailableError(`Planner failed: ${describeError(error)}`, null, { cause: error });
      state.tracer.addEvent(spanId, 'error', { code: failure.code, message: failure.message });
      state.tracer.endSpan(spanId, SpanStatus.ERROR);

      const step = this.recordStep(state, { kind: 'planner_failure', attempt }, startedAt, {
        observation: formatError(failure),
        outcome: StepOutcome.BACKEND_ERROR,
        errorCode: failure.code,
      });
      if (failure instanceof MalformedResponseError) {
        state.context.append(step.sequence, {
          role: 'user',
          kind: 'feedback',
          content: formatPlannerFeedback(failure),
        });
      }
      state.consecutivePlannerFailures = attempt;

      return failure;
    }
  }

  /**
   * Executes one tool call and records its observation. Tool failures
   * become observations; they never end the run.
   */
  private async act(
    state: RunState,
    decision: Extract<Decision, { kind: 'tool_call' }>,
  ): Promise<void> {
    const { toolName, arguments: args, rationale } = decision;
    const sequence = state.steps.length + 1;
    const startedAt = createTimestamp();

    state.lifecycle.transition(RunPhase.ACTING, toolName, { sequence });
    state.toolCalls++;

    const spanId = state.tracer.startSpan(`tool.${toolName}`, SpanType.TOOL, {
      parentId: state.runSpan,
      step: sequence,
      attributes: { tool: toolName },
    });

    let observation: string;
    let outcome: StepOutcome;
    let errorCode: string | null = null;
    let contextText: string;

    try {
      const result = await this.registry.execute(toolName, args, {
        timeoutMs: state.config.toolTimeoutMs,
        ...(state.signal ? { signal: state.signal } : {}),
      });
      observation = renderObservation(result);
      outcome = StepOutcome.SUCCESS;
      contextText = formatObservation(sequence, toolName, observation);
      state.successfulToolCalls++;
      state.tracer.endSpan(spanId, SpanStatus.OK);
    } catch (error) {
      const failure = error instanceof AgentError ? error : new ToolExecutionError(toolName, error);
      observation = formatError(failure);
      outcome = failure instanceof ToolTimeoutError ? StepOutcome.TIMEOUT : StepOutcome.TOOL_ERROR;
      errorCode = failure.code;
      contextText = formatToolFailure(sequence, toolName, failure);
      state.tracer.addEvent(spanId, 'error', { code: failure.code, message: failure.message });
      state.tracer.endSpan(spanId, SpanStatus.ERROR);
    }

    state.lifecycle.transition(RunPhase.OBSERVING, outcome, { sequence });
    this.recordStep(
      state,
      { kind: 'tool_call', toolName, arguments: args, rationale },
      startedAt,
      { observation, outcome, errorCode },
    );
    state.context.appendStep(sequence, [
      { role: 'assistant', kind: 'action', content: formatAction(sequence, toolName, args, rationale) },
      { role: 'tool', kind: 'observation', content: contextText },
    ]);
  }

  private recordStep(
    state: RunState,
    action: StepAction,
    startedAt: Timestamp,
    result: Pick<Step, 'observation' | 'outcome' | 'errorCode'>,
  ): Step {
    const completedAt = createTimestamp();
    const step: Step = {
      id: createUniqueId(uuidv4()),
      sequence: state.steps.length + 1,
      action,
      ...result,
      timestamp: startedAt,
      completedAt,
      durationMs: completedAt - startedAt,
    };
    state.steps.push(step);

    state.logger.info('Step recorded', {
      sequence: step.sequence,
      action: action.kind,
      ...(action.kind === 'tool_call' ? { tool: action.toolName } : {}),
      outcome: step.outcome,
      errorCode: step.errorCode,
      durationMs: step.durationMs,
    });
    this.emit('run:step', state.runId, step);

    return step;
  }

  /**
   * Moves the lifecycle to its terminal phase and produces the final text.
   * Fatal runs, and cancelled runs without a successful tool call, end
   * without a report.
   */
  private async conclude(state: RunState, outcome: LoopOutcome): Promise<string | null> {
    const { lifecycle } = state;
    if (lifecycle.isTerminal()) return null;

    if (outcome.termination === TerminationReason.FATAL_ERROR) {
      lifecycle.transition(RunPhase.FAILED, outcome.error ?? 'Planner failed');
      return null;
    }
    if (outcome.termination === TerminationReason.CANCELLED && state.successfulToolCalls === 0) {
      lifecycle.transition(RunPhase.CANCELLED, 'Cancelled before any tool call succeeded');
      return null;
    }

    lifecycle.transition(RunPhase.SYNTHESIZING, outcome.termination);
    const finalText = await this.synthesize(state, outcome);
    lifecycle.transition(
      outcome.termination === TerminationReason.CANCELLED ? RunPhase.CANCELLED : RunPhase.COMPLETE,
      outcome.termination,
    );

    return finalText;
  }

  /**
   * Cancelled runs get the digest without another backend call. Other runs
   * give the synthesizer `plannerTimeoutMs` before falling back to it.
   */
  private async synthesize(state: RunState, outcome: LoopOutcome): Promise<string> {
    const input: SynthesisInput = {
      task: state.task,
      termination: outcome.termination,
      answer: outcome.answer,
      steps: state.steps,
      view: state.context.view(),
    };
    const spanId = state.tracer.startSpan('synthesize', SpanType.SYNTHESIS, { parentId: state.runSpan });

    if (outcome.termination === TerminationReason.CANCELLED) {
      state.tracer.endSpan(spanId, SpanStatus.OK, { synthesizer: 'digest' });
      return this.fallback.digest(input);
    }

    try {
      const text = await withDeadline(
        signal => this.synthesizer.synthesize({ ...input, signal }),
        {
          timeoutMs: state.config.plannerTimeoutMs,
          onTimeout: () => new BackendUnavailableError(
            `Synthesizer did not answer within ${state.config.plannerTimeoutMs}ms`,
          ),
        },
      );
      state.tracer.endSpan(spanId, SpanStatus.OK);
      return text;
    } catch (error) {
      state.logger.warn('Synthesizer failed; using digest', { error: describeError(error) });
      state.tracer.endSpan(spanId, SpanStatus.ERROR);
      return this.fallback.digest(input);
    }
  }
}

function spanStatusFor(termination: TerminationReason): SpanStatus {
  switch (termination) {
    case TerminationReason.FATAL_ERROR:
      return SpanStatus.ERROR;
    case TerminationReason.CANCELLED:
      return SpanStatus.CANCELLED;
    default:
      return SpanStatus.OK;
  }
}

/**
 * Cancellation ends a backoff early; the next boundary check reports it.
 */
function ignoreAbort(error: unknown): void {
  if (error instanceof Error && error.name === 'AbortError') return;
  throw error;
}
