/**
 * @fileoverview Synthesizer - turns a terminal run into the final report.
 *
 * Runs for normal and budget-exhausted terminations alike. Reports written
 * without the planner finalizing carry a `[Best-effort answer: …]` marker on
 * their first line.
 *
 * @module research-loop/agent/synthesizer
 * @version 0.1.0
 */

import type { Step, Task } from '../types/core.types.js';
import { StepOutcome, TerminationReason } from '../types/core.types.js';
import type { ContextEntry } from '../types/context.types.js';
import { describeError } from '../types/errors.js';
import { toBackendConversation, type ModelBackend } from '../providers/base.js';
import { clipText } from '../runtime/context-manager.js';
import { Logger, createLogger } from '../observability/logger.js';

export interface SynthesisInput {
  readonly task: Task;
  readonly termination: TerminationReason;

  /** The planner's final answer, when it finalized */
  readonly answer: string | null;

  /** Full step history */
  readonly steps: ReadonlyArray<Step>;

  /** Last context view handed to the planner */
  readonly view: ReadonlyArray<ContextEntry>;

  /** Aborts when the synthesis deadline passes */
  readonly signal?: AbortSignal | undefined;
}

export interface Synthesizer {
  synthesize(input: SynthesisInput): Promise<string>;
}

const BEST_EFFORT_REASONS: Partial<Record<TerminationReason, string>> = {
  [TerminationReason.MAX_STEPS_EXCEEDED]: 'the step limit was reached before the agent finished',
  [TerminationReason.MAX_TIME_EXCEEDED]: 'the time limit was reached before the agent finished',
  [TerminationReason.CANCELLED]: 'the run was cancelled before the agent finished',
};

/**
 * Prefixes `report` with the best-effort marker for budget and cancellation
 * terminations. Other terminations pass through unchanged.
 */
export function markBestEffort(report: string, termination: TerminationReason): string {
  const reason = BEST_EFFORT_REASONS[termination];
  return reason === undefined ? report : `[Best-effort answer: ${reason}]\n\n${report}`;
}

export interface DigestSynthesizerConfig {
  /** Characters kept from each observation in the findings list */
  readonly maxFindingChars: number;
}

/**
 * Deterministic report: the task title followed by the final answer, or by
 * numbered findings from the successful tool calls.
 */
export class DigestSynthesizer implements Synthesizer {
  private readonly config: DigestSynthesizerConfig;

  constructor(config: Partial<DigestSynthesizerConfig> = {}) {
    this.config = { maxFindingChars: 500, ...config };
  }

  async synthesize(input: SynthesisInput): Promise<string> {
    return this.digest(input);
  }

  digest(input: SynthesisInput): string {
    const heading = `# ${input.task.title}`;

    if (input.answer !== null && input.answer.trim() !== '') {
      return markBestEffort(`${heading}\n\n${input.answer.trim()}`, input.termination);
    }

    const findings = successfulObservations(input.steps).map(
      ({ toolName, observation }, index) =>
        `${index + 1}. ${toolName}: ${clipText(observation.trim(), this.config.maxFindingChars)}`,
    );
    const body = findings.length > 0
      ? `Findings (${findings.length}):\n${findings.join('\n')}`
      : 'No tool call succeeded; there are no findings to report.';

    return markBestEffort(`${heading}\n\n${body}`, input.termination);
  }
}

export interface ModelSynthesizerConfig {
  readonly fallback: DigestSynthesizer;
  readonly logger: Logger;
}

const SYNTHESIS_PROMPT =
  'The research budget is exhausted and no more tools can be called. ' +
  'Answer the task now, as precisely as the observations above allow, ' +
  'and state what remains uncertain.';

/**
 * Asks the backend for an answer without tools when the planner did not
 * finalize. Falls back to the digest when the backend fails or says nothing.
 */
export class ModelSynthesizer implements Synthesizer {
  private readonly backend: ModelBackend;
  private readonly config: ModelSynthesizerConfig;

  constructor(backend: ModelBackend, config: Partial<ModelSynthesizerConfig> = {}) {
    this.backend = backend;
    this.config = {
      fallback: new DigestSynthesizer(),
      logger: createLogger('agent.synthesizer'),
      ...config,
    };
  }

  async synthesize(input: SynthesisInput): Promise<string> {
    if (input.answer !== null || successfulObservations(input.steps).length === 0) {
      return this.config.fallback.digest(input);
    }

    const { system, messages } = toBackendConversation([
      ...input.view,
      { role: 'user', kind: 'feedback', content: SYNTHESIS_PROMPT, pinned: false, step: null },
    ]);

    try {
      const response = await this.backend.complete({ system, messages, tools: [], signal: input.signal });
      const text = response.text?.trim() ?? '';
      if (text === '') {
        this.config.logger.warn('Backend returned no synthesis text; using digest');
        return this.config.fallback.digest(input);
      }
      return markBestEffort(`# ${input.task.title}\n\n${text}`, input.termination);
    } catch (error) {
      this.config.logger.warn('Synthesis call failed; using digest', { error: describeError(error) });
      return this.config.fallback.digest(input);
    }
  }
}

function successfulObservations(
  steps: ReadonlyArray<Step>,
): Array<{ toolName: string; observation: string }> {
  const findings: Array<{ toolName: string; observation: string }> = [];
  for (const step of steps) {
    if (step.action.kind === 'tool_call' && step.outcome === StepOutcome.SUCCESS && step.observation !== null) {
      findings.push({ toolName: step.action.toolName, observation: step.observation });
    }
  }
  return findings;
}
