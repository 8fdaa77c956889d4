/**
 * @fileoverview Planner - one reasoning step against a model backend.
 *
 * The planner turns the bounded context view into a {@link Decision}. It
 * owns no state between calls; retry policy belongs to the Agent Loop.
 *
 * @module research-loop/agent/planner
 * @version 0.1.0
 */

import type { ContextEntry, Decision, ToolSchema } from '../types/context.types.js';
import {
  AgentError,
  BackendUnavailableError,
  MalformedResponseError,
  describeError,
} from '../types/errors.js';
import { toBackendConversation, type ModelBackend } from '../providers/base.js';
import { Logger, createLogger } from '../observability/logger.js';

export interface PlannerInput {
  readonly view: ReadonlyArray<ContextEntry>;
  readonly tools: ReadonlyArray<ToolSchema>;

  /** Aborts on cancellation or when the loop's planner deadline passes */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Produces the next decision. Throws `MalformedResponseError` or
 * `BackendUnavailableError`.
 */
export interface Planner {
  decide(input: PlannerInput): Promise<Decision>;
}

export interface BackendPlannerConfig {
  readonly logger: Logger;
}

/**
 * Planner backed by a {@link ModelBackend}.
 *
 * @example
 * ```typescript
 * const planner = new BackendPlanner(new AnthropicBackend({ apiKey }));
 * const decision = await planner.decide({ view: context.view(), tools: registry.describe() });
 * ```
 */
export class BackendPlanner implements Planner {
  private readonly backend: ModelBackend;
  private readonly config: BackendPlannerConfig;

  constructor(backend: ModelBackend, config: Partial<BackendPlannerConfig> = {}) {
    this.backend = backend;
    this.config = {
      logger: createLogger('agent.planner'),
      ...config,
    };
  }

  async decide(input: PlannerInput): Promise<Decision> {
    const { system, messages } = toBackendConversation(input.view);

    try {
      const response = await this.backend.complete({ system, messages, tools: input.tools, signal: input.signal });
      return this.interpret(response.text, response.toolCalls);
    } catch (error) {
      if (error instanceof AgentError) throw error;
      throw new BackendUnavailableError(`${this.backend.model} call failed: ${describeError(error)}`, null, {
        cause: error,
      });
    }
  }

  // ============ Private Methods ============

  private interpret(
    text: string | null,
    toolCalls: ReadonlyArray<{ readonly name: string; readonly arguments: unknown }>,
  ): Decision {
    const [call, ...ignored] = toolCalls;

    if (call) {
      if (ignored.length > 0) {
        this.config.logger.warn('Backend returned several tool calls; using the first', {
          used: call.name,
          ignored: ignored.map(extra => extra.name),
        });
      }
      if (call.name.trim() === '') {
        throw new MalformedResponseError('Tool call has no tool name');
      }
      if (!isRecord(call.arguments)) {
        throw new MalformedResponseError(`Arguments for '${call.name}' are not an object`);
      }
      const rationale = text?.trim() ?? '';
      return {
        kind: 'tool_call',
        toolName: call.name,
        arguments: call.arguments,
        rationale: rationale === '' ? null : rationale,
      };
    }

    const answer = text?.trim() ?? '';
    if (answer === '') {
      throw new MalformedResponseError('Backend returned neither a tool call nor a final answer');
    }
    return { kind: 'finalize', answer };
  }
}

/**
 * One scripted planner turn: a decision, an error to throw, or a function of
 * the planner input.
 */
export type ScriptedTurn =
  | Decision
  | Error
  | ((input: PlannerInput) => Decision | Promise<Decision>);

/**
 * Planner that replays a fixed script. Used by examples and tests, and for
 * dry runs without a backend.
 */
export function createScriptedPlanner(turns: ReadonlyArray<ScriptedTurn>): Planner & { readonly calls: number } {
  let calls = 0;

  return {
    get calls(): number {
      return calls;
    },
    async decide(input: PlannerInput): Promise<Decision> {
      const turn = turns[calls];
      calls++;
      if (turn === undefined) {
        throw new MalformedResponseError(`Planner script exhausted after ${turns.length} turns`);
      }
      if (turn instanceof Error) throw turn;
      if (typeof turn === 'function') return turn(input);
      return turn;
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
