/**
 * @fileoverview Tool contract type definitions.
 *
 * Tools are the mechanism by which the agent gathers material. Every tool
 * carries a zod schema for its arguments and an executor; the registry
 * validates arguments against the schema before the executor ever runs.
 *
 * @module research-loop/types/tools
 * @version 0.1.0
 */

import type { z } from 'zod';
import type { UniqueId } from './core.types.js';

/**
 * JSON value a tool may return as its observation.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue };

/**
 * Result data returned by a tool execution.
 */
export type Observation = string | JsonValue;

/**
 * Complete definition of a tool available to the agent.
 */
export interface ToolSpec<TArgs = unknown> {
  /** Unique name, as the model sees it (e.g. `web_search`) */
  readonly name: string;

  /** What the tool does, shown to the model */
  readonly description: string;

  /** Schema the arguments must satisfy */
  readonly argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

  /** The actual execution function */
  readonly execute: ToolExecutor<TArgs>;
}

/**
 * Function signature for tool execution.
 */
export type ToolExecutor<TArgs> = (
  args: TArgs,
  context: ToolExecutionContext,
) => Promise<Observation>;

/**
 * Context provided to a single tool execution.
 */
export interface ToolExecutionContext {
  /** Unique ID for this execution */
  readonly executionId: UniqueId;

  /**
   * Aborted when the call times out or the run is cancelled.
   * Tools that support cancellation should honour it.
   */
  readonly abortSignal: AbortSignal;

  /** Logger scoped to this execution */
  readonly logger: ExecutionLogger;
}

/**
 * Logger interface for tool execution.
 */
export interface ExecutionLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Options for one registry execution.
 */
export interface ToolExecutionOptions {
  /** Deadline for the call; the registry default applies when omitted */
  readonly timeoutMs?: number;

  /** External cancellation, linked into the execution's abort signal */
  readonly signal?: AbortSignal;
}
