/**
 * @fileoverview Tool Registry - name→executor lookup, validation and execution.
 *
 * The registry is process-wide and read-mostly: tools are registered at
 * startup and then executed by any number of concurrent runs. Each execution
 * gets its own abort controller, timer and logger; nothing an execution does
 * can leak into the next one.
 *
 * @module research-loop/runtime/tool-registry
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { ZodError } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { createUniqueId, createTimestamp } from '../types/core.types.js';
import type { ToolSchema } from '../types/context.types.js';
import type {
  Observation,
  ToolExecutionContext,
  ToolExecutionOptions,
  ToolSpec,
} from '../types/tools.types.js';
import {
  AgentError,
  ConfigurationError,
  SchemaMismatchError,
  ToolExecutionError,
  ToolTimeoutError,
  UnknownToolError,
} from '../types/errors.js';
import { Logger, createLogger } from '../observability/logger.js';

/**
 * Events emitted by the Tool Registry.
 */
export interface ToolRegistryEvents {
  'tool:registered': (name: string) => void;
  'tool:invoked': (name: string, executionId: UniqueId) => void;
  'tool:completed': (name: string, executionId: UniqueId, durationMs: number) => void;
  'tool:failed': (name: string, executionId: UniqueId | null, error: AgentError) => void;
}

export interface ToolRegistryConfig {
  /** Timeout applied when an execution does not name one */
  readonly defaultTimeoutMs: number;

  readonly logger: Logger;
}

export const DEFAULT_REGISTRY_CONFIG: Omit<ToolRegistryConfig, 'logger'> = {
  defaultTimeoutMs: 30_000,
};

/**
 * Names the Anthropic and OpenAI tool APIs both accept.
 */
const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * A validated call, ready to run.
 */
interface PreparedCall {
  readonly toolName: string;
  run(context: ToolExecutionContext): Promise<Observation>;
}

/**
 * Type-erased registry entry. The tool's argument type is captured
 * inside `prepare`, which only hands parsed arguments to the executor.
 */
interface ToolRegistryEntry {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly registeredAt: Timestamp;
  prepare(args: unknown): PreparedCall;
}

/**
 * Central registry for research tools.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.register(createFetchPageTool());
 * const observation = await registry.execute('fetch_page', { url }, { timeoutMs: 10_000 });
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> {
  private readonly tools: Map<string, ToolRegistryEntry>;
  private readonly config: ToolRegistryConfig;

  constructor(config: Partial<ToolRegistryConfig> = {}) {
    super();
    this.tools = new Map();
    this.config = {
      ...DEFAULT_REGISTRY_CONFIG,
      logger: createLogger('runtime.tools'),
      ...config,
    };
  }

  /**
   * Registers a new tool.
   *
   * @throws ConfigurationError if the name is invalid or already registered
   */
  register<TArgs>(tool: ToolSpec<TArgs>): void {
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new ConfigurationError(
        `Tool name '${tool.name}' must match ${TOOL_NAME_PATTERN.source}`,
      );
    }
    if (this.tools.has(tool.name)) {
      throw new ConfigurationError(`Tool '${tool.name}' is already registered`);
    }

    const { $schema: _draft, ...parameters } = zodToJsonSchema(tool.argsSchema, {
      $refStrategy: 'none',
    });

    this.tools.set(tool.name, {
      name: tool.name,
      description: tool.description,
      parameters,
      registeredAt: createTimestamp(),
      prepare: (args: unknown): PreparedCall => {
        const parsed = tool.argsSchema.safeParse(args);
        if (!parsed.success) {
          throw new SchemaMismatchError(tool.name, formatIssues(parsed.error));
        }
        const data = parsed.data;
        return {
          toolName: tool.name,
          run: (context) => tool.execute(data, context),
        };
      },
    });
    this.emit('tool:registered', tool.name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): ReadonlyArray<string> {
    return Array.from(this.tools.keys());
  }

  /**
   * Describes every registered tool for a model backend.
   */
  describe(): ReadonlyArray<ToolSchema> {
    return Array.from(this.tools.values(), entry => ({
      name: entry.name,
      description: entry.description,
      parameters: entry.parameters,
    }));
  }

  /**
   * Checks that a tool exists and that the arguments satisfy its schema.
   *
   * @throws UnknownToolError | SchemaMismatchError
   */
  validate(name: string, args: unknown): void {
    this.prepare(name, args);
  }

  /**
   * Validates and executes a tool call.
   *
   * The executor never sees arguments that failed validation. On timeout the
   * execution's abort signal fires and the call rejects without waiting for
   * the executor; an external `signal` is only forwarded to the executor.
   *
   * @throws UnknownToolError | SchemaMismatchError | ToolExecutionError | ToolTimeoutError
   */
  async execute(name: string, args: unknown, options: ToolExecutionOptions = {}): Promise<Observation> {
    let call: PreparedCall;
    try {
      call = this.prepare(name, args);
    } catch (error) {
      if (error instanceof AgentError) {
        this.emit('tool:failed', name, null, error);
      }
      throw error;
    }

    const executionId = createUniqueId(uuidv4());
    const timeoutMs = options.timeoutMs ?? this.config.defaultTimeoutMs;
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(options.signal?.reason);

    if (options.signal?.aborted === true) {
      forwardAbort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const logger = this.config.logger.child({ module: `tool.${name}` });
    const context: ToolExecutionContext = {
      executionId,
      abortSignal: controller.signal,
      logger,
    };

    this.emit('tool:invoked', name, executionId);
    const startTime = Date.now();

    try {
      const observation = await this.executeWithTimeout(call, context, controller, timeoutMs);
      this.emit('tool:completed', name, executionId, Date.now() - startTime);
      return observation;
    } catch (error) {
      const failure = error instanceof ToolTimeoutError || error instanceof ToolExecutionError
        ? error
        : new ToolExecutionError(name, error);
      logger.debug('Tool execution failed', { code: failure.code, message: failure.message });
      this.emit('tool:failed', name, executionId, failure);
      throw failure;
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  // ============ Private Methods ============

  private prepare(name: string, args: unknown): PreparedCall {
    const entry = this.tools.get(name);
    if (!entry) {
      throw new UnknownToolError(name, this.names());
    }
    return entry.prepare(args);
  }

  private executeWithTimeout(
    call: PreparedCall,
    context: ToolExecutionContext,
    controller: AbortController,
    timeoutMs: number,
  ): Promise<Observation> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const timeout = new ToolTimeoutError(call.toolName, timeoutMs);
        controller.abort(timeout);
        reject(timeout);
      }, timeoutMs);

      let pending: Promise<Observation>;
      try {
        pending = call.run(context);
      } catch (error) {
        clearTimeout(timer);
        reject(new ToolExecutionError(call.toolName, error));
        return;
      }

      pending
        .then(result => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(new ToolExecutionError(call.toolName, error));
        });
    });
  }
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(arguments)';
    return `${path}: ${issue.message}`;
  });
}
