/**
 * @fileoverview CLI commands.
 *
 * `runCli` holds the whole command flow and returns an exit code; the bin
 * entry point only wires it to the process.
 *
 * @module research-loop/cli/main
 * @version 0.1.0
 */

import { AgentLoop } from '../agent/agent-loop.js';
import { BackendPlanner } from '../agent/planner.js';
import { ModelSynthesizer } from '../agent/synthesizer.js';
import { encodeRunResult } from '../agent/run-result-codec.js';
import { loadEnvironment, resolveRunConfig, type RunConfig } from '../config/run-config.js';
import { createBackend, type BackendConfig } from '../providers/index.js';
import type { ModelBackend } from '../providers/base.js';
import { ToolRegistry } from '../runtime/tool-registry.js';
import { createFetchPageTool, createWaitTool } from '../tools/research.js';
import { ConsoleTransport, Logger, type LogTransport } from '../observability/logger.js';
import { ConfigurationError, Severity, TerminationReason, type RunResult } from '../types/index.js';
import { HELP_TEXT, parseArgs, type CliOptions } from './args.js';

export const VERSION = '0.1.0';

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

const WAIT_MIN_SECONDS = 5;

export interface CliDependencies {
  readonly env?: Record<string, string | undefined>;
  readonly stdout?: (text: string) => void;
  readonly stderr?: (text: string) => void;
  readonly createBackend?: (config: BackendConfig) => ModelBackend;
  readonly fetchImpl?: typeof fetch;
  readonly logTransport?: LogTransport;

  /** Cancels a running `run` command */
  readonly signal?: AbortSignal;
}

/**
 * Runs one CLI invocation.
 *
 * @returns the process exit code
 */
export async function runCli(argv: ReadonlyArray<string>, deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));

  try {
    const options = parseArgs(argv);

    switch (options.command) {
      case 'help':
        stdout(HELP_TEXT);
        return EXIT_OK;

      case 'version':
        stdout(`research-loop v${VERSION}`);
        return EXIT_OK;

      case 'tools': {
        const config = resolveRunConfig(loadEnvironment(deps.env ?? process.env).run);
        listTools(createToolRegistry(createCliLogger(options, Severity.WARN, deps), config, deps), stdout);
        return EXIT_OK;
      }

      case 'run':
        return await runTask(options, deps, stdout, stderr);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      stderr(`Error: ${error.message}`);
      stderr("Run 'research-loop help' for usage.");
      return EXIT_USAGE;
    }
    throw error;
  }
}

// ============ Commands ============

function listTools(registry: ToolRegistry, stdout: (text: string) => void): void {
  const tools = registry.describe();
  for (const tool of tools) {
    stdout(`${tool.name}\n    ${tool.description}`);
  }
  stdout(`\nTotal: ${tools.length} tools`);
}

async function runTask(
  options: CliOptions,
  deps: CliDependencies,
  stdout: (text: string) => void,
  stderr: (text: string) => void,
): Promise<number> {
  const env = loadEnvironment(deps.env ?? process.env);
  const config = resolveRunConfig(env.run);
  const logger = createCliLogger(options, env.logLevel, deps);
  const model = options.model ?? env.model;

  const backend = (deps.createBackend ?? createBackend)({
    model,
    anthropicApiKey: env.anthropicApiKey,
    openaiApiKey: env.openaiApiKey,
    openaiBaseUrl: env.openaiBaseUrl,
  });

  const loop = new AgentLoop({
    registry: createToolRegistry(logger, config, deps),
    planner: new BackendPlanner(backend, { logger: logger.child({ module: 'agent.planner' }) }),
    synthesizer: new ModelSynthesizer(backend, { logger: logger.child({ module: 'agent.synthesizer' }) }),
    config,
    logger: logger.child({ module: 'agent.loop' }),
  });

  const result = await loop.run(
    { title: options.title ?? '', instruction: options.instruction ?? '', rule: options.rule },
    { maxSteps: options.maxSteps, maxWallTimeMs: options.maxWallTimeMs, signal: deps.signal },
  );

  if (options.json) {
    stdout(encodeRunResult(result, 2));
  } else if (result.finalText !== null) {
    stdout(result.finalText);
  } else {
    stderr(describeFailure(result));
  }

  return exitCodeFor(result);
}

// ============ Helpers ============

function createCliLogger(options: CliOptions, level: Severity, deps: CliDependencies): Logger {
  return new Logger({
    module: 'cli',
    minLevel: options.verbose ? Severity.DEBUG : level,
    transports: [deps.logTransport ?? new ConsoleTransport(undefined, true)],
  });
}

function createToolRegistry(logger: Logger, config: RunConfig, deps: CliDependencies): ToolRegistry {
  const registry = new ToolRegistry({ logger: logger.child({ module: 'runtime.tools' }) });
  registry.register(createFetchPageTool(deps.fetchImpl ? { fetchImpl: deps.fetchImpl } : {}));

  // A wait must end before the tool timeout does
  const maxWaitSeconds = Math.ceil(config.toolTimeoutMs / 1_000) - 1;
  if (maxWaitSeconds >= WAIT_MIN_SECONDS) {
    registry.register(createWaitTool({ minSeconds: WAIT_MIN_SECONDS, maxSeconds: maxWaitSeconds }));
  }
  return registry;
}

function describeFailure(result: RunResult): string {
  if (result.termination === TerminationReason.CANCELLED) {
    return 'Run cancelled before any tool call succeeded.';
  }
  return `Run failed (${result.termination}): ${result.error ?? 'no report was produced'}`;
}

export function exitCodeFor(result: RunResult): number {
  switch (result.termination) {
    case TerminationReason.FATAL_ERROR:
      return EXIT_RUN_FAILED;
    case TerminationReason.CANCELLED:
      return EXIT_CANCELLED;
    default:
      return EXIT_OK;
  }
}
