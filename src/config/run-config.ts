/**
 * @fileoverview Run configuration: defaults, validation and environment.
 *
 * @module research-loop/config
 * @version 0.1.0
 */

import { z } from 'zod';
import { Severity } from '../types/core.types.js';
import { ConfigurationError } from '../types/errors.js';
import { DEFAULT_MODEL } from '../providers/base.js';
import { parseSeverity } from '../observability/logger.js';

/**
 * Budgets and timeouts consumed by the Agent Loop.
 */
export interface RunConfig {
  /** Maximum number of tool-call steps in one run */
  readonly maxSteps: number;

  /** Wall-clock budget for one run (ms) */
  readonly maxWallTimeMs: number;

  /** Deadline for a single tool call (ms) */
  readonly toolTimeoutMs: number;

  /** Deadline for a single planner call (ms) */
  readonly plannerTimeoutMs: number;

  /** Maximum characters of content in the planner's view */
  readonly contextBudgetChars: number;

  /** Most recent steps that are never evicted from the view */
  readonly preserveRecentSteps: number;

  /** Upper bound on the summary of evicted steps */
  readonly summaryMaxChars: number;

  /** Consecutive planner failures retried before the run is fatal */
  readonly maxPlannerRetries: number;

  /** Base delay before a planner retry; doubles on each attempt (ms) */
  readonly retryBackoffMs: number;
}

/**
 * Default configuration for a run.
 */
export const DEFAULT_RUN_CONFIG: Readonly<RunConfig> = {
  maxSteps: 10,
  maxWallTimeMs: 300_000,
  toolTimeoutMs: 30_000,
  plannerTimeoutMs: 60_000,
  contextBudgetChars: 24_000,
  preserveRecentSteps: 3,
  summaryMaxChars: 2_000,
  maxPlannerRetries: 2,
  retryBackoffMs: 500,
} as const;

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const RunConfigSchema = z.object({
  maxSteps: positiveInt,
  maxWallTimeMs: positiveInt,
  toolTimeoutMs: positiveInt,
  plannerTimeoutMs: positiveInt,
  contextBudgetChars: positiveInt,
  preserveRecentSteps: positiveInt,
  summaryMaxChars: nonNegativeInt,
  maxPlannerRetries: nonNegativeInt,
  retryBackoffMs: nonNegativeInt,
}).strict();

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveRunConfig(overrides: Partial<RunConfig> = {}, base: RunConfig = DEFAULT_RUN_CONFIG): RunConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const parsed = RunConfigSchema.safeParse({ ...base, ...defined });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid run configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Settings read from the process environment.
 */
export interface EnvironmentConfig {
  readonly model: string;
  readonly anthropicApiKey: string | undefined;
  readonly openaiApiKey: string | undefined;
  readonly openaiBaseUrl: string | undefined;
  readonly logLevel: Severity;
  readonly run: Partial<RunConfig>;
}

/** Blank variables count as unset. */
const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional(),
);

const optionalPositiveInt = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().int().positive().optional(),
);

const EnvironmentSchema = z.object({
  RESEARCH_MODEL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  RESEARCH_MAX_STEPS: optionalPositiveInt,
  RESEARCH_MAX_WALL_TIME_MS: optionalPositiveInt,
  RESEARCH_LOG_LEVEL: optionalString,
});

/**
 * Reads the research-loop variables from `env`.
 *
 * @throws ConfigurationError for malformed values
 */
export function loadEnvironment(env: Record<string, string | undefined> = process.env): EnvironmentConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  let logLevel = Severity.INFO;
  if (vars.RESEARCH_LOG_LEVEL !== undefined) {
    const level = parseSeverity(vars.RESEARCH_LOG_LEVEL);
    if (level === null) {
      throw new ConfigurationError(`Invalid environment: RESEARCH_LOG_LEVEL: unknown level '${vars.RESEARCH_LOG_LEVEL}'`);
    }
    logLevel = level;
  }

  const run: { maxSteps?: number; maxWallTimeMs?: number } = {};
  if (vars.RESEARCH_MAX_STEPS !== undefined) run.maxSteps = vars.RESEARCH_MAX_STEPS;
  if (vars.RESEARCH_MAX_WALL_TIME_MS !== undefined) run.maxWallTimeMs = vars.RESEARCH_MAX_WALL_TIME_MS;

  return {
    model: vars.RESEARCH_MODEL ?? DEFAULT_MODEL,
    anthropicApiKey: vars.ANTHROPIC_API_KEY,
    openaiApiKey: vars.OPENAI_API_KEY,
    openaiBaseUrl: vars.OPENAI_BASE_URL,
    logLevel,
    run,
  };
}
