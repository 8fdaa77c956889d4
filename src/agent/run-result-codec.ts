/**
 * @fileoverview JSON encoding of RunResult.
 *
 * Decoding validates the document with zod, so a decoded value is a
 * well-formed RunResult or the call throws.
 *
 * @module research-loop/agent/run-result-codec
 * @version 0.1.0
 */

import { z } from 'zod';
import {
  StepOutcome,
  TerminationReason,
  createTimestamp,
  createUniqueId,
  type RunResult,
  type Step,
  type StepAction,
} from '../types/core.types.js';

const TimestampSchema = z.number().int().nonnegative().transform(value => createTimestamp(value));
const IdSchema = z.string().min(1).transform(value => createUniqueId(value));

const StepActionSchema: z.ZodType<StepAction, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('tool_call'),
    toolName: z.string(),
    arguments: z.record(z.unknown()),
    rationale: z.string().nullable(),
  }),
  z.object({ kind: z.literal('finalize') }),
  z.object({ kind: z.literal('planner_failure'), attempt: z.number().int().positive() }),
]);

const StepSchema: z.ZodType<Step, z.ZodTypeDef, unknown> = z.object({
  id: IdSchema,
  sequence: z.number().int().positive(),
  action: StepActionSchema,
  observation: z.string().nullable(),
  outcome: z.nativeEnum(StepOutcome),
  errorCode: z.string().nullable(),
  timestamp: TimestampSchema,
  completedAt: TimestampSchema,
  durationMs: z.number().nonnegative(),
});

export const RunResultSchema: z.ZodType<RunResult, z.ZodTypeDef, unknown> = z.object({
  runId: IdSchema,
  task: z.object({
    title: z.string(),
    instruction: z.string(),
    rule: z.string().optional(),
  }),
  finalText: z.string().nullable(),
  bestEffort: z.boolean(),
  termination: z.nativeEnum(TerminationReason),
  steps: z.array(StepSchema),
  toolCallCount: z.number().int().nonnegative(),
  error: z.string().nullable(),
  startedAt: TimestampSchema,
  completedAt: TimestampSchema,
});

/**
 * Serializes a RunResult to JSON.
 */
export function encodeRunResult(result: RunResult, space?: number): string {
  return JSON.stringify(result, null, space);
}

/**
 * Parses and validates a RunResult.
 *
 * @throws SyntaxError for invalid JSON, ZodError for a document of the wrong shape
 */
export function decodeRunResult(json: string): RunResult {
  const document: unknown = JSON.parse(json);
  return RunResultSchema.parse(document);
}
