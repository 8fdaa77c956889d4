/**
 * @fileoverview Text the loop places into the context.
 *
 * @module research-loop/agent/prompt
 * @version 0.1.0
 */

import type { Task } from '../types/core.types.js';
import type { ToolSchema } from '../types/context.types.js';
import type { Observation } from '../types/tools.types.js';
import type { AgentError } from '../types/errors.js';

const BASE_RULES: ReadonlyArray<string> = [
  'Call at most one tool per turn and wait for its observation.',
  'Only call the tools listed above, with arguments that match their schemas.',
  'When a tool fails, read the error and adapt instead of repeating the same call.',
  'Ground the answer in what the observations show; say so when they are inconclusive.',
  'When you can answer, reply with the final answer as plain text and no tool call.',
];

/**
 * System instructions for a run. A task rule, when present, is appended as
 * the highest-priority rule.
 */
export function buildSystemInstructions(tools: ReadonlyArray<ToolSchema>, rule?: string): string {
  const toolLines = tools.length > 0
    ? tools.map(tool => `- ${tool.name}: ${tool.description}`)
    : ['- (none)'];

  const rules = BASE_RULES.map((text, index) => `${index + 1}. ${text}`);
  if (rule !== undefined && rule.trim() !== '') {
    rules.push(`${rules.length + 1}. MOST IMPORTANT RULE:\n${rule.trim()}`);
  }

  return [
    'You are a research agent. You answer the task by calling tools, reading their observations and deciding when you know enough to answer.',
    `Available tools:\n${toolLines.join('\n')}`,
    `Rules:\n${rules.join('\n')}`,
  ].join('\n\n');
}

export function formatTask(task: Task): string {
  return `Task: ${task.title}\n\n${task.instruction}`;
}

export function formatAction(
  step: number,
  toolName: string,
  args: Readonly<Record<string, unknown>>,
  rationale: string | null,
): string {
  const call = `Step ${step}: ${toolName}(${JSON.stringify(args)})`;
  return rationale ? `${rationale}\n${call}` : call;
}

/**
 * Observation text as the loop records it: strings verbatim, anything else
 * as indented JSON.
 */
export function renderObservation(observation: Observation): string {
  return typeof observation === 'string' ? observation : JSON.stringify(observation, null, 2);
}

export function formatObservation(step: number, toolName: string, text: string): string {
  return `Observation from ${toolName} (step ${step}):\n${text}`;
}

/**
 * Error text shown to the planner. Only the code and message; never a stack.
 */
export function formatError(error: AgentError): string {
  return `Error (${error.code}): ${error.message}`;
}

export function formatToolFailure(step: number, toolName: string, error: AgentError): string {
  return `Step ${step}: ${toolName} failed.\n${formatError(error)}`;
}

export function formatPlannerFeedback(error: AgentError): string {
  return `Your previous reply could not be used. ${formatError(error)}\n` +
    'Reply with exactly one tool call, or with the final answer as plain text.';
}
