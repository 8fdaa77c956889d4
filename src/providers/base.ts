/**
 * @fileoverview Model backend contract shared by every provider.
 *
 * A backend maps a conversation plus the registered tool schemas to either
 * tool calls or a final text message. Wire formats stay inside each
 * provider; the planner only ever sees {@link BackendResponse}.
 *
 * @module research-loop/providers
 * @version 0.1.0
 */

import type { ContextEntry, ToolSchema } from '../types/context.types.js';
import { ConfigurationError } from '../types/errors.js';

/**
 * Supported backend families.
 */
export enum ModelProvider {
  /** Anthropic Messages API */
  ANTHROPIC = 'anthropic',

  /** OpenAI chat completions, or any compatible endpoint */
  OPENAI = 'openai',
}

export enum AnthropicModelName {
  CLAUDE_3_5_LATEST = 'claude-3-5-sonnet-20241022',
  CLAUDE_3_5_SONNET_2024_10_22 = 'claude-3-5-sonnet-20241022',
  CLAUDE_3_5_SONNET_2024_06_20 = 'claude-3-5-sonnet-20240620',
}

export enum OpenAIModelName {
  /** Alias for gpt-4o-2024-08-06 */
  GPT_4O = 'gpt-4o',
  GPT_4O_2024_11_20 = 'gpt-4o-2024-11-20',
  CHATGPT_4O_LATEST = 'chatgpt-4o-latest',
}

export const DEFAULT_MODEL: string = AnthropicModelName.CLAUDE_3_5_LATEST;

/**
 * Conversation turn as sent to a backend. Roles alternate.
 */
export interface BackendMessage {
  readonly role: 'user' | 'assistant';
  readonly content: string;
}

export interface BackendRequest {
  readonly system: string;
  readonly messages: ReadonlyArray<BackendMessage>;

  /** Tools the model may call; empty when only a text answer is wanted */
  readonly tools: ReadonlyArray<ToolSchema>;

  readonly signal?: AbortSignal | undefined;
}

/**
 * A tool call as the backend produced it. Arguments are not validated here.
 */
export interface BackendToolCall {
  readonly name: string;
  readonly arguments: unknown;
}

export interface BackendResponse {
  readonly text: string | null;
  readonly toolCalls: ReadonlyArray<BackendToolCall>;
}

/**
 * Polymorphic model capability. Implementations throw
 * `BackendUnavailableError` when the call cannot complete and
 * `MalformedResponseError` when the reply cannot be read.
 */
export interface ModelBackend {
  readonly provider: ModelProvider;
  readonly model: string;
  complete(request: BackendRequest): Promise<BackendResponse>;
}

/**
 * Resolves the provider family from a model name.
 *
 * @throws ConfigurationError for names no backend serves
 */
export function resolveProvider(model: string): ModelProvider {
  const name = model.trim().toLowerCase();
  if (name.startsWith('claude-')) {
    return ModelProvider.ANTHROPIC;
  }
  if (name.startsWith('gpt-') || name.startsWith('chatgpt-') || /^o\d/.test(name)) {
    return ModelProvider.OPENAI;
  }
  throw new ConfigurationError(`No backend serves model '${model}'`, [
    `Anthropic models: ${unique(Object.values(AnthropicModelName)).join(', ')}`,
    `OpenAI models: ${unique(Object.values(OpenAIModelName)).join(', ')}`,
  ]);
}

/**
 * Converts a context view into a system prompt and alternating turns.
 *
 * System entries join the system prompt. Tool observations travel as user
 * turns, and consecutive turns of one role are merged.
 */
export function toBackendConversation(view: ReadonlyArray<ContextEntry>): {
  system: string;
  messages: BackendMessage[];
} {
  const system: string[] = [];
  const messages: BackendMessage[] = [];

  for (const entry of view) {
    if (entry.role === 'system') {
      system.push(entry.content);
      continue;
    }

    const role = entry.role === 'assistant' ? 'assistant' : 'user';
    const last = messages[messages.length - 1];
    if (last && last.role === role) {
      messages[messages.length - 1] = { role, content: `${last.content}\n\n${entry.content}` };
    } else {
      messages.push({ role, content: entry.content });
    }
  }

  return { system: system.join('\n\n'), messages };
}

/**
 * Status code carried by an SDK or HTTP error, if any.
 */
export function statusOf(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

function unique(values: ReadonlyArray<string>): string[] {
  return Array.from(new Set(values));
}
