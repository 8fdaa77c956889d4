/**
 * @fileoverview OpenAI-compatible backend
 *
 * Implements function calling over the chat completions endpoint with raw
 * `fetch`, so it also works against Azure OpenAI, vLLM, Ollama, LM Studio or
 * any other compatible server given a `baseUrl`.
 *
 * @see https://platform.openai.com/docs/guides/function-calling
 */

import { z } from 'zod';
import {
  ModelProvider,
  OpenAIModelName,
  type BackendRequest,
  type BackendResponse,
  type BackendToolCall,
  type ModelBackend,
} from './base.js';
import { BackendUnavailableError, MalformedResponseError, describeError } from '../types/errors.js';

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

export interface OpenAIBackendConfig {
  readonly model?: string;
  readonly apiKey?: string | undefined;
  readonly baseUrl?: string | undefined;
  readonly maxTokens?: number;
  readonly temperature?: number;

  /** Injected fetch; the global one when omitted */
  readonly fetchImpl?: typeof fetch;
}

/**
 * OpenAI tool format.
 */
export interface OpenAITool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Readonly<Record<string, unknown>>;
  };
}

interface OpenAIChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * OpenAI Chat Completion Request.
 */
export interface OpenAIChatRequest {
  model: string;
  messages: OpenAIChatMessage[];
  tools?: OpenAITool[];
  tool_choice?: 'auto';
  temperature: number;
  max_tokens: number;
}

const ChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullish(),
        tool_calls: z
          .array(
            z.object({
              type: z.literal('function').optional(),
              function: z.object({ name: z.string(), arguments: z.string() }),
            }),
          )
          .nullish(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ).min(1),
});

/**
 * Chat completions backend.
 */
export class OpenAIBackend implements ModelBackend {
  readonly provider = ModelProvider.OPENAI;
  readonly model: string;
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OpenAIBackendConfig = {}) {
    this.model = config.model ?? OpenAIModelName.GPT_4O;
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/$/, '');
    this.maxTokens = config.maxTokens ?? 4096;
    this.temperature = config.temperature ?? 0.2;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  /**
   * Builds the request body for a backend request.
   */
  createChatRequest(request: BackendRequest): OpenAIChatRequest {
    const messages: OpenAIChatMessage[] = [];
    if (request.system !== '') {
      messages.push({ role: 'system', content: request.system });
    }
    for (const message of request.messages) {
      messages.push({ role: message.role, content: message.content });
    }

    const body: OpenAIChatRequest = {
      model: this.model,
      messages,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
    };
    if (request.tools.length > 0) {
      body.tools = request.tools.map(tool => ({
        type: 'function',
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
      }));
      body.tool_choice = 'auto';
    }
    return body;
  }

  async complete(request: BackendRequest): Promise<BackendResponse> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers['Authorization'] = `Bearer ${this.apiKey}`;

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify(this.createChatRequest(request)),
        signal: request.signal ?? null,
      });
    } catch (error) {
      throw new BackendUnavailableError(`OpenAI-compatible request failed: ${describeError(error)}`, null, {
        cause: error,
      });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new BackendUnavailableError(
        `OpenAI-compatible API error (${response.status}): ${errorText}`,
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new MalformedResponseError('OpenAI-compatible API returned invalid JSON', { cause: error });
    }

    const parsed = ChatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedResponseError('OpenAI-compatible API returned an unexpected body', {
        cause: parsed.error,
      });
    }

    const [choice] = parsed.data.choices;
    if (!choice) {
      throw new MalformedResponseError('No choices in OpenAI-compatible response');
    }

    const toolCalls: BackendToolCall[] = (choice.message.tool_calls ?? []).map(call => ({
      name: call.function.name,
      arguments: parseArguments(call.function.name, call.function.arguments),
    }));
    const text = choice.message.content ?? null;

    return { text: text === '' ? null : text, toolCalls };
  }
}

function parseArguments(toolName: string, raw: string): unknown {
  if (raw.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new MalformedResponseError(`Malformed arguments JSON for tool call '${toolName}'`, { cause: error });
  }
}
