/**
 * @fileoverview Anthropic backend
 *
 * Calls the Messages API through `@anthropic-ai/sdk`. Tool schemas become
 * `tools[].input_schema`; `tool_use` blocks become tool calls and text
 * blocks become the final message.
 *
 * @see https://docs.anthropic.com/en/docs/build-with-claude/tool-use
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import {
  ModelProvider,
  DEFAULT_MODEL,
  statusOf,
  type BackendRequest,
  type BackendResponse,
  type ModelBackend,
} from './base.js';
import { AgentError, BackendUnavailableError, MalformedResponseError, describeError } from '../types/errors.js';

/**
 * Request body this backend sends.
 */
export interface AnthropicRequestBody {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user' | 'assistant'; content: string }>;
  tools?: Array<{
    name: string;
    description: string;
    input_schema: { type: 'object'; [key: string]: unknown };
  }>;
}

/**
 * The part of the SDK client this backend uses. Tests pass a fake.
 */
export interface AnthropicMessagesClient {
  readonly messages: {
    create(
      body: AnthropicRequestBody,
      options?: { signal?: AbortSignal | undefined },
    ): Promise<{ content: unknown; stop_reason: string | null }>;
  };
}

export interface AnthropicBackendConfig {
  readonly model?: string;
  readonly apiKey?: string | undefined;
  readonly maxTokens?: number;

  /** Injected client; built from `apiKey` when omitted */
  readonly client?: AnthropicMessagesClient;
}

const ContentBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('tool_use'), name: z.string(), input: z.unknown() }),
]);

const ContentSchema = z.array(
  z.union([ContentBlockSchema, z.object({ type: z.string() }).passthrough()]),
);

/**
 * Anthropic Messages API backend.
 */
export class AnthropicBackend implements ModelBackend {
  readonly provider = ModelProvider.ANTHROPIC;
  readonly model: string;
  private readonly maxTokens: number;
  private readonly client: AnthropicMessagesClient;

  constructor(config: AnthropicBackendConfig = {}) {
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? 4096;
    this.client = config.client ?? createSdkClient(config.apiKey);
  }

  async complete(request: BackendRequest): Promise<BackendResponse> {
    const body: AnthropicRequestBody = {
      model: this.model,
      max_tokens: this.maxTokens,
      system: request.system,
      messages: request.messages.map(message => ({ role: message.role, content: message.content })),
    };
    if (request.tools.length > 0) {
      body.tools = request.tools.map(tool => ({
        name: tool.name,
        description: tool.description,
        input_schema: { ...tool.parameters, type: 'object' },
      }));
    }

    let response: { content: unknown; stop_reason: string | null };
    try {
      response = await this.client.messages.create(body, { signal: request.signal });
    } catch (error) {
      if (error instanceof AgentError) throw error;
      throw new BackendUnavailableError(
        `Anthropic request failed: ${describeError(error)}`,
        statusOf(error),
        { cause: error },
      );
    }

    const parsed = ContentSchema.safeParse(response.content);
    if (!parsed.success) {
      throw new MalformedResponseError('Anthropic response content is not a list of content blocks', {
        cause: parsed.error,
      });
    }

    const text: string[] = [];
    const toolCalls: Array<{ name: string; arguments: unknown }> = [];
    for (const block of parsed.data) {
      const known = ContentBlockSchema.safeParse(block);
      if (!known.success) continue;
      if (known.data.type === 'text') {
        text.push(known.data.text);
      } else {
        toolCalls.push({ name: known.data.name, arguments: known.data.input });
      }
    }

    const joined = text.join('');
    return { text: joined === '' ? null : joined, toolCalls };
  }
}

function createSdkClient(apiKey: string | undefined): AnthropicMessagesClient {
  const sdk = new Anthropic({ apiKey });
  return {
    messages: {
      create: (body, options) => sdk.messages.create(body, options),
    },
  };
}
