/**
 * @fileoverview Provider exports
 */

export * from './base.js';
export * from './anthropic.js';
export * from './openai.js';

import { ModelProvider, resolveProvider, type ModelBackend } from './base.js';
import { AnthropicBackend } from './anthropic.js';
import { OpenAIBackend } from './openai.js';
import { ConfigurationError } from '../types/errors.js';

export interface BackendConfig {
  readonly model: string;
  readonly anthropicApiKey?: string | undefined;
  readonly openaiApiKey?: string | undefined;
  readonly openaiBaseUrl?: string | undefined;
}

/**
 * Creates the backend that serves `config.model`.
 *
 * @throws ConfigurationError when the model is unknown or its API key is missing
 */
export function createBackend(config: BackendConfig): ModelBackend {
  const provider = resolveProvider(config.model);

  switch (provider) {
    case ModelProvider.ANTHROPIC:
      if (!config.anthropicApiKey) {
        throw new ConfigurationError(`ANTHROPIC_API_KEY is required for model '${config.model}'`);
      }
      return new AnthropicBackend({ model: config.model, apiKey: config.anthropicApiKey });

    case ModelProvider.OPENAI:
      // Local compatible servers run without a key
      if (!config.openaiApiKey && !config.openaiBaseUrl) {
        throw new ConfigurationError(
          `OPENAI_API_KEY (or OPENAI_BASE_URL for a compatible server) is required for model '${config.model}'`,
        );
      }
      return new OpenAIBackend({
        model: config.model,
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiBaseUrl,
      });
  }
}
