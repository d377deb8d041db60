import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';

import { ConfigError } from './config-error';

export interface ProviderCredentials {
  openaiApiKey?: string;
  anthropicApiKey?: string;
}

export type ModelFactory = (modelId: string) => LanguageModel;

export const SUPPORTED_PROVIDERS = ['openai', 'anthropic'] as const;

/**
 * Create a factory that turns model IDs into LanguageModel instances.
 * Providers are created lazily, once per factory.
 *
 * Model ID format: "provider/model-name"
 * Examples:
 *   - "openai/gpt-4o-mini"
 *   - "anthropic/claude-3-5-sonnet-20241022"
 *
 * A missing API key falls back to the provider's own environment variable.
 */
export function createModelFactory(
  credentials: ProviderCredentials = {},
): ModelFactory {
  let openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  let anthropicProvider: ReturnType<typeof createAnthropic> | null = null;

  function getOpenAI() {
    if (!openaiProvider) {
      openaiProvider = createOpenAI({ apiKey: credentials.openaiApiKey });
    }
    return openaiProvider;
  }

  function getAnthropic() {
    if (!anthropicProvider) {
      anthropicProvider = createAnthropic({
        apiKey: credentials.anthropicApiKey,
      });
    }
    return anthropicProvider;
  }

  return (modelId) => {
    const [provider, ...rest] = modelId.split('/');
    const modelName = rest.join('/');

    if (modelName === '') {
      throw new ConfigError(
        `Invalid model ID "${modelId}": expected "provider/model-name"`,
      );
    }

    switch (provider) {
      case 'openai':
        return getOpenAI()(modelName);
      case 'anthropic':
        return getAnthropic()(modelName);
      default:
        throw new ConfigError(
          `Unknown provider: ${provider} (supported: ${SUPPORTED_PROVIDERS.join(', ')})`,
        );
    }
  };
}
