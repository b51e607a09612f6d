/**
 * LLM Provider Factory
 * Creates the configured provider for the narrative summarizer
 */

import type { BaseLLMProvider } from './providers/base.js';
import { OpenAIProvider } from './providers/openai.js';
import { AnthropicProvider } from './providers/anthropic.js';
import type { ProviderConfig } from './types.js';
import type { LlmSettings } from '../config/pipeline-config.js';

export function createProviderFromConfig(
  name: LlmSettings['provider'],
  providerConfig: ProviderConfig
): BaseLLMProvider {
  switch (name) {
    case 'openai':
    case 'openrouter':
      return new OpenAIProvider(providerConfig, name);
    case 'anthropic':
      return new AnthropicProvider(providerConfig);
  }
}

/**
 * Create a provider from pipeline settings
 */
export function createProvider(settings: LlmSettings): BaseLLMProvider {
  return createProviderFromConfig(settings.provider, {
    apiKey: settings.apiKey,
    model: settings.model,
    baseUrl: settings.baseUrl,
    maxTokens: settings.maxTokens,
    temperature: settings.temperature,
    timeout: 30000,
    retry: {
      maxAttempts: 3,
      initialBackoffMs: 1000,
      backoffMultiplier: 2,
      maxBackoffMs: 10000,
      jitterFactor: 0.1,
    },
  });
}
