/**
 * LLM Module Main Entry Point
 */

export type {
  ChatMessage,
  CompletionOptions,
  CompletionResponse,
  UsageStats,
  ProviderConfig,
} from './types.js';

export { LLMError, LLMErrorType } from './types.js';

export { BaseLLMProvider } from './providers/base.js';
export { OpenAIProvider } from './providers/openai.js';
export { AnthropicProvider } from './providers/anthropic.js';

export { createProvider, createProviderFromConfig } from './factory.js';
