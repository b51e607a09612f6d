/**
 * OpenAI LLM Provider Implementation
 * Chat completions for OpenAI and OpenAI-compatible APIs (OpenRouter, proxies)
 */

import { z } from 'zod';
import { BaseLLMProvider } from './base.js';
import type { ChatMessage, CompletionOptions, CompletionResponse, ProviderConfig } from '../types.js';
import { LLMError, LLMErrorType } from '../types.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

const openAIResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string(),
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string(),
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class OpenAIProvider extends BaseLLMProvider {
  private readonly baseUrl: string;
  private readonly providerName: string;

  constructor(config: ProviderConfig, providerName: 'openai' | 'openrouter' = 'openai') {
    super(config, providerName);
    this.providerName = providerName;
    const fallbackUrl = providerName === 'openrouter' ? OPENROUTER_BASE_URL : OPENAI_BASE_URL;
    this.baseUrl = (config.baseUrl || fallbackUrl).replace(/\/+$/, '');
  }

  get name(): string {
    return this.providerName;
  }

  async createCompletion(
    messages: ChatMessage[],
    options?: CompletionOptions
  ): Promise<CompletionResponse> {
    const resolvedOptions = this.resolveOptions(options);

    return this.executeWithRetry(async () => {
      const raw = await this.postJson(
        `${this.baseUrl}/chat/completions`,
        { Authorization: `Bearer ${this.config.apiKey}` },
        {
          model: this.config.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          max_tokens: resolvedOptions.maxTokens,
          temperature: resolvedOptions.temperature,
        },
        resolvedOptions.timeout
      );

      const data = this.decode(openAIResponseSchema, raw);
      const content = data.choices[0]?.message.content;

      if (!content) {
        throw new LLMError(LLMErrorType.INVALID_RESPONSE, this.name, 'No choices returned in response');
      }

      return {
        content,
        model: data.model,
        usage: data.usage
          ? {
              promptTokens: data.usage.prompt_tokens,
              completionTokens: data.usage.completion_tokens,
              totalTokens: data.usage.total_tokens,
            }
          : undefined,
        provider: this.name,
      };
    }, `${this.name}.createCompletion`);
  }
}
