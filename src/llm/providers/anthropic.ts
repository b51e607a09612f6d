/**
 * Anthropic Claude LLM Provider Implementation
 */

import { z } from 'zod';
import { BaseLLMProvider } from './base.js';
import type { ChatMessage, CompletionOptions, CompletionResponse, ProviderConfig } from '../types.js';
import { LLMError, LLMErrorType } from '../types.js';

const anthropicResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

export class AnthropicProvider extends BaseLLMProvider {
  private readonly baseUrl: string;
  private readonly apiVersion = '2023-06-01';

  constructor(config: ProviderConfig) {
    super(config, 'anthropic');
    this.baseUrl = (config.baseUrl || 'https://api.anthropic.com/v1').replace(/\/+$/, '');
  }

  get name(): string {
    return 'anthropic';
  }

  /**
   * The Messages API takes the system prompt separately from the turns
   */
  private convertMessages(messages: ChatMessage[]): {
    system: string | undefined;
    messages: Array<{ role: 'user' | 'assistant'; content: string }>;
  } {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const turns: Array<{ role: 'user' | 'assistant'; content: string }> = [];
    for (const message of messages) {
      if (message.role !== 'system') {
        turns.push({ role: message.role, content: message.content });
      }
    }

    return { system: system || undefined, messages: turns };
  }

  async createCompletion(
    messages: ChatMessage[],
    options?: CompletionOptions
  ): Promise<CompletionResponse> {
    const resolvedOptions = this.resolveOptions(options);
    const { system, messages: anthropicMessages } = this.convertMessages(messages);

    return this.executeWithRetry(async () => {
      const raw = await this.postJson(
        `${this.baseUrl}/messages`,
        {
          'x-api-key': this.config.apiKey,
          'anthropic-version': this.apiVersion,
        },
        {
          model: this.config.model,
          system,
          messages: anthropicMessages,
          max_tokens: resolvedOptions.maxTokens,
          temperature: resolvedOptions.temperature,
        },
        resolvedOptions.timeout
      );

      const data = this.decode(anthropicResponseSchema, raw);
      const content = data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('');

      if (!content) {
        throw new LLMError(LLMErrorType.INVALID_RESPONSE, this.name, 'No text content returned in response');
      }

      return {
        content,
        model: data.model,
        usage: data.usage
          ? {
              promptTokens: data.usage.input_tokens,
              completionTokens: data.usage.output_tokens,
              totalTokens: data.usage.input_tokens + data.usage.output_tokens,
            }
          : undefined,
        provider: this.name,
      };
    }, 'anthropic.createCompletion');
  }
}
