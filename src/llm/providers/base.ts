/**
 * Base LLM Provider
 * Shared request, retry and error-mapping logic for chat-completion providers
 */

import { z } from 'zod';
import type { ChatMessage, CompletionOptions, CompletionResponse, ProviderConfig } from '../types.js';
import { LLMError, LLMErrorType } from '../types.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { RetryManager } from '../../utils/retry.js';

const errorBodySchema = z.object({
  error: z.object({ message: z.string().optional() }).passthrough().optional(),
});

/**
 * Abstract base class for LLM providers
 */
export abstract class BaseLLMProvider {
  protected readonly config: ProviderConfig;
  protected readonly logger: Logger;
  protected readonly retryManager: RetryManager;

  constructor(config: ProviderConfig, providerName: string) {
    this.config = config;
    this.logger = createModuleLogger(`llm:${providerName}`);
    this.retryManager = new RetryManager(config.retry, this.logger);
  }

  abstract get name(): string;

  /**
   * Create a completion (non-streaming)
   */
  abstract createCompletion(
    messages: ChatMessage[],
    options?: CompletionOptions
  ): Promise<CompletionResponse>;

  /**
   * Execute a request with retry logic
   */
  protected async executeWithRetry<T>(requestFn: () => Promise<T>, context: string): Promise<T> {
    return this.retryManager.execute(async () => {
      try {
        return await requestFn();
      } catch (error) {
        throw this.handleError(error);
      }
    }, context);
  }

  /**
   * Merge default options with provided options
   */
  protected resolveOptions(options?: CompletionOptions): Required<CompletionOptions> {
    return {
      maxTokens: options?.maxTokens ?? this.config.maxTokens ?? 1200,
      temperature: options?.temperature ?? this.config.temperature ?? 0.3,
      timeout: options?.timeout ?? this.config.timeout ?? 30000,
    };
  }

  /**
   * POST a JSON body and return the decoded JSON response
   */
  protected async postJson(
    url: string,
    headers: Record<string, string>,
    body: Record<string, unknown>,
    timeout: number
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw this.createErrorFromStatus(response.status, this.extractErrorMessage(text, response.status));
      }

      const data: unknown = await response.json();
      return data;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Decode a provider response against its schema
   */
  protected decode<T>(schema: z.ZodType<T>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new LLMError(
        LLMErrorType.INVALID_RESPONSE,
        this.name,
        `Unexpected response shape: ${parsed.error.issues.map((i) => i.message).join(', ')}`
      );
    }
    return parsed.data;
  }

  protected createErrorFromStatus(status: number, message: string): LLMError {
    switch (status) {
      case 401:
      case 403:
        return new LLMError(LLMErrorType.AUTHENTICATION, this.name, message);

      case 429:
        return new LLMError(LLMErrorType.RATE_LIMIT, this.name, message, undefined, true);

      case 400:
        return new LLMError(LLMErrorType.INVALID_REQUEST, this.name, message);

      case 500:
      case 502:
      case 503:
      case 504:
      case 529:
        return new LLMError(LLMErrorType.SERVER_ERROR, this.name, message, undefined, true);

      default:
        return new LLMError(LLMErrorType.UNKNOWN, this.name, message);
    }
  }

  /**
   * Handle and convert errors to LLMError
   */
  protected handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.message.includes('timeout')) {
        return new LLMError(LLMErrorType.TIMEOUT, this.name, error.message, error, true);
      }

      if (error.message.includes('fetch') || error.message.includes('network')) {
        return new LLMError(LLMErrorType.NETWORK_ERROR, this.name, error.message, error, true);
      }

      return new LLMError(LLMErrorType.UNKNOWN, this.name, error.message, error);
    }

    return new LLMError(LLMErrorType.UNKNOWN, this.name, String(error));
  }

  private extractErrorMessage(text: string, status: number): string {
    try {
      const parsed = errorBodySchema.safeParse(JSON.parse(text));
      if (parsed.success && parsed.data.error?.message) {
        return parsed.data.error.message;
      }
    } catch {
      // non-JSON error bodies fall through to the raw text
    }
    return text.trim() || `HTTP ${status}`;
  }
}
