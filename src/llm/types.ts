/**
 * LLM Provider Types and Interfaces
 * Common types for the chat-completion providers used by the narrative summarizer
 */

import type { RetryConfig } from '../utils/retry.js';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Options for LLM completion requests
 */
export interface CompletionOptions {
  maxTokens?: number;

  /**
   * Sampling temperature (0-2)
   */
  temperature?: number;

  /**
   * Timeout for the request in milliseconds
   */
  timeout?: number;
}

export interface UsageStats {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Response from a completion request
 */
export interface CompletionResponse {
  content: string;
  model: string;
  usage?: UsageStats;

  /**
   * The provider that generated the response
   */
  provider: string;
}

/**
 * Error types for LLM operations
 */
export enum LLMErrorType {
  AUTHENTICATION = 'AUTHENTICATION',
  RATE_LIMIT = 'RATE_LIMIT',
  INVALID_REQUEST = 'INVALID_REQUEST',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  SERVER_ERROR = 'SERVER_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Custom error class for LLM operations
 */
export class LLMError extends Error {
  constructor(
    public type: LLMErrorType,
    public provider: string,
    message: string,
    public originalError?: unknown,
    public isRetryable: boolean = false
  ) {
    super(`[${provider}] ${type}: ${message}`);
    this.name = 'LLMError';
  }
}

/**
 * Provider configuration
 */
export interface ProviderConfig {
  apiKey: string;
  model: string;

  /**
   * Base URL for API requests (OpenAI-compatible gateways, proxies)
   */
  baseUrl?: string;

  maxTokens?: number;
  temperature?: number;

  /**
   * Default timeout in milliseconds
   */
  timeout?: number;

  retry?: Partial<RetryConfig>;
}
