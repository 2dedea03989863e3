/**
 * Support Knowledge Assistant - LLM Client Interface
 * ==================================================
 * Abstract base class for LLM providers.
 */

import type {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMEmbeddingRequest,
  LLMEmbeddingResponse,
  LLMProviderConfig,
  LLMProvider,
} from './types';
import { isTransientLLMError } from './types';
import { RetryPolicy } from './RetryPolicy';
import type { SleepFn } from './RetryPolicy';
import { llmLogger } from '../../utils/logger';

/**
 * Abstract LLM Client interface
 */
export abstract class LLMClient {
  protected config: LLMProviderConfig;
  private readonly transientRetry: RetryPolicy;

  constructor(config: LLMProviderConfig, sleep?: SleepFn) {
    this.config = config;
    this.transientRetry = new RetryPolicy({
      maxAttempts: config.maxRetries ?? 3,
      baseDelayMs: 1000,
      maxDelayMs: 10000,
      isRetryable: isTransientLLMError,
      sleep,
      onTransition: (event) => {
        if (event.state === 'retry_wait') {
          llmLogger.warn(
            { provider: config.provider, attempt: event.attempt + 1, delayMs: event.delayMs },
            `[LLMClient] Attempt ${event.attempt + 1}/${config.maxRetries ?? 3} failed, retrying in ${event.delayMs}ms`
          );
        }
      },
    });
  }

  /**
   * Get the provider name
   */
  abstract get provider(): LLMProvider;

  /**
   * Generate a chat completion. Performs a single provider call, callers own the retry policy.
   */
  abstract complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;

  /**
   * Generate embeddings for text
   */
  abstract embed(request: LLMEmbeddingRequest): Promise<LLMEmbeddingResponse>;

  /**
   * Check if the client is properly configured
   */
  abstract isConfigured(): boolean;

  /**
   * Get the default model for completions
   */
  getDefaultModel(): string {
    return this.config.defaultModel || 'gpt-4o-mini';
  }

  /**
   * Get the default model for embeddings
   */
  getDefaultEmbeddingModel(): string {
    return this.config.defaultEmbeddingModel || 'text-embedding-3-small';
  }

  /**
   * Helper: retry transient failures with exponential backoff
   */
  protected withRetry<T>(operation: () => Promise<T>): Promise<T> {
    return this.transientRetry.execute(() => operation());
  }
}
