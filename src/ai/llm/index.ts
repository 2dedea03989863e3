/**
 * Support Knowledge Assistant - LLM Module Index
 * =============================================
 * Centralized exports for the LLM abstraction.
 */

// Types
export * from './types';

// Base client + retry
export { LLMClient } from './LLMClient';
export { RetryPolicy, defaultSleep } from './RetryPolicy';
export type { RetryEvent, RetryState, RetryPolicyOptions, SleepFn } from './RetryPolicy';

// Providers
export { OpenAIClient } from './providers';

// ============================================
// FACTORY FUNCTION
// ============================================

import type { LLMProvider, LLMProviderConfig } from './types';
import { LLMClient } from './LLMClient';
import { OpenAIClient } from './providers/OpenAIClient';

/**
 * Create an LLM client for the specified provider
 */
export function createLLMClient(
  provider: LLMProvider,
  config?: Partial<LLMProviderConfig>
): LLMClient {
  switch (provider) {
    case 'openai':
      return new OpenAIClient(config);
    default:
      throw new Error(`Unknown LLM provider: ${String(provider)}`);
  }
}
