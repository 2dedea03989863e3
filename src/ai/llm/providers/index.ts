/**
 * Support Knowledge Assistant - LLM Providers Index
 * =================================================
 * Barrel export for all LLM providers.
 */

export { OpenAIClient } from './OpenAIClient';
