/**
 * Support Knowledge Assistant - AI Module Index
 * =============================================
 * Centralized exports for the AI layer.
 */

// LLM Module
export * from './llm';

// Embeddings
export * from './embeddings';

// RAG Module
export * from './rag';

// Generation
export * from './generation';

// Orchestrator
export { KnowledgeAssistant } from './knowledgeAssistant';
export type {
  KnowledgeAssistantConfig,
  AssistantStats,
  RebuildResult,
  SystemStats,
} from './knowledgeAssistant';
