/**
 * Support Knowledge Assistant - RAG Module Index
 * ==============================================
 * Centralized exports for the retrieval pipeline.
 */

// Chunking
export { splitByHeadings, chunkByLength, INTRODUCTION_TITLE } from './chunker';
export type { Section } from './chunker';
export { DocumentProcessor } from './documentProcessor';
export type { DocumentProcessorOptions } from './documentProcessor';

// Index
export { VectorIndex, l2Normalize, vectorsFilePath, chunksFilePath } from './vectorIndex';

// Retriever
export {
  DocumentRetriever,
  buildContext,
  collectReferences,
  NO_CONTEXT_SENTINEL,
  DEFAULT_MAX_CHUNKS,
  DEFAULT_SIMILARITY_THRESHOLD,
} from './retriever';
export type { RetrieverOptions, SearchOptions } from './retriever';

export type { Chunk, SearchResult, RetrievedContext, IndexStats, RetrieverStats } from './types';
