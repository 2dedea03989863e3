/**
 * Support Knowledge Assistant - RAG Types
 * =======================================
 */

/**
 * Atomic retrievable unit: one (sub-)section of one document.
 * Identity is (source, metadata.section); content is never empty.
 */
export interface Chunk {
  /** "{file name}: {section title}" */
  source: string;
  content: string;
  metadata: Record<string, string>;
}

export interface SearchResult {
  chunk: Chunk;
  /** Cosine similarity of unit vectors, clamped to [0, 1] */
  score: number;
}

export interface RetrievedContext {
  results: SearchResult[];
  context: string;
  references: string[];
}

export interface IndexStats {
  size: number;
  dimension: number | null;
  model: string;
  documentCount: number;
}

export interface RetrieverStats extends IndexStats {
  docsPath: string;
  indexPath: string;
  maxChunks: number;
  similarityThreshold: number;
}
