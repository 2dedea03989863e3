/**
 * Support Knowledge Assistant - RAG Retriever
 * ===========================================
 * Owns the document processor and the vector index: builds/loads the index,
 * answers queries with ranked, thresholded chunks, formatted context and references.
 */

import type { Embedder } from '../embeddings/types';
import { DocumentProcessor } from './documentProcessor';
import type { DocumentProcessorOptions } from './documentProcessor';
import { VectorIndex } from './vectorIndex';
import type { Chunk, RetrievedContext, RetrieverStats, SearchResult } from './types';
import { createError } from '../../lib/errors';
import { ragLogger, createPerformanceLogger } from '../../utils/logger';

// ============================================
// CONFIGURATION
// ============================================

export const DEFAULT_MAX_CHUNKS = 5;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;
export const NO_CONTEXT_SENTINEL = 'No relevant documentation found.';

export interface RetrieverOptions {
  docsPath: string;
  indexPath: string;
  embedder: Embedder;
  maxChunks?: number;
  similarityThreshold?: number;
  processing?: DocumentProcessorOptions;
}

export interface SearchOptions {
  maxChunks?: number;
  threshold?: number;
}

// ============================================
// FORMATTING
// ============================================

/**
 * "Source {n}: {source}\n{content}\n" per result, blank line between, in ranked order
 */
export function buildContext(results: SearchResult[]): string {
  if (results.length === 0) {
    return NO_CONTEXT_SENTINEL;
  }

  return results
    .map(({ chunk }, i) => `Source ${i + 1}: ${chunk.source}\n${chunk.content}\n`)
    .join('\n');
}

/**
 * Distinct sources, highest rank first
 */
export function collectReferences(results: SearchResult[]): string[] {
  const seen = new Set<string>();
  const references: string[] = [];

  for (const { chunk } of results) {
    if (!seen.has(chunk.source)) {
      seen.add(chunk.source);
      references.push(chunk.source);
    }
  }

  return references;
}

// ============================================
// RETRIEVER
// ============================================

export class DocumentRetriever {
  readonly docsPath: string;
  readonly indexPath: string;
  readonly maxChunks: number;
  readonly similarityThreshold: number;

  private readonly embedder: Embedder;
  private readonly documentProcessor: DocumentProcessor;
  private index: VectorIndex;
  private pendingRebuild: Promise<void> = Promise.resolve();

  constructor(options: RetrieverOptions) {
    this.docsPath = options.docsPath;
    this.indexPath = options.indexPath;
    this.embedder = options.embedder;
    this.maxChunks = options.maxChunks ?? DEFAULT_MAX_CHUNKS;
    this.similarityThreshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    this.documentProcessor = new DocumentProcessor(this.docsPath, options.processing);
    this.index = new VectorIndex(this.embedder);
  }

  /**
   * Construct and bootstrap in one step
   */
  static async create(options: RetrieverOptions): Promise<DocumentRetriever> {
    const retriever = new DocumentRetriever(options);
    await retriever.initialize();
    return retriever;
  }

  /**
   * Reuse the persisted index when it matches the current embedder, otherwise build it once
   */
  async initialize(): Promise<void> {
    const persisted = new VectorIndex(this.embedder);

    if (await persisted.load(this.indexPath)) {
      if (await this.isCompatible(persisted)) {
        this.index = persisted;
        ragLogger.info({ size: persisted.size }, 'Loaded existing vector store');
        return;
      }
      ragLogger.warn(
        { storedModel: persisted.model, currentModel: this.embedder.model },
        'Persisted vector store does not match the current embedder, rebuilding'
      );
    }

    ragLogger.info('Creating new vector store...');
    await this.rebuild();
  }

  /**
   * Full load → chunk → embed → persist pass into a fresh index, then swap it in.
   * Rebuilds run one at a time; searches keep using the index they started with.
   */
  rebuild(): Promise<void> {
    // A failed earlier rebuild was already reported to its own caller
    const run = this.pendingRebuild.catch(() => undefined).then(() => this.buildIndex());
    this.pendingRebuild = run;
    return run;
  }

  async retrieve(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const maxChunks = options.maxChunks ?? this.maxChunks;
    const threshold = options.threshold ?? this.similarityThreshold;

    const results = await this.index.search(query, maxChunks, threshold);

    // Index returns ranked results already; keep the order guarantee local
    return [...results].sort((a, b) => b.score - a.score);
  }

  async getContextString(query: string, options?: SearchOptions): Promise<string> {
    return buildContext(await this.retrieve(query, options));
  }

  async getReferences(query: string, options?: SearchOptions): Promise<string[]> {
    return collectReferences(await this.retrieve(query, options));
  }

  /**
   * One retrieval, all three views of it
   */
  async retrieveContext(query: string, options?: SearchOptions): Promise<RetrievedContext> {
    const results = await this.retrieve(query, options);
    return {
      results,
      context: buildContext(results),
      references: collectReferences(results),
    };
  }

  getStats(): RetrieverStats {
    return {
      ...this.index.stats(),
      docsPath: this.docsPath,
      indexPath: this.indexPath,
      maxChunks: this.maxChunks,
      similarityThreshold: this.similarityThreshold,
    };
  }

  /** Current chunk list, read-only */
  chunks(): readonly Chunk[] {
    return this.index.chunks();
  }

  private async buildIndex(): Promise<void> {
    const perf = createPerformanceLogger('rag.build_index');
    const chunks = await this.documentProcessor.loadDocuments();

    if (chunks.length === 0) {
      throw createError.config.noDocuments(this.docsPath);
    }

    const fresh = new VectorIndex(this.embedder);
    await fresh.add(chunks);
    await fresh.persist(this.indexPath);

    this.index = fresh;
    perf.finish({ chunks: chunks.length });
    ragLogger.info({ chunks: chunks.length }, `Built vector store with ${chunks.length} document chunks`);
  }

  private async isCompatible(persisted: VectorIndex): Promise<boolean> {
    if (persisted.model !== this.embedder.model) {
      return false;
    }
    if (persisted.dimension === null) {
      return false;
    }
    return persisted.dimension === (await this.embedder.dimension());
  }
}
