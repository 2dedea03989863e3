/**
 * Support Knowledge Assistant - Orchestrator
 * ==========================================
 * Wires retrieval and generation together: one ticket in, one StructuredAnswer out.
 */

import type { LLMClient } from './llm/LLMClient';
import type { SleepFn } from './llm/RetryPolicy';
import type { Embedder } from './embeddings/types';
import { OpenAIEmbedder } from './embeddings/OpenAIEmbedder';
import { DocumentRetriever } from './rag/retriever';
import type { RetrieverStats } from './rag/types';
import { ResponseGenerator } from './generation/ResponseGenerator';
import type { GenerateOptions } from './generation/ResponseGenerator';
import type { StructuredAnswer } from './generation/types';
import { appLogger, createPerformanceLogger } from '../utils/logger';

// ============================================
// TYPES
// ============================================

export interface KnowledgeAssistantConfig {
  client: LLMClient;
  /** Defaults to an OpenAIEmbedder on the same client */
  embedder?: Embedder;
  docsPath: string;
  indexPath: string;
  embeddingModel?: string;
  embeddingBatchSize?: number;
  maxChunks?: number;
  similarityThreshold?: number;
  maxSectionLength?: number;
  overlap?: number;
  generation?: {
    model?: string;
    maxAttempts?: number;
    baseDelayMs?: number;
    timeoutMs?: number;
    sleep?: SleepFn;
    actionCrossCheck?: boolean;
  };
}

export interface AssistantStats {
  documentCount: number;
  indexSize: number;
  embeddingDimension: number | null;
}

export interface RebuildResult {
  status: 'success' | 'error';
  message: string;
  stats: AssistantStats;
}

export interface SystemStats {
  status: 'operational';
  knowledgeBase: RetrieverStats;
  generation: {
    model: string;
    maxAttempts: number;
    actionCrossCheck: boolean;
  };
}

// ============================================
// ASSISTANT
// ============================================

export class KnowledgeAssistant {
  constructor(
    readonly retriever: DocumentRetriever,
    readonly generator: ResponseGenerator
  ) {}

  /**
   * Build the embedder, retriever and generator, then bootstrap the index
   */
  static async create(config: KnowledgeAssistantConfig): Promise<KnowledgeAssistant> {
    const embedder =
      config.embedder ??
      new OpenAIEmbedder(config.client, {
        model: config.embeddingModel,
        batchSize: config.embeddingBatchSize,
      });

    const retriever = await DocumentRetriever.create({
      docsPath: config.docsPath,
      indexPath: config.indexPath,
      embedder,
      maxChunks: config.maxChunks,
      similarityThreshold: config.similarityThreshold,
      processing: {
        maxSectionLength: config.maxSectionLength,
        overlap: config.overlap,
      },
    });

    const generator = new ResponseGenerator({
      client: config.client,
      ...config.generation,
    });

    appLogger.info({ stats: retriever.getStats() }, 'Knowledge assistant initialized');
    return new KnowledgeAssistant(retriever, generator);
  }

  async resolve(ticketText: string, options: GenerateOptions = {}): Promise<StructuredAnswer> {
    const perf = createPerformanceLogger('assistant.resolve');
    const { context, references, results } = await this.retriever.retrieveContext(ticketText);

    const answer = await this.generator.generate(ticketText, context, references, options);

    perf.finish({ retrieved: results.length, action: answer.action });
    return answer;
  }

  /**
   * Rebuild the knowledge base from the documents directory. Failures are reported, not thrown.
   */
  async rebuild(): Promise<RebuildResult> {
    try {
      await this.retriever.rebuild();
      return {
        status: 'success',
        message: 'Knowledge base rebuilt successfully',
        stats: this.stats(),
      };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      appLogger.error({ err }, `Failed to rebuild knowledge base: ${reason}`);
      return {
        status: 'error',
        message: `Failed to rebuild knowledge base: ${reason}`,
        stats: this.stats(),
      };
    }
  }

  stats(): AssistantStats {
    const { documentCount, size, dimension } = this.retriever.getStats();
    return {
      documentCount,
      indexSize: size,
      embeddingDimension: dimension,
    };
  }

  getSystemStats(): SystemStats {
    return {
      status: 'operational',
      knowledgeBase: this.retriever.getStats(),
      generation: {
        model: this.generator.model,
        maxAttempts: this.generator.maxAttempts,
        actionCrossCheck: this.generator.crossCheckEnabled,
      },
    };
  }
}
