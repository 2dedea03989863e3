/**
 * Support Knowledge Assistant - OpenAI Embedder
 * =============================================
 * Embedder backed by the provider's embeddings endpoint.
 */

import type { LLMClient } from '../llm/LLMClient';
import type { Embedder } from './types';
import { ragLogger } from '../../utils/logger';

const DEFAULT_BATCH_SIZE = 64;
const PROFILING_TEXT = 'sample text';

export interface OpenAIEmbedderOptions {
  model?: string;
  batchSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private readonly batchSize: number;
  private cachedDimension: Promise<number> | null = null;

  constructor(
    private readonly client: LLMClient,
    options: OpenAIEmbedderOptions = {}
  ) {
    this.model = options.model || client.getDefaultEmbeddingModel();
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new Error(`Embedding model ${this.model} returned no vector`);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embed({ input: batch, model: this.model });
      vectors.push(...response.embeddings);
    }

    if (texts.length > this.batchSize) {
      ragLogger.info({ model: this.model, count: texts.length }, `Embedded ${texts.length} texts`);
    }

    return vectors;
  }

  dimension(): Promise<number> {
    if (!this.cachedDimension) {
      this.cachedDimension = this.embed(PROFILING_TEXT).then((vector) => vector.length);
      // Let a failed profiling call be retried next time
      this.cachedDimension.catch(() => {
        this.cachedDimension = null;
      });
    }
    return this.cachedDimension;
  }
}
