/**
 * Support Knowledge Assistant - Vector Index
 * ==========================================
 * Exact (brute-force) nearest-neighbour search over L2-normalised embeddings.
 * Vectors are normalised once on insertion and once per query, so similarity is a dot product.
 *
 * Persisted as a pair of files that are only ever read or written together:
 *   {path}.vectors.bin  16-byte stamp, then little-endian float32, row-major, count x dimension
 *   {path}.chunks.json  format version, stamp, model, dimension, count and chunk list
 * Each persist draws a fresh uuid stamp; a pair whose stamps differ is not loaded.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { v4 as uuidv4, parse as parseUuid, stringify as stringifyUuid } from 'uuid';
import type { Embedder } from '../embeddings/types';
import type { Chunk, IndexStats, SearchResult } from './types';
import { createError } from '../../lib/errors';
import { ragLogger } from '../../utils/logger';

// ============================================
// PERSISTENCE FORMAT
// ============================================

const INDEX_FORMAT_VERSION = 2;
const FLOAT_BYTES = 4;
const STAMP_BYTES = 16;

const chunkSchema = z.object({
  source: z.string(),
  content: z.string().min(1),
  metadata: z.record(z.string()),
});

const persistedChunksSchema = z
  .object({
    version: z.literal(INDEX_FORMAT_VERSION),
    stamp: z.string().uuid(),
    model: z.string(),
    dimension: z.number().int().nonnegative(),
    count: z.number().int().nonnegative(),
    chunks: z.array(chunkSchema),
  })
  .refine((data) => data.chunks.length === data.count, {
    message: 'chunk list length does not match count',
  })
  .refine((data) => data.count === 0 || data.dimension > 0, {
    message: 'non-empty index without a dimension',
  });

export const vectorsFilePath = (indexPath: string) => `${indexPath}.vectors.bin`;
export const chunksFilePath = (indexPath: string) => `${indexPath}.chunks.json`;

// ============================================
// VECTOR MATH
// ============================================

export function l2Normalize(vector: ArrayLike<number>): Float32Array {
  let sumSquares = 0;
  for (let i = 0; i < vector.length; i++) {
    sumSquares += vector[i] * vector[i];
  }

  const normalized = new Float32Array(vector.length);
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) {
    return normalized;
  }

  for (let i = 0; i < vector.length; i++) {
    normalized[i] = vector[i] / norm;
  }
  return normalized;
}

function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

function clampUnit(score: number): number {
  return Math.min(1, Math.max(0, score));
}

// ============================================
// INDEX
// ============================================

export class VectorIndex {
  private vectors: Float32Array[] = [];
  private entries: Chunk[] = [];
  private dim: number | null = null;
  private modelName: string;

  constructor(private readonly embedder: Embedder) {
    this.modelName = embedder.model;
  }

  get size(): number {
    return this.entries.length;
  }

  get dimension(): number | null {
    return this.dim;
  }

  /** Embedding model the stored vectors came from */
  get model(): string {
    return this.modelName;
  }

  chunks(): readonly Chunk[] {
    return this.entries;
  }

  stats(): IndexStats {
    return {
      size: this.size,
      dimension: this.dim,
      model: this.modelName,
      documentCount: new Set(this.entries.map((c) => c.metadata.file ?? c.source)).size,
    };
  }

  /**
   * Embed the chunks in one batch, normalise and append them.
   * Nothing is appended unless every vector has the index dimension.
   */
  async add(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    const embeddings = await this.embedder.embedBatch(chunks.map((c) => c.content));
    if (embeddings.length !== chunks.length) {
      throw createError.index.embeddingCountMismatch(chunks.length, embeddings.length);
    }

    const dimension = this.dim ?? (await this.embedder.dimension());
    for (const embedding of embeddings) {
      if (embedding.length !== dimension) {
        throw createError.index.dimensionMismatch(dimension, embedding.length);
      }
    }

    this.dim = dimension;
    this.vectors.push(...embeddings.map(l2Normalize));
    this.entries.push(...chunks);

    ragLogger.debug({ added: chunks.length, size: this.size }, `[VectorIndex] Added ${chunks.length} chunks`);
  }

  /**
   * Top-k chunks by cosine similarity, then dropping those under the threshold.
   * Ties keep insertion order.
   */
  async search(query: string, k: number, threshold: number): Promise<SearchResult[]> {
    // Snapshot what exists now; later appends are not part of this search
    const count = this.entries.length;
    if (count === 0 || k <= 0) {
      return [];
    }
    const vectors = this.vectors.slice(0, count);
    const entries = this.entries.slice(0, count);
    const dimension = this.dim;

    const embedding = await this.embedder.embed(query);
    if (dimension !== null && embedding.length !== dimension) {
      throw createError.index.dimensionMismatch(dimension, embedding.length);
    }
    const queryVector = l2Normalize(embedding);

    const scored = vectors.map((vector, position) => ({
      position,
      score: clampUnit(dot(queryVector, vector)),
    }));
    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    return scored
      .slice(0, k)
      .filter(({ score }) => score >= threshold)
      .map(({ position, score }) => ({ chunk: entries[position], score }));
  }

  /**
   * Write both files (temp file + rename each). Any failure is fatal.
   */
  async persist(indexPath: string): Promise<void> {
    const dimension = this.dim ?? 0;
    const stamp = uuidv4();
    const buffer = Buffer.alloc(STAMP_BYTES + this.vectors.length * dimension * FLOAT_BYTES);
    buffer.set(parseUuid(stamp), 0);
    this.vectors.forEach((vector, row) => {
      vector.forEach((value, col) => {
        buffer.writeFloatLE(value, STAMP_BYTES + (row * dimension + col) * FLOAT_BYTES);
      });
    });

    const payload = {
      version: INDEX_FORMAT_VERSION,
      stamp,
      model: this.modelName,
      dimension,
      count: this.entries.length,
      chunks: this.entries,
    };

    const vectorsFile = vectorsFilePath(indexPath);
    const chunksFile = chunksFilePath(indexPath);

    try {
      await fs.mkdir(path.dirname(indexPath), { recursive: true });
      await fs.writeFile(`${vectorsFile}.tmp`, buffer);
      await fs.writeFile(`${chunksFile}.tmp`, JSON.stringify(payload));
      await fs.rename(`${vectorsFile}.tmp`, vectorsFile);
      await fs.rename(`${chunksFile}.tmp`, chunksFile);
    } catch (err) {
      throw createError.index.persistFailed(indexPath, err);
    }

    ragLogger.info({ indexPath, size: this.size }, `[VectorIndex] Saved vector store to ${indexPath}`);
  }

  /**
   * Replace the contents with the persisted pair.
   * @returns false, leaving the index untouched, when either file is missing or unreadable
   */
  async load(indexPath: string): Promise<boolean> {
    let rawChunks: string;
    let rawVectors: Buffer;

    try {
      [rawChunks, rawVectors] = await Promise.all([
        fs.readFile(chunksFilePath(indexPath), 'utf8'),
        fs.readFile(vectorsFilePath(indexPath)),
      ]);
    } catch {
      ragLogger.info({ indexPath }, `[VectorIndex] No persisted index at ${indexPath}`);
      return false;
    }

    try {
      const data = persistedChunksSchema.parse(JSON.parse(rawChunks));
      const expectedBytes = STAMP_BYTES + data.count * data.dimension * FLOAT_BYTES;
      if (rawVectors.byteLength !== expectedBytes) {
        throw new Error(`vector file holds ${rawVectors.byteLength} bytes, expected ${expectedBytes}`);
      }
      // Both files come from the same persist call or neither is used
      const vectorsStamp = stringifyUuid(rawVectors.subarray(0, STAMP_BYTES));
      if (vectorsStamp !== data.stamp) {
        throw new Error(`vector file stamp ${vectorsStamp} does not match chunk file stamp ${data.stamp}`);
      }

      const vectors: Float32Array[] = [];
      for (let row = 0; row < data.count; row++) {
        const vector = new Float32Array(data.dimension);
        for (let col = 0; col < data.dimension; col++) {
          vector[col] = rawVectors.readFloatLE(STAMP_BYTES + (row * data.dimension + col) * FLOAT_BYTES);
        }
        vectors.push(vector);
      }

      this.vectors = vectors;
      this.entries = data.chunks;
      this.dim = data.count > 0 ? data.dimension : this.dim;
      this.modelName = data.model;
    } catch (err) {
      ragLogger.warn(
        { err, indexPath },
        `Error loading vector store: ${err instanceof Error ? err.message : String(err)}`
      );
      return false;
    }

    ragLogger.info({ indexPath, size: this.size }, `[VectorIndex] Loaded vector store from ${indexPath}`);
    return true;
  }
}
