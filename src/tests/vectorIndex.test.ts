/**
 * Tests Vector Index - Support Knowledge Assistant
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { VectorIndex, l2Normalize, vectorsFilePath, chunksFilePath } from '@/ai/rag/vectorIndex';
import type { Chunk } from '@/ai/rag/types';
import type { Embedder } from '@/ai/embeddings/types';
import { ErrorCode } from '@/lib/errors';
import { VocabularyEmbedder } from './helpers/vocabularyEmbedder';

const VOCABULARY = ['domain', 'suspended', 'billing', 'refund', 'dns'];

const chunk = (source: string, content: string, file: string): Chunk => ({
  source,
  content,
  metadata: { file },
});

const CHUNKS: Chunk[] = [
  chunk('s.md: Suspension', 'domain suspended', 's.md'),
  chunk('b.md: Refunds', 'billing refund', 'b.md'),
  chunk('d.md: DNS', 'dns domain', 'd.md'),
];

describe('l2Normalize', () => {
  it('scales a vector to unit length', () => {
    const normalized = l2Normalize([3, 4]);

    expect(normalized[0]).toBeCloseTo(0.6, 6);
    expect(normalized[1]).toBeCloseTo(0.8, 6);
  });

  it('leaves a zero vector at zero', () => {
    expect(Array.from(l2Normalize([0, 0, 0]))).toEqual([0, 0, 0]);
  });
});

describe('VectorIndex', () => {
  let embedder: VocabularyEmbedder;
  let index: VectorIndex;
  let tmpDir: string;

  beforeEach(async () => {
    embedder = new VocabularyEmbedder(VOCABULARY);
    index = new VectorIndex(embedder);
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vector-index-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('add', () => {
    it('grows by the number of chunks added, with one batch call', async () => {
      await index.add(CHUNKS);

      expect(index.size).toBe(3);
      expect(index.dimension).toBe(5);
      expect(embedder.calls.embedBatch).toBe(1);
      expect(index.stats()).toEqual({ size: 3, dimension: 5, model: 'vocabulary-test', documentCount: 3 });
    });

    it('is a no-op on empty input', async () => {
      await index.add([]);

      expect(index.size).toBe(0);
      expect(embedder.calls.embedBatch).toBe(0);
    });

    it('rejects vectors of the wrong dimension and keeps the index unchanged', async () => {
      const misreporting: Embedder = {
        model: 'misreporting',
        embed: (text) => embedder.embed(text),
        embedBatch: (texts) => embedder.embedBatch(texts),
        dimension: async () => 3,
      };
      const fixed = new VectorIndex(misreporting);

      await expect(fixed.add(CHUNKS)).rejects.toMatchObject({ code: ErrorCode.INDEX_DIMENSION_MISMATCH });
      expect(fixed.size).toBe(0);
    });

    it('rejects an embedder that returns the wrong number of vectors', async () => {
      const shortEmbedder: Embedder = {
        model: 'short',
        embed: async () => [1],
        embedBatch: async () => [[1]],
        dimension: async () => 1,
      };

      await expect(new VectorIndex(shortEmbedder).add(CHUNKS)).rejects.toMatchObject({
        code: ErrorCode.INDEX_EMBEDDING_COUNT_MISMATCH,
      });
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await index.add(CHUNKS);
    });

    it('ranks by cosine similarity', async () => {
      const results = await index.search('domain suspended', 3, 0);

      expect(results.map((r) => r.chunk.source)).toEqual(['s.md: Suspension', 'd.md: DNS', 'b.md: Refunds']);
      expect(results[0].score).toBeCloseTo(1, 5);
      expect(results[1].score).toBeCloseTo(0.5, 5);
      expect(results[2].score).toBe(0);
    });

    it('finds a chunk by its own content above every unrelated chunk', async () => {
      const results = await index.search('billing refund', 3, 0);

      expect(results[0].chunk.source).toBe('b.md: Refunds');
      expect(results[0].score).toBeGreaterThanOrEqual(results[1].score);
    });

    it('limits results to k', async () => {
      const results = await index.search('domain suspended', 1, 0);

      expect(results.map((r) => r.chunk.source)).toEqual(['s.md: Suspension']);
    });

    it('returns nothing for k <= 0', async () => {
      expect(await index.search('domain', 0, 0)).toEqual([]);
    });

    it('never returns more results when the threshold rises', async () => {
      const counts: number[] = [];
      for (const threshold of [0, 0.4, 0.6, 1.01]) {
        counts.push((await index.search('domain suspended', 3, threshold)).length);
      }

      expect(counts).toEqual([3, 2, 1, 0]);
    });

    it('breaks score ties by insertion order', async () => {
      const tied = new VectorIndex(embedder);
      await tied.add([chunk('first', 'billing refund', 'x.md'), chunk('second', 'billing refund', 'y.md')]);

      const results = await tied.search('refund billing', 2, 0);

      expect(results.map((r) => r.chunk.source)).toEqual(['first', 'second']);
    });

    it('returns nothing from an empty index without embedding the query', async () => {
      const empty = new VectorIndex(embedder);
      const before = embedder.calls.embed;

      expect(await empty.search('domain', 5, 0)).toEqual([]);
      expect(embedder.calls.embed).toBe(before);
    });
  });

  describe('persist / load', () => {
    it('round-trips size, chunks and scores', async () => {
      const indexPath = path.join(tmpDir, 'nested', 'index');
      await index.add(CHUNKS);
      await index.persist(indexPath);

      const restored = new VectorIndex(embedder);
      expect(await restored.load(indexPath)).toBe(true);

      expect(restored.size).toBe(3);
      expect(restored.dimension).toBe(5);
      expect(restored.model).toBe('vocabulary-test');
      expect(restored.chunks()).toEqual(CHUNKS);

      const summarize = (results: Awaited<ReturnType<VectorIndex['search']>>) =>
        results.map((r) => [r.chunk.source, r.score]);
      expect(summarize(await restored.search('dns domain', 3, 0))).toEqual(
        summarize(await index.search('dns domain', 3, 0))
      );
    });

    it('writes both halves of the pair', async () => {
      const indexPath = path.join(tmpDir, 'index');
      await index.add(CHUNKS);
      await index.persist(indexPath);

      const vectors = await fs.readFile(vectorsFilePath(indexPath));
      expect(vectors.byteLength).toBe(16 + 3 * 5 * 4);
      await expect(fs.access(chunksFilePath(indexPath))).resolves.toBeUndefined();
    });

    it('reports a missing index as false', async () => {
      expect(await index.load(path.join(tmpDir, 'absent'))).toBe(false);
    });

    it('reports false when one half is missing, leaving the index untouched', async () => {
      const indexPath = path.join(tmpDir, 'index');
      await index.add(CHUNKS);
      await index.persist(indexPath);
      await fs.rm(vectorsFilePath(indexPath));

      const other = new VectorIndex(embedder);
      await other.add([CHUNKS[0]]);

      expect(await other.load(indexPath)).toBe(false);
      expect(other.size).toBe(1);
    });

    it('reports false for an unparseable chunk file', async () => {
      const indexPath = path.join(tmpDir, 'index');
      await index.add(CHUNKS);
      await index.persist(indexPath);
      await fs.writeFile(chunksFilePath(indexPath), '{ not json');

      expect(await new VectorIndex(embedder).load(indexPath)).toBe(false);
    });

    it('reports false when the vector file is truncated', async () => {
      const indexPath = path.join(tmpDir, 'index');
      await index.add(CHUNKS);
      await index.persist(indexPath);
      await fs.writeFile(vectorsFilePath(indexPath), Buffer.alloc(8));

      expect(await new VectorIndex(embedder).load(indexPath)).toBe(false);
    });

    it('reports false for a pair left mixed by an interrupted persist', async () => {
      const indexPath = path.join(tmpDir, 'index');
      await index.add(CHUNKS);
      await index.persist(indexPath);

      const replacement = new VectorIndex(embedder);
      await replacement.add([
        chunk('r1', 'billing refund', 'r.md'),
        chunk('r2', 'domain suspended', 'r.md'),
        chunk('r3', 'dns', 'r.md'),
      ]);
      const rename = fs.rename.bind(fs);
      vi.spyOn(fs, 'rename')
        .mockImplementationOnce(rename)
        .mockRejectedValueOnce(new Error('disk full'));

      await expect(replacement.persist(indexPath)).rejects.toMatchObject({
        code: ErrorCode.INDEX_PERSIST_FAILED,
      });
      expect((await fs.readFile(vectorsFilePath(indexPath))).byteLength).toBe(16 + 3 * 5 * 4);

      const reloaded = new VectorIndex(embedder);
      expect(await reloaded.load(indexPath)).toBe(false);
      expect(reloaded.size).toBe(0);
    });

    it('fails loudly when the index cannot be written', async () => {
      const blocker = path.join(tmpDir, 'blocker');
      await fs.writeFile(blocker, 'a file, not a directory');
      await index.add(CHUNKS);

      await expect(index.persist(path.join(blocker, 'sub', 'index'))).rejects.toMatchObject({
        code: ErrorCode.INDEX_PERSIST_FAILED,
      });
    });
  });
});
