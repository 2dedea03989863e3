/**
 * Support Knowledge Assistant - Document Processor
 * ================================================
 * Loads markdown documentation and turns it into chunks.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { TextDecoder } from 'util';
import { chunkByLength, splitByHeadings, DEFAULT_OVERLAP } from './chunker';
import type { Chunk } from './types';
import { createError } from '../../lib/errors';
import { ragLogger } from '../../utils/logger';

const MARKDOWN_EXTENSION = '.md';

export interface DocumentProcessorOptions {
  /** Sections longer than this are sub-split; 0 or undefined disables it */
  maxSectionLength?: number;
  overlap?: number;
}

export class DocumentProcessor {
  private readonly maxSectionLength: number;
  private readonly overlap: number;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(
    readonly docsPath: string,
    options: DocumentProcessorOptions = {}
  ) {
    this.maxSectionLength = options.maxSectionLength ?? 0;
    this.overlap = options.overlap ?? DEFAULT_OVERLAP;
  }

  /**
   * Load every markdown file of the documents directory.
   * A file that fails is logged and skipped; the directory itself must exist and hold markdown.
   */
  async loadDocuments(): Promise<Chunk[]> {
    const fileNames = await this.listMarkdownFiles();
    const chunks: Chunk[] = [];

    for (const fileName of fileNames) {
      try {
        const raw = await fs.readFile(path.join(this.docsPath, fileName));
        const fileChunks = this.processDocument(fileName, this.decoder.decode(raw));
        chunks.push(...fileChunks);
      } catch (err) {
        ragLogger.warn(
          { err, file: fileName },
          `[DocumentProcessor] Skipping ${fileName}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }

    ragLogger.info(
      { files: fileNames.length, chunks: chunks.length },
      `[DocumentProcessor] Loaded ${chunks.length} chunks from ${fileNames.length} files`
    );

    return chunks;
  }

  /**
   * Split one document into chunks, one per non-empty section (or per part of a long section)
   */
  processDocument(fileName: string, content: string): Chunk[] {
    const chunks: Chunk[] = [];

    for (const section of splitByHeadings(content)) {
      const body = section.content.trim();
      const source = `${fileName}: ${section.title}`;

      const parts =
        this.maxSectionLength > 0 && body.length > this.maxSectionLength
          ? chunkByLength(body, this.maxSectionLength, this.overlap)
          : [body];

      parts.forEach((part, i) => {
        const metadata: Record<string, string> = {
          file: fileName,
          section: section.title,
          length: String(part.length),
        };
        if (parts.length > 1) {
          metadata.part = String(i + 1);
        }
        chunks.push({ source, content: part, metadata });
      });
    }

    return chunks;
  }

  private async listMarkdownFiles(): Promise<string[]> {
    const stat = await fs.stat(this.docsPath).catch(() => null);
    if (!stat?.isDirectory()) {
      throw createError.config.docsPathMissing(this.docsPath);
    }

    const entries = await fs.readdir(this.docsPath, { withFileTypes: true });
    const fileNames = entries
      .filter((entry) => entry.isFile() || entry.isSymbolicLink())
      .map((entry) => entry.name)
      .filter((name) => path.extname(name).toLowerCase() === MARKDOWN_EXTENSION)
      .sort();

    if (fileNames.length === 0) {
      throw createError.config.noDocuments(this.docsPath);
    }

    return fileNames;
  }
}
