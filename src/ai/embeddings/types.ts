/**
 * Support Knowledge Assistant - Embedder
 * ======================================
 * Capability interface for anything that maps text to fixed-dimension vectors.
 */

export interface Embedder {
  /** Identifies the model; persisted with an index to detect stale data */
  readonly model: string;

  embed(text: string): Promise<number[]>;

  /** One vector per input, in input order */
  embedBatch(texts: string[]): Promise<number[][]>;

  /** Output dimension, discovered once and cached */
  dimension(): Promise<number>;
}
