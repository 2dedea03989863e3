export type { Embedder } from './types';
export { OpenAIEmbedder } from './OpenAIEmbedder';
export type { OpenAIEmbedderOptions } from './OpenAIEmbedder';
