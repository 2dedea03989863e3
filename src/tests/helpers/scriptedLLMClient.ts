/**
 * LLMClient whose completions are played back from a script
 */

import { LLMClient } from '@/ai/llm/LLMClient';
import type {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMEmbeddingRequest,
  LLMEmbeddingResponse,
  LLMProvider,
} from '@/ai/llm/types';
import type { VocabularyEmbedder } from './vocabularyEmbedder';

/** Raw completion text, or an error to throw for that call */
export type CompletionStep = string | Error;

export class ScriptedLLMClient extends LLMClient {
  readonly requests: LLMCompletionRequest[] = [];
  private readonly steps: CompletionStep[];

  constructor(
    steps: CompletionStep[] = [],
    private readonly embedder?: VocabularyEmbedder
  ) {
    super({
      provider: 'openai',
      apiKey: 'test-key',
      defaultModel: 'test-chat-model',
      defaultEmbeddingModel: embedder?.model ?? 'vocabulary-test',
    });
    this.steps = [...steps];
  }

  get provider(): LLMProvider {
    return 'openai';
  }

  isConfigured(): boolean {
    return true;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    this.requests.push(request);

    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('No scripted completion left');
    }
    if (step instanceof Error) {
      throw step;
    }

    return {
      content: step,
      model: request.model ?? this.getDefaultModel(),
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    };
  }

  async embed(request: LLMEmbeddingRequest): Promise<LLMEmbeddingResponse> {
    if (!this.embedder) {
      throw new Error('ScriptedLLMClient has no embedder');
    }
    const inputs = Array.isArray(request.input) ? request.input : [request.input];
    return {
      embeddings: await this.embedder.embedBatch(inputs),
      model: this.embedder.model,
      usage: { promptTokens: 0, totalTokens: 0 },
    };
  }
}

export const answerJson = (answer: string, references: string[], action: string): string =>
  JSON.stringify({ answer, references, action_required: action });
