/**
 * Support Knowledge Assistant - OpenAI Client
 * ===========================================
 * OpenAI API implementation of LLMClient.
 */

import { z } from 'zod';
import { LLMClient } from '../LLMClient';
import type { SleepFn } from '../RetryPolicy';
import type {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMEmbeddingRequest,
  LLMEmbeddingResponse,
  LLMProviderConfig,
  LLMProvider,
} from '../types';
import {
  LLMError,
  LLMRateLimitError,
  LLMTimeoutError,
  LLMAuthError,
  estimateCost,
} from '../types';
import { llmLogger } from '../../../utils/logger';

const OPENAI_API_URL = 'https://api.openai.com/v1';
const DEFAULT_TIMEOUT_MS = 30000;

// Only the fields we read from the wire
const usageSchema = z
  .object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  })
  .optional();

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .default([]),
  usage: usageSchema,
});

const embeddingSchema = z.object({
  model: z.string().optional(),
  data: z.array(z.object({ index: z.number(), embedding: z.array(z.number()) })),
  usage: usageSchema,
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string().optional() }).optional(),
});

export class OpenAIClient extends LLMClient {
  private apiKey: string;
  private baseUrl: string;

  constructor(config?: Partial<LLMProviderConfig>, sleep?: SleepFn) {
    const apiKey = config?.apiKey ?? '';

    super(
      {
        provider: 'openai',
        apiKey,
        baseUrl: config?.baseUrl || OPENAI_API_URL,
        defaultModel: config?.defaultModel || 'gpt-4o-mini',
        defaultEmbeddingModel: config?.defaultEmbeddingModel || 'text-embedding-3-small',
        maxRetries: config?.maxRetries || 3,
        timeoutMs: config?.timeoutMs || DEFAULT_TIMEOUT_MS,
      },
      sleep
    );

    this.apiKey = apiKey;
    this.baseUrl = (config?.baseUrl || OPENAI_API_URL).replace(/\/+$/, '');
  }

  get provider(): LLMProvider {
    return 'openai';
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    if (!this.isConfigured()) {
      throw new LLMAuthError('openai');
    }

    const model = request.model || this.getDefaultModel();
    const startTime = Date.now();

    const body = {
      model,
      messages: request.messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      temperature: request.temperature ?? 0.7,
      max_tokens: request.maxTokens ?? 1024,
      stream: false,
      ...(request.responseFormat && { response_format: { type: request.responseFormat } }),
    };

    const payload = await this.post(
      '/chat/completions',
      body,
      request.timeoutMs ?? this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      request.signal
    );
    const data = chatCompletionSchema.parse(payload);
    const latencyMs = Date.now() - startTime;

    const usage = {
      promptTokens: data.usage?.prompt_tokens ?? 0,
      completionTokens: data.usage?.completion_tokens ?? 0,
      totalTokens: data.usage?.total_tokens ?? 0,
    };

    const cost = estimateCost(model, usage.promptTokens, usage.completionTokens);

    llmLogger.info(
      { model, totalTokens: usage.totalTokens, latencyMs, costUsd: cost.totalCost },
      `[OpenAI] Completed ${model}: ${usage.totalTokens} tokens, ${latencyMs}ms, $${cost.totalCost.toFixed(6)}`
    );

    const choice = data.choices[0];
    return {
      content: choice?.message?.content ?? '',
      model: data.model || model,
      usage,
    };
  }

  async embed(request: LLMEmbeddingRequest): Promise<LLMEmbeddingResponse> {
    if (!this.isConfigured()) {
      throw new LLMAuthError('openai');
    }

    const model = request.model || this.getDefaultEmbeddingModel();
    const inputs = Array.isArray(request.input) ? request.input : [request.input];

    return this.withRetry(async () => {
      const payload = await this.post(
        '/embeddings',
        { model, input: inputs },
        this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS
      );
      const data = embeddingSchema.parse(payload);

      const embeddings = [...data.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      llmLogger.debug({ model, count: inputs.length }, `[OpenAI] Embedded ${inputs.length} text(s) with ${model}`);

      return {
        embeddings,
        model: data.model || model,
        usage: {
          promptTokens: data.usage?.prompt_tokens ?? 0,
          totalTokens: data.usage?.total_tokens ?? 0,
        },
      };
    });
  }

  /**
   * One POST with its own timeout, linked to the caller's signal when given
   */
  private async post(
    path: string,
    body: unknown,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onCallerAbort = () => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        await this.handleErrorResponse(response);
      }

      return await response.json();
    } catch (err) {
      if (controller.signal.aborted && !(err instanceof LLMError)) {
        throw new LLMTimeoutError('openai');
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const status = response.status;
    let errorMessage = `OpenAI API error: ${status}`;

    try {
      const parsed = errorBodySchema.safeParse(await response.json());
      if (parsed.success && parsed.data.error?.message) {
        errorMessage = parsed.data.error.message;
      }
    } catch {
      // Body is not JSON, keep the status-based message
    }

    if (status === 401) {
      throw new LLMAuthError('openai');
    }

    if (status === 429) {
      const retryAfter = response.headers.get('retry-after');
      throw new LLMRateLimitError(
        'openai',
        retryAfter ? parseInt(retryAfter, 10) * 1000 : undefined
      );
    }

    if (status >= 500) {
      throw new LLMError(errorMessage, 'openai', status, true);
    }

    throw new LLMError(errorMessage, 'openai', status, false);
  }
}
