/**
 * Support Knowledge Assistant - Response Generator
 * ================================================
 * Turns a ticket plus retrieved documentation into a StructuredAnswer.
 *
 * generate() never rejects: every failure resolves to a fallback answer that
 * escalates to the technical team and keeps the retrieved references.
 */

import type { LLMClient } from '../llm/LLMClient';
import type { LLMMessage } from '../llm/types';
import { isRateLimitError } from '../llm/types';
import { RetryPolicy } from '../llm/RetryPolicy';
import type { SleepFn } from '../llm/RetryPolicy';
import { SUPPORT_SYSTEM_PROMPT, buildTicketPrompt } from './prompts';
import { classifyAction } from './actionRules';
import { generationOutputSchema } from './types';
import type { StructuredAnswer, SupportAction } from './types';
import { llmLogger } from '../../utils/logger';

// ============================================
// CONFIGURATION
// ============================================

export const GENERATION_TEMPERATURE = 0.1;
export const GENERATION_MAX_TOKENS = 1000;
export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_BASE_DELAY_MS = 1000;

export const FALLBACK_ACTION: SupportAction = 'escalate_to_technical_team';

export const FALLBACK_MESSAGES = {
  invalidResponse:
    'I apologize, but I encountered an error processing your request. Please contact our support team directly for assistance.',
  rateLimited:
    "I'm currently experiencing high demand. Please try again in a few moments or contact our support team directly.",
  unavailable:
    "I'm experiencing technical difficulties. Please try again or contact our support team for immediate assistance.",
} as const;

export type FallbackReason = keyof typeof FALLBACK_MESSAGES;

export interface ResponseGeneratorOptions {
  client: LLMClient;
  model?: string;
  maxAttempts?: number;
  baseDelayMs?: number;
  /** Per-call timeout handed to the provider */
  timeoutMs?: number;
  sleep?: SleepFn;
  /** Compare the model's action with the keyword rules and log disagreements */
  actionCrossCheck?: boolean;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

type ParseResult =
  | { ok: true; answer: StructuredAnswer }
  | { ok: false; reason: string };

// ============================================
// RESPONSE PARSING
// ============================================

/**
 * Validate raw model output against the answer schema
 */
export function parseStructuredAnswer(raw: string): ParseResult {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: `not JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = generationOutputSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      reason: parsed.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`).join('; '),
    };
  }

  return {
    ok: true,
    answer: {
      answer: parsed.data.answer,
      references: parsed.data.references,
      action: parsed.data.action_required,
    },
  };
}

export function fallbackAnswer(reason: FallbackReason, references: string[]): StructuredAnswer {
  return {
    answer: FALLBACK_MESSAGES[reason],
    references: [...references],
    action: FALLBACK_ACTION,
  };
}

// ============================================
// GENERATOR
// ============================================

export class ResponseGenerator {
  readonly model: string;
  private readonly client: LLMClient;
  private readonly timeoutMs?: number;
  private readonly actionCrossCheck: boolean;
  private readonly retryPolicy: RetryPolicy;

  constructor(options: ResponseGeneratorOptions) {
    this.client = options.client;
    this.model = options.model || options.client.getDefaultModel();
    this.timeoutMs = options.timeoutMs;
    this.actionCrossCheck = options.actionCrossCheck ?? false;

    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.retryPolicy = new RetryPolicy({
      maxAttempts,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
      isRetryable: isRateLimitError,
      sleep: options.sleep,
      onTransition: (event) => {
        if (event.state === 'retry_wait') {
          llmLogger.warn(
            { attempt: event.attempt + 1, maxAttempts, delayMs: event.delayMs },
            `Rate limit hit, retrying in ${event.delayMs}ms (attempt ${event.attempt + 1}/${maxAttempts})`
          );
        }
      },
    });
  }

  get maxAttempts(): number {
    return this.retryPolicy.maxAttempts;
  }

  get crossCheckEnabled(): boolean {
    return this.actionCrossCheck;
  }

  buildMessages(query: string, context: string, references: string[]): LLMMessage[] {
    return [
      { role: 'system', content: SUPPORT_SYSTEM_PROMPT },
      { role: 'user', content: buildTicketPrompt(query, context, references) },
    ];
  }

  async generate(
    query: string,
    context: string,
    references: string[],
    options: GenerateOptions = {}
  ): Promise<StructuredAnswer> {
    const messages = this.buildMessages(query, context, references);

    let content: string;
    try {
      const response = await this.retryPolicy.execute(
        () =>
          this.client.complete({
            messages,
            model: this.model,
            temperature: GENERATION_TEMPERATURE,
            maxTokens: GENERATION_MAX_TOKENS,
            responseFormat: 'json_object',
            timeoutMs: this.timeoutMs,
            signal: options.signal,
          }),
        options.signal
      );
      content = response.content;
    } catch (err) {
      if (isRateLimitError(err)) {
        llmLogger.error({ err }, 'Rate limit exceeded after all retry attempts');
        return fallbackAnswer('rateLimited', references);
      }
      llmLogger.error({ err }, `Error generating response: ${err instanceof Error ? err.message : String(err)}`);
      return fallbackAnswer('unavailable', references);
    }

    const parsed = parseStructuredAnswer(content);
    if (!parsed.ok) {
      llmLogger.warn({ reason: parsed.reason }, `Invalid response from generation service: ${parsed.reason}`);
      return fallbackAnswer('invalidResponse', references);
    }

    if (this.actionCrossCheck) {
      this.crossCheckAction(query, parsed.answer.action);
    }

    return parsed.answer;
  }

  private crossCheckAction(query: string, action: SupportAction): void {
    const expected = classifyAction(query);
    if (expected !== action) {
      llmLogger.info(
        { modelAction: action, ruleAction: expected },
        `Action cross-check disagreement: model chose ${action}, rules suggest ${expected}`
      );
    }
  }
}
