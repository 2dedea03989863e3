/**
 * Support Knowledge Assistant - API Routes
 * ========================================
 * Ticket resolution, knowledge base maintenance and statistics.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { KnowledgeAssistant } from '../ai/knowledgeAssistant';
import { createError } from '../lib/errors';
import { asyncHandler } from '../middleware/errorHandler';
import { createRateLimit } from '../middleware/rateLimiter';
import { httpLogger } from '../utils/logger';

export const API_VERSION = '1.0.0';
export const MAX_TICKET_LENGTH = 10000;

export const resolveTicketSchema = z.object({
  ticket_text: z
    .string({ required_error: 'ticket_text is required' })
    .trim()
    .min(1, 'ticket_text cannot be empty')
    .max(MAX_TICKET_LENGTH, `ticket_text cannot exceed ${MAX_TICKET_LENGTH} characters`),
});

export interface SupportRouterOptions {
  /** Requests per minute per client on /resolve-ticket */
  resolveRateLimitPoints: number;
}

export function createSupportRouter(
  assistant: KnowledgeAssistant,
  options: SupportRouterOptions
): Router {
  const router = Router();
  const resolveRateLimit = createRateLimit({
    name: 'resolve-ticket',
    points: options.resolveRateLimitPoints,
  });

  /**
   * GET /
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Support Knowledge Assistant API',
      version: API_VERSION,
      endpoints: {
        resolve_ticket: 'POST /resolve-ticket',
        rebuild_knowledge_base: 'POST /rebuild-knowledge-base',
        health: 'GET /health',
        stats: 'GET /stats',
      },
    });
  });

  /**
   * POST /resolve-ticket
   * Body: { ticket_text }
   */
  router.post(
    '/resolve-ticket',
    resolveRateLimit,
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = resolveTicketSchema.safeParse(req.body);
      if (!parsed.success) {
        throw createError.request.validation(
          parsed.error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`)
        );
      }

      const ticketText = parsed.data.ticket_text;
      httpLogger.info({ length: ticketText.length }, 'Processing ticket');

      const answer = await assistant.resolve(ticketText);

      res.json({
        answer: answer.answer,
        references: answer.references,
        action_required: answer.action,
      });
    })
  );

  /**
   * POST /rebuild-knowledge-base
   */
  router.post(
    '/rebuild-knowledge-base',
    asyncHandler(async (_req: Request, res: Response) => {
      const result = await assistant.rebuild();

      res.status(result.status === 'success' ? 200 : 500).json({
        status: result.status,
        message: result.message,
        stats: {
          document_count: result.stats.documentCount,
          index_size: result.stats.indexSize,
          embedding_dimension: result.stats.embeddingDimension,
        },
      });
    })
  );

  /**
   * GET /health
   */
  router.get('/health', (_req: Request, res: Response) => {
    const stats = assistant.stats();
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      knowledge_base: {
        index_size: stats.indexSize,
        document_count: stats.documentCount,
      },
    });
  });

  /**
   * GET /stats
   */
  router.get('/stats', (_req: Request, res: Response) => {
    const stats = assistant.stats();
    const system = assistant.getSystemStats();

    res.json({
      document_count: stats.documentCount,
      index_size: stats.indexSize,
      embedding_dimension: stats.embeddingDimension,
      system: {
        status: system.status,
        docs_path: system.knowledgeBase.docsPath,
        embedding_model: system.knowledgeBase.model,
        max_chunks: system.knowledgeBase.maxChunks,
        similarity_threshold: system.knowledgeBase.similarityThreshold,
        generation_model: system.generation.model,
        generation_max_attempts: system.generation.maxAttempts,
        action_cross_check: system.generation.actionCrossCheck,
      },
    });
  });

  return router;
}
