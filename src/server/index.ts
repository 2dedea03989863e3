/**
 * HTTP Server - Support Knowledge Assistant
 * Express app factory; listening is left to the bootstrap
 */

import cors from 'cors';
import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import type { KnowledgeAssistant } from '../ai/knowledgeAssistant';
import { createSupportRouter } from '../routes/support.routes';
import { errorHandler } from '../middleware/errorHandler';
import { httpLogger } from '../utils/logger';

export interface AppOptions {
  resolveRateLimitPoints: number;
}

export function createApp(assistant: KnowledgeAssistant, options: AppOptions): Express {
  const app = express();

  // Base middlewares
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    httpLogger.debug({ method: req.method, path: req.path }, `${req.method} ${req.path}`);
    next();
  });

  app.use(createSupportRouter(assistant, options));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });

  app.use(errorHandler);

  return app;
}
