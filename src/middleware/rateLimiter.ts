/**
 * Rate Limiter Middleware - Support Knowledge Assistant
 * Per-client request limits for the expensive endpoints
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { rateLimitLogger } from '../utils/logger';
import { createError } from '../lib/errors';

const DEFAULT_DURATION_S = 60;

export interface RateLimitOptions {
  name: string;
  points: number;
  duration?: number;
  blockDuration?: number;
}

function clientKey(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Wrap a limiter as Express middleware; 429 with Retry-After once the client is over budget
 */
export const createRateLimitMiddleware = (
  limiter: RateLimiterMemory,
  name: string
): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction) => {
    const clientIP = clientKey(req);
    const key = `${name}:${clientIP}`;

    try {
      const result = await limiter.consume(key);

      res.set({
        'X-RateLimit-Limit': limiter.points.toString(),
        'X-RateLimit-Remaining': result.remainingPoints.toString(),
        'X-RateLimit-Reset': new Date(Date.now() + result.msBeforeNext).toISOString(),
      });

      next();
    } catch (rejection) {
      if (!(rejection instanceof RateLimiterRes)) {
        next(rejection);
        return;
      }

      const retryAfterS = Math.max(1, Math.round(rejection.msBeforeNext / 1000));

      rateLimitLogger.warn(
        {
          clientIP,
          route: name,
          path: req.path,
          msBeforeNext: rejection.msBeforeNext,
        },
        'Rate limit exceeded'
      );

      res.set({
        'X-RateLimit-Limit': limiter.points.toString(),
        'X-RateLimit-Remaining': '0',
        'X-RateLimit-Reset': new Date(Date.now() + rejection.msBeforeNext).toISOString(),
        'Retry-After': retryAfterS.toString(),
      });

      const error = createError.system.rateLimited(retryAfterS);
      res.status(error.statusCode).json({
        error: {
          code: error.code,
          message: error.userMessage,
          retryAfter: retryAfterS,
        },
      });
    }
  };
};

export const createRateLimit = (options: RateLimitOptions): RequestHandler => {
  const limiter = new RateLimiterMemory({
    keyPrefix: options.name,
    points: options.points,
    duration: options.duration ?? DEFAULT_DURATION_S,
    blockDuration: options.blockDuration ?? DEFAULT_DURATION_S,
  });

  return createRateLimitMiddleware(limiter, options.name);
};
