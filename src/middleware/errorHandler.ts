/**
 * Error middleware - Support Knowledge Assistant
 * Maps thrown errors to JSON responses
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AssistantError, ErrorCode, createError } from '../lib/errors';
import { logError } from '../utils/logger';

/**
 * Forward rejections of an async route handler to the error middleware
 */
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument functions as error middleware
  _next: NextFunction
): void => {
  const err = error instanceof Error ? error : new Error(String(error));
  const correlationId = logError({
    error: err,
    context: 'http',
    metadata: { method: req.method, path: req.path },
  });

  // Malformed JSON from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'The request body is not valid JSON',
        correlationId,
      },
    });
    return;
  }

  const appError =
    err instanceof AssistantError ? err : createError.system.internalServerError({ name: err.name });

  res.status(appError.statusCode).json({
    error: {
      code: appError.code,
      message: appError.userMessage,
      correlationId,
      ...(appError.code === ErrorCode.VALIDATION_ERROR && { details: appError.context?.issues }),
    },
  });
};
