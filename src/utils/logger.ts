/**
 * Logger - Support Knowledge Assistant
 * Pino configuration with secret redaction
 */

import pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../env';

/**
 * Keys masked wherever they appear in a log payload
 */
const SENSITIVE_KEYS = [
  'apiKey',
  'api_key',
  'authorization',
  'Authorization',
  'OPENAI_API_KEY',
  'token',
  'secret',
];

const loggerConfig: pino.LoggerOptions = {
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,

  // Development: pretty output
  ...(env.NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname',
        messageFormat: '{context} - {msg}',
        singleLine: false,
        levelFirst: true,
      },
    },
  }),

  // Production: structured JSON for log tooling
  ...(env.NODE_ENV === 'production' && {
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
      bindings: (bindings: pino.Bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        environment: env.NODE_ENV,
        service: 'support-knowledge-assistant',
      }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: 'message',
  }),

  redact: {
    paths: SENSITIVE_KEYS.flatMap((key) => [key, `*.${key}`, `headers.${key}`]),
    remove: false,
    censor: '***REDACTED***',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

/**
 * Root logger
 */
export const logger = pino(loggerConfig);

/**
 * Child logger bound to a context and an optional correlation id
 */
export const createContextLogger = (context: string, correlationId?: string) => {
  return logger.child({
    context,
    ...(correlationId && { correlationId }),
  });
};

/**
 * Context loggers
 */
export const appLogger = createContextLogger('app');
export const httpLogger = createContextLogger('http');
export const ragLogger = createContextLogger('rag');
export const llmLogger = createContextLogger('llm');
export const rateLimitLogger = createContextLogger('rate-limit');

interface LogErrorOptions {
  error: Error;
  correlationId?: string;
  context?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Log an error with a correlation id so the HTTP response can point at it
 */
export const logError = ({
  error,
  correlationId = uuidv4(),
  context = 'app',
  metadata = {},
}: LogErrorOptions): string => {
  const contextLogger = createContextLogger(context, correlationId);

  contextLogger.error(
    {
      err: error,
      correlationId,
      metadata,
    },
    `Error occurred: ${error.message}`
  );

  return correlationId;
};

/**
 * Measure how long an operation takes
 */
export const createPerformanceLogger = (operation: string, correlationId?: string) => {
  const startTime = process.hrtime.bigint();
  const perfLogger = createContextLogger('performance', correlationId);

  return {
    finish: (metadata?: Record<string, unknown>) => {
      const endTime = process.hrtime.bigint();
      const duration = Number(endTime - startTime) / 1000000;

      perfLogger.info(
        {
          operation,
          duration: `${duration.toFixed(2)}ms`,
          ...metadata,
        },
        `Operation ${operation} completed in ${duration.toFixed(2)}ms`
      );
    },
  };
};

export default logger;
