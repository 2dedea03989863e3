/**
 * Centralized error handling - Support Knowledge Assistant
 * Typed errors with standardized codes for API consumers
 */

export enum ErrorCode {
  // Configuration
  CONFIG_INVALID_ENV = 'CONFIG_INVALID_ENV',
  CONFIG_DOCS_PATH_MISSING = 'CONFIG_DOCS_PATH_MISSING',
  CONFIG_NO_DOCUMENTS = 'CONFIG_NO_DOCUMENTS',
  CONFIG_PROVIDER_MISSING = 'CONFIG_PROVIDER_MISSING',

  // Vector index
  INDEX_DIMENSION_MISMATCH = 'INDEX_DIMENSION_MISMATCH',
  INDEX_EMBEDDING_COUNT_MISMATCH = 'INDEX_EMBEDDING_COUNT_MISMATCH',
  INDEX_PERSIST_FAILED = 'INDEX_PERSIST_FAILED',

  // Requests
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

  // System
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  userMessage: string; // Safe to show to API consumers
  statusCode: number;
  retryable: boolean;
  context?: Record<string, unknown>;
}

export class AssistantError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly userMessage: string;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(details: ErrorDetails) {
    super(details.message);
    this.name = 'AssistantError';
    this.code = details.code;
    this.statusCode = details.statusCode;
    this.userMessage = details.userMessage;
    this.retryable = details.retryable;
    this.context = details.context;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      statusCode: this.statusCode,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

/**
 * Fatal configuration problem: surfaced immediately, never retried
 */
export class ConfigurationError extends AssistantError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    code: ErrorCode = ErrorCode.CONFIG_INVALID_ENV
  ) {
    super({
      code,
      message,
      userMessage: 'The knowledge assistant is misconfigured',
      statusCode: 500,
      retryable: false,
      context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Broken index invariant (vector dimension, chunk/vector count)
 */
export class IndexConsistencyError extends AssistantError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super({
      code,
      message,
      userMessage: 'The knowledge base is in an inconsistent state',
      statusCode: 500,
      retryable: false,
      context,
    });
    this.name = 'IndexConsistencyError';
  }
}

// Factory for typed errors
export const createError = {
  config: {
    docsPathMissing: (docsPath: string) =>
      new ConfigurationError(
        `Documents path does not exist: ${docsPath}`,
        { docsPath },
        ErrorCode.CONFIG_DOCS_PATH_MISSING
      ),

    noDocuments: (docsPath: string) =>
      new ConfigurationError(
        `No documents found to build vector store in ${docsPath}`,
        { docsPath },
        ErrorCode.CONFIG_NO_DOCUMENTS
      ),

    providerMissing: (variable: string) =>
      new ConfigurationError(
        `${variable} is required to start the knowledge assistant`,
        { variable },
        ErrorCode.CONFIG_PROVIDER_MISSING
      ),
  },

  index: {
    dimensionMismatch: (expected: number, actual: number) =>
      new IndexConsistencyError(
        ErrorCode.INDEX_DIMENSION_MISMATCH,
        `Embedding dimension mismatch: index uses ${expected}, got ${actual}`,
        { expected, actual }
      ),

    embeddingCountMismatch: (chunks: number, vectors: number) =>
      new IndexConsistencyError(
        ErrorCode.INDEX_EMBEDDING_COUNT_MISMATCH,
        `Embedder returned ${vectors} vectors for ${chunks} chunks`,
        { chunks, vectors }
      ),

    persistFailed: (indexPath: string, cause: unknown) =>
      new AssistantError({
        code: ErrorCode.INDEX_PERSIST_FAILED,
        message: `Failed to persist vector index to ${indexPath}: ${
          cause instanceof Error ? cause.message : String(cause)
        }`,
        userMessage: 'The knowledge base could not be saved',
        statusCode: 500,
        retryable: false,
        context: { indexPath },
      }),
  },

  request: {
    validation: (issues: string[]) =>
      new AssistantError({
        code: ErrorCode.VALIDATION_ERROR,
        message: `Invalid request: ${issues.join('; ')}`,
        userMessage: 'The request body is invalid',
        statusCode: 400,
        retryable: false,
        context: { issues },
      }),
  },

  system: {
    rateLimited: (retryAfterSeconds: number) =>
      new AssistantError({
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: `Rate limit exceeded, retry in ${retryAfterSeconds}s`,
        userMessage: 'Too many requests. Please try again later.',
        statusCode: 429,
        retryable: true,
        context: { retryAfter: retryAfterSeconds },
      }),

    internalServerError: (context?: Record<string, unknown>) =>
      new AssistantError({
        code: ErrorCode.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
        userMessage: 'An unexpected error occurred',
        statusCode: 500,
        retryable: true,
        context,
      }),
  },
};
