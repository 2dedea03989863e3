import { z } from 'zod';

/**
 * Centralized environment variable validation using Zod
 * This ensures type safety and runtime validation of all env vars
 */

// Load environment variables
import dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from './lib/errors';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((val) => val === 'true' || val === '1');

/**
 * Define the schema for environment variables
 * Everything has a default except the provider key, which the bootstrap checks
 */
const envSchema = z.object({
  // Node environment
  NODE_ENV: z
    .enum(['development', 'test', 'production'], {
      errorMap: () => ({
        message: 'NODE_ENV must be either development, test, or production',
      }),
    })
    .default('development'),

  // HTTP server
  PORT: z.coerce.number().int().positive().max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Generation + embedding provider
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY cannot be empty').optional(),
  OPENAI_BASE_URL: z
    .string()
    .url({ message: 'OPENAI_BASE_URL must be a valid URL' })
    .default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(64),

  // Knowledge base
  DOCS_PATH: z.string().min(1).default('./data/docs'),
  VECTOR_DB_PATH: z.string().min(1).default('./data/vector_db/index'),

  // Retrieval
  MAX_RELEVANT_CHUNKS: z.coerce.number().int().positive().default(5),
  SIMILARITY_THRESHOLD: z.coerce
    .number()
    .min(0, 'SIMILARITY_THRESHOLD must be between 0 and 1')
    .max(1, 'SIMILARITY_THRESHOLD must be between 0 and 1')
    .default(0.7),
  CHUNK_MAX_LENGTH: z.coerce.number().int().nonnegative().default(0),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),

  // Generation call policy
  GENERATION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  GENERATION_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  ACTION_CROSS_CHECK: booleanFlag.default('false'),

  // HTTP rate limiting (requests per minute per client on /resolve-ticket)
  RESOLVE_RATE_LIMIT_POINTS: z.coerce.number().int().positive().default(30),
});

/**
 * Type inference for the validated environment
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment source without side effects
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.errors.map(
      (err) => `${err.path.join('.')}: ${err.message}`
    );
    throw new ConfigurationError('Environment validation failed', { problems });
  }
  return result.data;
}

/**
 * Validate process.env once, exiting the process when it is unusable
 */
function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const problems = error.context?.problems;
      console.error('❌ Environment validation failed:\n');
      if (Array.isArray(problems)) {
        console.error(problems.map((p) => `  - ${String(p)}`).join('\n'));
      }
      console.error('\n📝 Please check your .env file. See .env.example for reference.\n');
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Validated environment variables
 * Use this throughout the application instead of process.env
 * @example
 * import { env } from './env';
 *
 * const threshold = env.SIMILARITY_THRESHOLD; // number
 * const apiKey = env.OPENAI_API_KEY; // string | undefined
 */
export const env = validateEnv();
