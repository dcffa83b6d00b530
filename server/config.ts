// ABOUTME: Loads and validates environment configuration into an explicit AppConfig object.
// ABOUTME: The object is built once by the entry point and handed to every component.
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z
  .object({
    APP_ENV: z.enum(['development', 'release', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL environment variable is not set'),
    REDIS_URL: optionalString,
    AI_HOST: z.string().url(),
    AI_MODEL: z.string().min(1),
    AI_GENERATE_PATH: z.string().startsWith('/').default('/api/generate'),
    OPENAI_API_KEY: z.string().min(1).default('not-needed'),
    EMBEDDING_BASE_URL: optionalString.pipe(z.string().url().optional()),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
    RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
    CHUNK_SIZE: z.coerce.number().int().positive().default(800),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(100),
    EMBEDDING_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(10),
    EMBEDDING_JOB_ATTEMPTS: z.coerce.number().int().positive().default(5),
    EMBEDDING_JOB_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1000),
    SMALL_TALK_SHORT_CIRCUIT: booleanFlag.default('true'),
    ALLOWED_ORIGINS: z.string().default(''),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export interface AppConfig {
  appEnv: 'development' | 'release' | 'test';
  port: number;
  databaseUrl: string;
  redisUrl?: string;
  allowedOrigins: string[];
  generation: {
    host: string;
    path: string;
    model: string;
  };
  embedding: {
    apiKey: string;
    baseUrl?: string;
    model: string;
    dimensions: number;
  };
  retrieval: {
    topK: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  queue: {
    concurrency: number;
    attempts: number;
    backoffMs: number;
  };
  chat: {
    shortCircuitSmallTalk: boolean;
  };
}

/**
 * Parse the environment into an AppConfig.
 * Throws an Error naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    appEnv: e.APP_ENV,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    redisUrl: e.REDIS_URL,
    allowedOrigins: e.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    generation: {
      host: e.AI_HOST.replace(/\/+$/, ''),
      path: e.AI_GENERATE_PATH,
      model: e.AI_MODEL,
    },
    embedding: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.EMBEDDING_BASE_URL,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
    },
    retrieval: { topK: e.RETRIEVAL_TOP_K },
    chunking: { chunkSize: e.CHUNK_SIZE, chunkOverlap: e.CHUNK_OVERLAP },
    queue: {
      concurrency: e.EMBEDDING_WORKER_CONCURRENCY,
      attempts: e.EMBEDDING_JOB_ATTEMPTS,
      backoffMs: e.EMBEDDING_JOB_BACKOFF_MS,
    },
    chat: { shortCircuitSmallTalk: e.SMALL_TALK_SHORT_CIRCUIT },
  };
}
