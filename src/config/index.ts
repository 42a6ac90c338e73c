import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';

const boundedInt = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  LLM_TIMEOUT_MS: boundedInt(100, 600_000).default(60_000),
  LLM_MAX_ATTEMPTS: boundedInt(1, 10).default(3),
  LLM_BACKOFF_MS: boundedInt(0, 60_000).default(500),
  LLM_BACKOFF_FACTOR: z.coerce.number().min(1).max(10).default(2),
  LLM_MAX_BACKOFF_MS: boundedInt(0, 300_000).default(8_000),
  REFLECTION_CONCURRENCY: boundedInt(1, 5).default(3),
  REFLECTION_FAILURE_POLICY: z.enum(['abort', 'placeholder']).default('abort'),
  RAG_STORE: z.enum(['sqlite', 'memory']).default('sqlite'),
  RAG_DB_PATH: z.string().min(1).default(path.resolve(process.cwd(), 'data', 'archive.db')),
  RAG_EMBEDDINGS: z.enum(['openai', 'local']).optional(),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  RAG_EMBED_DIM: boundedInt(16, 4096).default(512),
  PORT: boundedInt(1, 65_535).default(4010),
  RATE_LIMIT_RPM: boundedInt(1, 10_000).default(30),
});

export type FailurePolicy = 'abort' | 'placeholder';

export interface GenerationConfig {
  apiKey: string | null;
  model: string;
  baseUrl: string | null;
  temperature: number;
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
  backoffFactor: number;
  maxBackoffMs: number;
}

export interface ArchiveConfig {
  store: 'sqlite' | 'memory';
  dbPath: string;
  embeddings: 'openai' | 'local';
  embeddingModel: string;
  embedDim: number;
}

export interface AppConfig {
  generation: GenerationConfig;
  reflection: { concurrency: number; failurePolicy: FailurePolicy };
  archive: ArchiveConfig;
  http: { port: number; rateLimitRpm: number };
}

/**
 * Parse and validate the process environment once at startup.
 * Every invalid key is reported together.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank values in .env files mean "unset"
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  const apiKey = e.OPENAI_API_KEY || null;
  return {
    generation: {
      apiKey,
      model: e.OPENAI_MODEL,
      baseUrl: e.OPENAI_BASE_URL ?? null,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxAttempts: e.LLM_MAX_ATTEMPTS,
      backoffMs: e.LLM_BACKOFF_MS,
      backoffFactor: e.LLM_BACKOFF_FACTOR,
      maxBackoffMs: e.LLM_MAX_BACKOFF_MS,
    },
    reflection: {
      concurrency: e.REFLECTION_CONCURRENCY,
      failurePolicy: e.REFLECTION_FAILURE_POLICY,
    },
    archive: {
      store: e.RAG_STORE,
      dbPath: e.RAG_DB_PATH,
      // Prefer remote embeddings whenever a key exists, unless pinned to local
      embeddings: e.RAG_EMBEDDINGS ?? (apiKey ? 'openai' : 'local'),
      embeddingModel: e.OPENAI_EMBEDDING_MODEL,
      embedDim: e.RAG_EMBED_DIM,
    },
    http: { port: e.PORT, rateLimitRpm: e.RATE_LIMIT_RPM },
  };
}

/** Fail fast before any stage runs when the generation backend cannot be reached. */
export function assertGenerationReady(config: AppConfig): asserts config is AppConfig & { generation: { apiKey: string } } {
  const issues: string[] = [];
  if (!config.generation.apiKey) issues.push('OPENAI_API_KEY: required for analysis generation');
  if (config.archive.embeddings === 'openai' && !config.generation.apiKey) {
    issues.push('RAG_EMBEDDINGS: openai embeddings need OPENAI_API_KEY');
  }
  if (issues.length) throw new ConfigError(issues);
}
