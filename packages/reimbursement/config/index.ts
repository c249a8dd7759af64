// Environment-driven configuration, read once into a typed AppConfig

import { z } from 'zod';

const HOUR_MS = 60 * 60 * 1000;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  VECTOR_DB_PATH: z.string().min(1).default('./vector_db'),
  SNAPSHOT_INTERVAL_MS: z.coerce.number().int().nonnegative().default(30_000),
  PERSIST_ON_WRITE: booleanFlag.default('true'),
  EMBEDDING_BACKEND: z.enum(['hashing', 'openai']).default('hashing'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(384),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  SESSION_TTL_HOURS: z.coerce.number().positive().default(24),
  SESSION_MAX_TURNS: z.coerce.number().int().positive().default(10),
  CHAT_HISTORY_TURNS: z.coerce.number().int().nonnegative().default(3),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  SESSION_EVICTION_INTERVAL_MS: z.coerce.number().int().nonnegative().default(300_000),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  RETRIEVAL_MAX_K: z.coerce.number().int().positive().default(50),
  ANALYSIS_CONCURRENCY: z.coerce.number().int().positive().default(3),
});

export type EmbeddingBackend = 'hashing' | 'openai';

export interface AppConfig {
  vectorDbPath: string;
  /** 0 disables the scheduled snapshot */
  snapshotIntervalMs: number;
  persistOnWrite: boolean;
  embedding: {
    backend: EmbeddingBackend;
    /** Used by the openai backend; the hashing model name is derived from the dimension. */
    model: string;
    dimension: number;
    apiKey?: string;
  };
  llm: {
    apiKey?: string;
    model: string;
    maxTokens: number;
    timeoutMs: number;
  };
  conversation: {
    ttlMs: number;
    maxTurns: number;
    historyTurns: number;
    maxSessions: number;
    /** 0 disables scheduled eviction */
    evictionIntervalMs: number;
  };
  retrieval: {
    topK: number;
    maxK: number;
  };
  analysisConcurrency: number;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: readonly string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build configuration from environment variables.
 * Empty strings count as unset.
 *
 * @throws ConfigError naming every invalid variable
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  if (e.RETRIEVAL_TOP_K > e.RETRIEVAL_MAX_K) {
    const issue = 'RETRIEVAL_TOP_K: must not exceed RETRIEVAL_MAX_K';
    throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
  }
  if (e.EMBEDDING_BACKEND === 'openai' && !e.OPENAI_API_KEY) {
    const issue = 'OPENAI_API_KEY: required when EMBEDDING_BACKEND is openai';
    throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
  }

  return {
    vectorDbPath: e.VECTOR_DB_PATH,
    snapshotIntervalMs: e.SNAPSHOT_INTERVAL_MS,
    persistOnWrite: e.PERSIST_ON_WRITE,
    embedding: {
      backend: e.EMBEDDING_BACKEND,
      model: e.EMBEDDING_MODEL,
      dimension: e.EMBEDDING_DIMENSION,
      apiKey: e.OPENAI_API_KEY,
    },
    llm: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.LLM_MODEL,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    conversation: {
      ttlMs: e.SESSION_TTL_HOURS * HOUR_MS,
      maxTurns: e.SESSION_MAX_TURNS,
      historyTurns: e.CHAT_HISTORY_TURNS,
      maxSessions: e.MAX_SESSIONS,
      evictionIntervalMs: e.SESSION_EVICTION_INTERVAL_MS,
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      maxK: e.RETRIEVAL_MAX_K,
    },
    analysisConcurrency: e.ANALYSIS_CONCURRENCY,
  };
}

export { createEmbeddingProvider } from './embedding.js';
