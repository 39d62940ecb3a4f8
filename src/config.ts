import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_TOP_K = 5;
export const DEFAULT_SCORE_THRESHOLD = 0.3;
export const DEFAULT_DIMENSION = 384;

const DEFAULT_MODELS = {
  hashing: 'feature-hash-v1',
  openai: 'text-embedding-3-small',
} as const;

// unset and empty variables are the same thing
const blankAsUnset = (v: unknown) => (v === '' ? undefined : v);
const optionalString = z.preprocess(blankAsUnset, z.string().trim().min(1).optional());

const Env = z.object({
  LOGS_PATH: z.string().default('target/analytics-logs/test-events.jsonl'),
  EMBEDDING_PROVIDER: z.enum(['hashing', 'openai']).default('hashing'),
  EMBEDDING_MODEL: optionalString,
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(DEFAULT_DIMENSION),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(32),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
  INDEX_BACKEND: z.enum(['memory', 'qdrant']).default('memory'),
  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_COLLECTION: z.string().min(1).default('test_failures'),
  QDRANT_API_KEY: optionalString,
  QDRANT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TOP_K_RESULTS: z.coerce.number().int().positive().default(DEFAULT_TOP_K),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_SCORE_THRESHOLD),
  REPORT_DIR: z.string().default('out/report'),
  SLACK_BOT_TOKEN: optionalString,
  SLACK_CHANNEL: optionalString,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type EmbeddingSettings = Readonly<{
  provider: 'hashing' | 'openai';
  model: string;
  dimension: number;
  batchSize: number;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
}>;

export type IndexSettings = Readonly<{
  backend: 'memory' | 'qdrant';
  collection: string;
  url: string;
  apiKey?: string;
  timeoutMs: number;
}>;

export type AnalysisSettings = Readonly<{ topK: number; scoreThreshold: number }>;

export type SlackSettings = Readonly<{ token?: string; channel?: string }>;

export type AppConfig = Readonly<{
  logsPath: string;
  embedding: EmbeddingSettings;
  index: IndexSettings;
  analysis: AnalysisSettings;
  reportDir: string;
  slack: SlackSettings;
  logLevel: string;
}>;

/**
 * Reads the environment once into an immutable config.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(i => `${i.path.join('.') || 'env'}: ${i.message}`),
    );
  }
  const e = parsed.data;

  return Object.freeze({
    logsPath: e.LOGS_PATH,
    embedding: Object.freeze({
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL ?? DEFAULT_MODELS[e.EMBEDDING_PROVIDER],
      dimension: e.EMBEDDING_DIMENSION,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL,
    }),
    index: Object.freeze({
      backend: e.INDEX_BACKEND,
      collection: e.QDRANT_COLLECTION,
      url: e.QDRANT_URL,
      apiKey: e.QDRANT_API_KEY,
      timeoutMs: e.QDRANT_TIMEOUT_MS,
    }),
    analysis: Object.freeze({
      topK: e.TOP_K_RESULTS,
      scoreThreshold: e.SIMILARITY_THRESHOLD,
    }),
    reportDir: e.REPORT_DIR,
    slack: Object.freeze({ token: e.SLACK_BOT_TOKEN, channel: e.SLACK_CHANNEL }),
    logLevel: e.LOG_LEVEL,
  });
}
