/**
 * Centralized configuration for Groundwork.
 *
 * The environment is validated once at process start and turned into an
 * immutable {@link AppConfig} record that is handed to constructors. Nothing
 * reads `process.env` after that point.
 */

import { z } from 'zod';
import os from 'node:os';
import path from 'node:path';
import { loadConfigSync } from 'zod-config';
import { envAdapter } from 'zod-config/env-adapter';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { ConfigurationError, getErrorMessage } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger('config');

// ============================================================================
// Schema Definitions
// ============================================================================

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ES_INDEX_NAME = /^[a-z0-9_][a-z0-9_-]*$/;

export const GENERATION_BACKEND_KINDS = ['local', 'hosted', 'extractive'] as const;
export type GenerationBackendKind = (typeof GENERATION_BACKEND_KINDS)[number];

const optionalString = z
  .string()
  .optional()
  .transform(val => (val && val.trim().length > 0 ? val.trim() : undefined));

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(val => (val === undefined || val === '' ? fallback : val === 'true' || val === '1'));

/**
 * Core application settings
 */
const coreSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  DEBUG: flag(false),
  HOME: optionalString,
  GROUNDWORK_STATE_DIR: optionalString.describe('Directory for the file-backed store and vector snapshot'),
  GROUNDWORK_DEFAULT_OWNER: z.string().min(1).default('local').describe('Owner id used by the CLI'),
});

/**
 * Vector index backend selection
 */
const vectorSchema = z.object({
  GROUNDWORK_VECTOR_BACKEND: z.enum(['memory', 'pgvector', 'elasticsearch']).default('memory'),
  POSTGRES_URI: optionalString.describe('PostgreSQL connection string (pgvector backend)'),
  GROUNDWORK_PG_INDEX_NAME: z.string().regex(SQL_IDENTIFIER).default('groundwork_chunks'),
  ELASTICSEARCH_URL: z.string().url().default('http://localhost:9200'),
  GROUNDWORK_ES_INDEX: z.string().regex(ES_INDEX_NAME).default('groundwork_chunks'),
});

export const DEFAULT_EMBEDDING_MODELS = {
  openai: 'text-embedding-3-small',
  ollama: 'nomic-embed-text',
} as const;

/**
 * Embedding and generation models
 */
const aiSchema = z.object({
  GROUNDWORK_EMBEDDING_PROVIDER: z.enum(['openai', 'ollama', 'hashing']).default('hashing'),
  /** Falls back to a per-provider model when unset */
  GROUNDWORK_EMBEDDING_MODEL: optionalString,
  GROUNDWORK_EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(384),
  OPENAI_API_KEY: optionalString,
  GROUNDWORK_HOSTED_MODEL: z.string().default('gpt-4o-mini'),
  OLLAMA_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('qwen3:1.7b'),
  GROUNDWORK_GENERATION_CHAIN: z
    .string()
    .default('local,hosted,extractive')
    .transform(val =>
      val
        .split(',')
        .map(s => s.trim())
        .filter(s => s.length > 0)
    )
    .pipe(z.array(z.enum(GENERATION_BACKEND_KINDS)).min(1)),
  GROUNDWORK_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  GROUNDWORK_TOP_P: z.coerce.number().gt(0).max(1).default(0.9),
  GROUNDWORK_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(500),
});

/**
 * Chunking, retrieval and streaming knobs
 */
const pipelineSchema = z.object({
  GROUNDWORK_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  GROUNDWORK_CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  GROUNDWORK_CHUNK_LOOKBACK: z.coerce.number().int().min(0).default(100),
  GROUNDWORK_TOP_K: z.coerce.number().int().positive().default(5),
  GROUNDWORK_MAX_CONTEXT_LENGTH: z.coerce.number().int().positive().default(4000),
  GROUNDWORK_EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  GROUNDWORK_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  GROUNDWORK_GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  GROUNDWORK_STREAM_BUFFER: z.coerce.number().int().positive().default(16),
});

/**
 * Per-owner quotas
 */
const limitsSchema = z.object({
  GROUNDWORK_RATE_LIMIT_ENABLED: flag(true),
  GROUNDWORK_MAX_QUERIES_PER_HOUR: z.coerce.number().int().positive().default(100),
  GROUNDWORK_MAX_DOCUMENTS_PER_USER: z.coerce.number().int().positive().default(100),
  GROUNDWORK_MAX_CHUNKS_PER_DOCUMENT: z.coerce.number().int().positive().default(1000),
});

export const envSchema = z.object({
  ...coreSchema.shape,
  ...vectorSchema.shape,
  ...aiSchema.shape,
  ...pipelineSchema.shape,
  ...limitsSchema.shape,
});

export type RawEnv = z.infer<typeof envSchema>;

// ============================================================================
// Configuration record
// ============================================================================

export type VectorBackendConfig =
  | { kind: 'memory'; dimension: number; persistPath?: string }
  | { kind: 'pgvector'; dimension: number; connectionString: string; indexName: string }
  | { kind: 'elasticsearch'; dimension: number; node: string; index: string };

export type EmbeddingConfig =
  | { provider: 'hashing'; dimension: number; timeoutMs: number }
  | { provider: 'openai'; model: string; dimension: number; apiKey: string; timeoutMs: number }
  | { provider: 'ollama'; model: string; dimension: number; baseUrl: string; timeoutMs: number };

export interface SamplingDefaults {
  temperature: number;
  topP: number;
  maxOutputTokens: number;
}

export interface AppConfig {
  env: RawEnv['NODE_ENV'];
  logLevel: RawEnv['LOG_LEVEL'];
  debug: boolean;
  defaultOwner: string;
  paths: {
    state: string;
    store: string;
    vectors: string;
  };
  vector: VectorBackendConfig;
  embedding: EmbeddingConfig;
  generation: {
    chain: GenerationBackendKind[];
    local: { baseUrl: string; model: string };
    hosted: { model: string; apiKey?: string };
    defaults: SamplingDefaults;
    timeoutMs: number;
  };
  chunking: { size: number; overlap: number; lookBack: number };
  retrieval: { topK: number; maxContextLength: number; searchTimeoutMs: number };
  streaming: { bufferSize: number };
  limits: {
    rateLimitEnabled: boolean;
    maxQueriesPerHour: number;
    maxDocumentsPerUser: number;
    maxChunksPerDocument: number;
  };
}

/**
 * Turn validated environment values into the configuration record,
 * enforcing the cross-field rules a flat schema cannot express.
 */
export function buildConfig(raw: RawEnv): AppConfig {
  const errors: string[] = [];

  if (raw.GROUNDWORK_CHUNK_OVERLAP >= raw.GROUNDWORK_CHUNK_SIZE) {
    errors.push(
      `GROUNDWORK_CHUNK_OVERLAP (${raw.GROUNDWORK_CHUNK_OVERLAP}) must be smaller than GROUNDWORK_CHUNK_SIZE (${raw.GROUNDWORK_CHUNK_SIZE})`
    );
  }

  const stateDir = path.resolve(
    raw.GROUNDWORK_STATE_DIR ?? path.join(raw.HOME ?? os.homedir(), '.groundwork')
  );
  const dimension = raw.GROUNDWORK_EMBEDDING_DIMENSION;

  let vector: VectorBackendConfig;
  switch (raw.GROUNDWORK_VECTOR_BACKEND) {
    case 'pgvector':
      if (!raw.POSTGRES_URI) {
        errors.push('POSTGRES_URI is required when GROUNDWORK_VECTOR_BACKEND=pgvector');
      }
      vector = {
        kind: 'pgvector',
        dimension,
        connectionString: raw.POSTGRES_URI ?? '',
        indexName: raw.GROUNDWORK_PG_INDEX_NAME,
      };
      break;
    case 'elasticsearch':
      vector = {
        kind: 'elasticsearch',
        dimension,
        node: raw.ELASTICSEARCH_URL,
        index: raw.GROUNDWORK_ES_INDEX,
      };
      break;
    default:
      vector = { kind: 'memory', dimension, persistPath: path.join(stateDir, 'vectors.json') };
      break;
  }

  let embedding: EmbeddingConfig;
  const embeddingTimeout = raw.GROUNDWORK_EMBEDDING_TIMEOUT_MS;
  switch (raw.GROUNDWORK_EMBEDDING_PROVIDER) {
    case 'openai':
      if (!raw.OPENAI_API_KEY) {
        errors.push('OPENAI_API_KEY is required when GROUNDWORK_EMBEDDING_PROVIDER=openai');
      }
      embedding = {
        provider: 'openai',
        model: raw.GROUNDWORK_EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODELS.openai,
        dimension,
        apiKey: raw.OPENAI_API_KEY ?? '',
        timeoutMs: embeddingTimeout,
      };
      break;
    case 'ollama':
      embedding = {
        provider: 'ollama',
        model: raw.GROUNDWORK_EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODELS.ollama,
        dimension,
        baseUrl: raw.OLLAMA_URL,
        timeoutMs: embeddingTimeout,
      };
      break;
    default:
      embedding = { provider: 'hashing', dimension, timeoutMs: embeddingTimeout };
      break;
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, {
      context: { errors },
    });
  }

  // Dedupe while keeping preference order; the extractive variant always closes the chain.
  let chain = [...new Set(raw.GROUNDWORK_GENERATION_CHAIN)];
  if (chain.includes('hosted') && !raw.OPENAI_API_KEY) {
    logger.warn('OPENAI_API_KEY is not set; removing the hosted backend from the generation chain');
    chain = chain.filter(kind => kind !== 'hosted');
  }
  chain = [...chain.filter(kind => kind !== 'extractive'), 'extractive'];

  return {
    env: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,
    debug: raw.DEBUG,
    defaultOwner: raw.GROUNDWORK_DEFAULT_OWNER,
    paths: {
      state: stateDir,
      store: path.join(stateDir, 'store.json'),
      vectors: path.join(stateDir, 'vectors.json'),
    },
    vector,
    embedding,
    generation: {
      chain,
      local: { baseUrl: raw.OLLAMA_URL, model: raw.OLLAMA_MODEL },
      hosted: { model: raw.GROUNDWORK_HOSTED_MODEL, apiKey: raw.OPENAI_API_KEY },
      defaults: {
        temperature: raw.GROUNDWORK_TEMPERATURE,
        topP: raw.GROUNDWORK_TOP_P,
        maxOutputTokens: raw.GROUNDWORK_MAX_OUTPUT_TOKENS,
      },
      timeoutMs: raw.GROUNDWORK_GENERATION_TIMEOUT_MS,
    },
    chunking: {
      size: raw.GROUNDWORK_CHUNK_SIZE,
      overlap: raw.GROUNDWORK_CHUNK_OVERLAP,
      lookBack: raw.GROUNDWORK_CHUNK_LOOKBACK,
    },
    retrieval: {
      topK: raw.GROUNDWORK_TOP_K,
      maxContextLength: raw.GROUNDWORK_MAX_CONTEXT_LENGTH,
      searchTimeoutMs: raw.GROUNDWORK_SEARCH_TIMEOUT_MS,
    },
    streaming: { bufferSize: raw.GROUNDWORK_STREAM_BUFFER },
    limits: {
      rateLimitEnabled: raw.GROUNDWORK_RATE_LIMIT_ENABLED,
      maxQueriesPerHour: raw.GROUNDWORK_MAX_QUERIES_PER_HOUR,
      maxDocumentsPerUser: raw.GROUNDWORK_MAX_DOCUMENTS_PER_USER,
      maxChunksPerDocument: raw.GROUNDWORK_MAX_CHUNKS_PER_DOCUMENT,
    },
  };
}

/**
 * Validate an explicit environment map. Pure apart from warning logs.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, {
      context: { errors: issues },
    });
  }
  return buildConfig(result.data);
}

/**
 * Load configuration from `.env.local`, `.env` and the process environment
 * (highest priority). Call once at startup.
 */
export function loadConfig(cwd = process.cwd()): AppConfig {
  let raw: RawEnv;
  try {
    raw = loadConfigSync({
      schema: envSchema,
      adapters: [
        dotEnvAdapter({ path: path.join(cwd, '.env.local'), silent: true }),
        dotEnvAdapter({ path: path.join(cwd, '.env'), silent: true }),
        envAdapter({ silent: false }),
      ],
    });
  } catch (error) {
    throw new ConfigurationError(`Configuration validation failed: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
  return buildConfig(raw);
}
