import { z } from 'zod';
import { ConfigurationError } from './utils/errors';

const numberFromEnv = (fallback: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? fallback : Number(value)),
    z.number().finite()
  );

const envSchema = z.object({
  PORT: numberFromEnv(5003).pipe(z.number().int().min(0).max(65535)),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' && value !== '' ? value.toLowerCase() : 'info'),
    z.enum(['debug', 'info', 'warn', 'error'])
  ),

  DOCUMENT_SOURCE: z.enum(['local', 'gcs']).default('local'),
  PDF_DOCUMENTS_DIR: z.string().min(1).default('./documents'),
  GCS_BUCKET: z.string().optional(),
  GCS_PREFIX: z.string().default(''),
  GOOGLE_CLOUD_PROJECT_ID: z.string().optional(),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),

  INDEX_STORAGE: z.enum(['memory', 'pinecone']).default('memory'),
  PINECONE_API_KEY: z.string().optional(),
  PINECONE_INDEX_NAME: z.string().default('pdf-hybrid-search'),

  MONGODB_URI: z.string().optional(),
  MONGODB_DB: z.string().default('pdf_search'),

  GEMINI_API_KEY: z.string().optional(),
  EMBEDDING_PROVIDER: z.enum(['gemini', 'local']).optional(),
  EMBEDDING_MODEL: z.string().default('text-embedding-004'),
  EMBEDDING_DIMENSION: numberFromEnv(768).pipe(z.number().int().min(8).max(8192)),
  EMBEDDING_MAX_CONCURRENT: numberFromEnv(8).pipe(z.number().int().min(1).max(100)),
  EMBEDDING_MAX_FAILURE_RATIO: numberFromEnv(0.1).pipe(z.number().min(0).max(1)),
  LLM_MODEL: z.string().default('gemini-1.5-flash'),
  LLM_TEMPERATURE: numberFromEnv(0.1).pipe(z.number().min(0).max(2)),

  CHUNK_SIZE: numberFromEnv(800).pipe(z.number().int().min(100).max(8000)),
  CHUNK_OVERLAP: numberFromEnv(120).pipe(z.number().int().min(0)),
  LEXICAL_WEIGHT: numberFromEnv(0.5).pipe(z.number().min(0).max(1)),
  BM25_K1: numberFromEnv(1.2).pipe(z.number().min(0).max(3)),
  BM25_B: numberFromEnv(0.75).pipe(z.number().min(0).max(1)),
  CANDIDATE_MULTIPLIER: numberFromEnv(2).pipe(z.number().int().min(1).max(10)),
  DEFAULT_MAX_CHUNKS: numberFromEnv(5).pipe(z.number().int().min(1)),
  MAX_CHUNKS_LIMIT: numberFromEnv(20).pipe(z.number().int().min(1).max(100)),
  QUERY_TIMEOUT_MS: numberFromEnv(15000).pipe(z.number().int().min(1)),

  INGESTION_MODE: z.enum(['lazy', 'eager']).default('lazy'),
  INGESTION_CONCURRENCY: numberFromEnv(4).pipe(z.number().int().min(1).max(32))
});

export interface ChunkingOptions {
  /** Upper bound on chunk length in characters. */
  chunkSize: number;
  /** Characters shared by consecutive chunks of the same page. */
  chunkOverlap: number;
}

export interface FusionOptions {
  /** Weight of the lexical (BM25) source; the semantic source gets `1 - lexicalWeight`. */
  lexicalWeight: number;
  /** Each source is asked for `k * candidateMultiplier` candidates before fusion. */
  candidateMultiplier: number;
}

export interface Bm25Options {
  k1: number;
  b: number;
}

export interface AppConfig {
  port: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  documentSource:
    | { kind: 'local'; directory: string }
    | { kind: 'gcs'; bucket: string; prefix: string; projectId?: string; keyFilename?: string };
  indexStorage: { kind: 'memory' } | { kind: 'pinecone'; apiKey: string; indexName: string };
  mongo: { uri: string; database: string } | null;
  embedding: {
    provider: 'gemini' | 'local';
    model: string;
    dimension: number;
    maxConcurrent: number;
    maxFailureRatio: number;
  };
  generation: { apiKey: string; model: string; temperature: number } | null;
  geminiApiKey?: string;
  chunking: ChunkingOptions;
  fusion: FusionOptions;
  bm25: Bm25Options;
  query: { defaultMaxChunks: number; maxChunksLimit: number; timeoutMs: number };
  ingestion: { mode: 'lazy' | 'eager'; concurrency: number };
}

/**
 * Validates the environment and turns it into a typed config. Throws
 * ConfigurationError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  if (e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP (${e.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${e.CHUNK_SIZE})`
    );
  }

  let documentSource: AppConfig['documentSource'];
  if (e.DOCUMENT_SOURCE === 'gcs') {
    if (!e.GCS_BUCKET) {
      throw new ConfigurationError('GCS_BUCKET is required when DOCUMENT_SOURCE=gcs');
    }
    documentSource = {
      kind: 'gcs',
      bucket: e.GCS_BUCKET,
      prefix: e.GCS_PREFIX,
      projectId: e.GOOGLE_CLOUD_PROJECT_ID,
      keyFilename: e.GOOGLE_APPLICATION_CREDENTIALS
    };
  } else {
    documentSource = { kind: 'local', directory: e.PDF_DOCUMENTS_DIR };
  }

  let indexStorage: AppConfig['indexStorage'] = { kind: 'memory' };
  if (e.INDEX_STORAGE === 'pinecone') {
    if (!e.PINECONE_API_KEY) {
      throw new ConfigurationError('PINECONE_API_KEY is required when INDEX_STORAGE=pinecone');
    }
    indexStorage = { kind: 'pinecone', apiKey: e.PINECONE_API_KEY, indexName: e.PINECONE_INDEX_NAME };
  }

  const provider = e.EMBEDDING_PROVIDER ?? (e.GEMINI_API_KEY ? 'gemini' : 'local');
  if (provider === 'gemini' && !e.GEMINI_API_KEY) {
    throw new ConfigurationError('GEMINI_API_KEY is required when EMBEDDING_PROVIDER=gemini');
  }

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    documentSource,
    indexStorage,
    mongo: e.MONGODB_URI ? { uri: e.MONGODB_URI, database: e.MONGODB_DB } : null,
    embedding: {
      provider,
      model: e.EMBEDDING_MODEL,
      dimension: e.EMBEDDING_DIMENSION,
      maxConcurrent: e.EMBEDDING_MAX_CONCURRENT,
      maxFailureRatio: e.EMBEDDING_MAX_FAILURE_RATIO
    },
    generation: e.GEMINI_API_KEY
      ? { apiKey: e.GEMINI_API_KEY, model: e.LLM_MODEL, temperature: e.LLM_TEMPERATURE }
      : null,
    geminiApiKey: e.GEMINI_API_KEY,
    chunking: { chunkSize: e.CHUNK_SIZE, chunkOverlap: e.CHUNK_OVERLAP },
    fusion: { lexicalWeight: e.LEXICAL_WEIGHT, candidateMultiplier: e.CANDIDATE_MULTIPLIER },
    bm25: { k1: e.BM25_K1, b: e.BM25_B },
    query: {
      defaultMaxChunks: Math.min(e.DEFAULT_MAX_CHUNKS, e.MAX_CHUNKS_LIMIT),
      maxChunksLimit: e.MAX_CHUNKS_LIMIT,
      timeoutMs: e.QUERY_TIMEOUT_MS
    },
    ingestion: { mode: e.INGESTION_MODE, concurrency: e.INGESTION_CONCURRENCY }
  };
}
