import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import { mapWithConcurrency, sleep, throwIfAborted } from '../utils/concurrency';
import { createLogger } from '../utils/logger';

const log = createLogger('EmbeddingService');

export type EmbeddingOutcome = { embedding: number[]; error: null } | { embedding: null; error: Error };

/**
 * Embedding collaborator. The same instance embeds chunks at build time and
 * queries at search time so both land in one vector space.
 */
export interface EmbeddingProvider {
  readonly modelName: string;
  getDimension(): number;
  embedText(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
  /** One outcome per input, in input order. Never rejects as a whole. */
  embedTexts(texts: string[]): Promise<EmbeddingOutcome[]>;
}

export interface GeminiEmbeddingOptions {
  model?: string;
  dimension?: number;
  maxConcurrent?: number;
}

export class GeminiEmbeddingService implements EmbeddingProvider {
  readonly modelName: string;
  private configuredDimension: number;
  private actualDimension: number | null = null;
  private readonly maxConcurrent: number;
  private readonly MAX_RETRIES = 3;
  private readonly INITIAL_RETRY_DELAY_MS = 1000;
  private readonly CACHE_LIMIT = 1000;
  private embeddingCache: Map<string, number[]> = new Map();
  private modelInstance: GenerativeModel;

  constructor(apiKey: string | undefined, options: GeminiEmbeddingOptions = {}) {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required for embedding generation');
    }
    const genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = options.model ?? 'text-embedding-004';
    this.configuredDimension = options.dimension ?? 768;
    this.maxConcurrent = options.maxConcurrent ?? 8;
    this.modelInstance = genAI.getGenerativeModel({ model: this.modelName });
  }

  async embedText(text: string, options: { signal?: AbortSignal } = {}, retryCount: number = 0): Promise<number[]> {
    const cached = this.embeddingCache.get(text);
    if (cached) {
      return [...cached];
    }

    try {
      throwIfAborted(options.signal);
      if (retryCount > 0) {
        log.info(`Retry ${retryCount}/${this.MAX_RETRIES}...`);
      }

      const result = await this.modelInstance.embedContent(text, { signal: options.signal });
      const values = result.embedding?.values;
      if (!Array.isArray(values) || values.length === 0) {
        throw new Error('Unexpected embedding response format');
      }

      const embedding = this.fitDimension(values);
      this.remember(text, embedding);
      return [...embedding];
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const isNetworkError = err.message.includes('fetch failed') ||
        err.message.includes('ECONNRESET') ||
        err.message.includes('ETIMEDOUT') ||
        err.message.includes('429') ||
        err.message.includes('network');

      if (isNetworkError && retryCount < this.MAX_RETRIES && !options.signal?.aborted) {
        const delay = this.INITIAL_RETRY_DELAY_MS * Math.pow(2, retryCount);
        log.warn(`Network error (attempt ${retryCount + 1}/${this.MAX_RETRIES + 1}), retrying in ${delay}ms: ${err.message}`);
        await sleep(delay);
        return this.embedText(text, options, retryCount + 1);
      }

      throw new Error(`Failed to generate embedding: ${err.message}`);
    }
  }

  async embedTexts(texts: string[]): Promise<EmbeddingOutcome[]> {
    const results = await mapWithConcurrency(texts, this.maxConcurrent, text => this.embedText(text));
    const outcomes: EmbeddingOutcome[] = results.map(result =>
      result.error ? { embedding: null, error: result.error } : { embedding: result.value, error: null }
    );

    const failures = outcomes.filter(outcome => outcome.error).length;
    if (failures > 0) {
      log.error(`${failures}/${texts.length} embeddings failed`);
    }
    return outcomes;
  }

  getDimension(): number {
    return this.configuredDimension;
  }

  private fitDimension(values: number[]): number[] {
    if (this.actualDimension === null) {
      this.actualDimension = values.length;
      if (this.actualDimension !== this.configuredDimension) {
        log.warn(`Dimension mismatch: configured ${this.configuredDimension}, model returns ${this.actualDimension}`);
      }
    }

    if (values.length > this.configuredDimension) {
      return values.slice(0, this.configuredDimension);
    }
    if (values.length < this.configuredDimension) {
      return [...values, ...new Array<number>(this.configuredDimension - values.length).fill(0)];
    }
    return values;
  }

  private remember(text: string, embedding: number[]): void {
    if (this.embeddingCache.size >= this.CACHE_LIMIT) {
      const firstKey = this.embeddingCache.keys().next().value;
      if (firstKey !== undefined) this.embeddingCache.delete(firstKey);
    }
    this.embeddingCache.set(text, embedding);
  }
}

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(value: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Free, offline embedder using feature hashing: word tokens and character
 * trigrams are hashed into a fixed number of signed buckets and the result
 * is L2-normalized. Deterministic, so identical text always gets an
 * identical vector.
 */
export class LocalEmbeddingService implements EmbeddingProvider {
  readonly modelName = 'local-feature-hashing-v1';
  private readonly dimension: number;

  constructor(dimension: number = 384) {
    if (!Number.isInteger(dimension) || dimension < 8) {
      throw new Error(`Embedding dimension must be an integer >= 8, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  getDimension(): number {
    return this.dimension;
  }

  async embedText(text: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    throwIfAborted(options.signal);
    return this.vectorize(text);
  }

  async embedTexts(texts: string[]): Promise<EmbeddingOutcome[]> {
    return texts.map(text => ({ embedding: this.vectorize(text), error: null }));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

    for (const word of words) {
      this.addFeature(vector, `w:${word}`, 1);
      const padded = `#${word}#`;
      for (let i = 0; i + 3 <= padded.length; i++) {
        this.addFeature(vector, `g:${padded.slice(i, i + 3)}`, 0.5);
      }
    }

    let norm = 0;
    for (const value of vector) norm += value * value;
    norm = Math.sqrt(norm);
    return norm > 0 ? vector.map(value => value / norm) : vector;
  }

  private addFeature(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimension;
    const sign = (hash & 0x80000000) === 0 ? 1 : -1;
    vector[bucket] += sign * weight;
  }
}
