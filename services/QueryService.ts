import { AnswerResponse, RetrievalResponse, RetrievalResult, Source } from '../types';
import { computeConfidence } from '../utils/confidence';
import { GenerationFailureError, ValidationError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { AnswerGenerator } from './AnswerService';
import { CorpusManager } from './CorpusManager';

const log = createLogger('QueryService');

export const NO_CHUNKS_FOUND_MESSAGE =
  "I couldn't find any relevant information in the documents to answer your question.";
export const GENERATION_FAILED_MESSAGE =
  'An answer could not be generated right now. The most relevant passages from the documents are listed as sources.';
export const GENERATION_UNAVAILABLE_MESSAGE =
  'Answer generation is not configured. The most relevant passages from the documents are listed as sources.';

const MAX_CHUNK_PREVIEW_LENGTH = 200;

export interface QueryOptions {
  defaultMaxChunks: number;
  maxChunksLimit: number;
  timeoutMs: number;
}

const DEFAULT_QUERY_OPTIONS: QueryOptions = {
  defaultMaxChunks: 5,
  maxChunksLimit: 20,
  timeoutMs: 15000
};

function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength) + '...';
}

/**
 * One source per (document, page), in ranking order.
 */
export function extractSources(results: readonly RetrievalResult[]): Source[] {
  const seen = new Set<string>();
  const sources: Source[] = [];
  for (const { chunk } of results) {
    const key = `${chunk.documentName}\u0000${chunk.pageNumber ?? ''}`;
    if (seen.has(key)) continue;
    seen.add(key);
    sources.push({
      document_name: chunk.documentName,
      page_number: chunk.pageNumber,
      chunk_text: truncateText(chunk.text, MAX_CHUNK_PREVIEW_LENGTH)
    });
  }
  return sources;
}

/**
 * Entry point for both tool operations. Holds no per-query state, so any
 * number of queries can run at once.
 */
export class QueryService {
  private readonly options: QueryOptions;

  constructor(
    private readonly corpus: CorpusManager,
    private readonly generator: AnswerGenerator | null,
    options: Partial<QueryOptions> = {}
  ) {
    this.options = { ...DEFAULT_QUERY_OPTIONS, ...options };
  }

  get defaultMaxChunks(): number {
    return this.options.defaultMaxChunks;
  }

  get maxChunksLimit(): number {
    return this.options.maxChunksLimit;
  }

  /**
   * Validates `maxChunks` and clamps it to the configured limit.
   */
  resolveMaxChunks(maxChunks: unknown): number {
    if (maxChunks === undefined || maxChunks === null) {
      return this.options.defaultMaxChunks;
    }
    if (typeof maxChunks !== 'number' || !Number.isInteger(maxChunks) || maxChunks < 1) {
      throw new ValidationError(`max_chunks must be an integer >= 1, got ${String(maxChunks)}`);
    }
    return Math.min(maxChunks, this.options.maxChunksLimit);
  }

  private validateQuery(query: unknown): string {
    if (typeof query !== 'string' || query.trim().length === 0) {
      throw new ValidationError('Query cannot be empty');
    }
    return query;
  }

  private async retrieve(query: string, k: number): Promise<RetrievalResult[]> {
    const generation = await this.corpus.ensureReady();
    return generation.retriever.retrieve(query, k, { timeoutMs: this.options.timeoutMs });
  }

  async search(query: unknown, maxChunks?: unknown): Promise<RetrievalResponse> {
    const text = this.validateQuery(query);
    const k = this.resolveMaxChunks(maxChunks);
    log.info(`Search: "${text}" (max_chunks=${k})`);

    const results = await this.retrieve(text, k);
    const chunks = results.map(result => ({
      content: result.chunk.text,
      document_name: result.chunk.documentName,
      page_number: result.chunk.pageNumber,
      metadata: { ...result.chunk.metadata },
      score: result.fusedScore
    }));

    return { query: text, chunks, total_chunks: chunks.length };
  }

  async answer(query: unknown, maxChunks?: unknown): Promise<AnswerResponse> {
    const text = this.validateQuery(query);
    const k = this.resolveMaxChunks(maxChunks);
    log.info(`Answer: "${text}" (max_chunks=${k})`);

    const results = await this.retrieve(text, k);
    if (results.length === 0) {
      log.warn('No relevant chunks found');
      return { answer: NO_CHUNKS_FOUND_MESSAGE, sources: [], confidence_score: 0 };
    }

    const sources = extractSources(results);
    const confidence = computeConfidence(results.map(result => result.fusedScore));

    if (!this.generator) {
      return {
        answer: GENERATION_UNAVAILABLE_MESSAGE,
        sources,
        confidence_score: confidence,
        note: 'generation_unavailable'
      };
    }

    try {
      const answer = await this.generator.generate(text, results);
      log.info(`Query processed successfully. Confidence: ${confidence.toFixed(2)}`);
      return { answer, sources, confidence_score: confidence };
    } catch (error) {
      if (!(error instanceof GenerationFailureError)) {
        throw error;
      }
      log.warn(`Returning raw passages: ${errorMessage(error)}`);
      return {
        answer: GENERATION_FAILED_MESSAGE,
        sources,
        confidence_score: confidence,
        note: 'generation_failed'
      };
    }
  }
}
