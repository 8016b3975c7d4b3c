import { Chunk, ScoredChunkId } from '../types';
import { createLogger } from '../utils/logger';
import { normalizeScore, VectorMetric } from '../utils/scoreNormalization';
import { EmbeddingProvider } from './EmbeddingService';
import { VectorRecord, VectorStore } from './VectorStore';

const log = createLogger('SemanticIndex');

export interface SemanticBuildOptions {
  /** Above this share of failed chunk embeddings the build is aborted. */
  maxFailureRatio: number;
}

export class SemanticIndex {
  private constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly store: VectorStore,
    readonly namespace: string,
    private readonly metric: VectorMetric,
    private readonly indexedIds: ReadonlySet<string>,
    readonly missingChunkIds: readonly string[]
  ) {}

  /**
   * Embeds every chunk into `namespace`. Chunks whose embedding failed are
   * left out (they stay lexically searchable); too many failures abort the
   * build instead of publishing a degraded index.
   */
  static async build(
    chunks: readonly Chunk[],
    embeddings: EmbeddingProvider,
    store: VectorStore,
    namespace: string,
    options: SemanticBuildOptions = { maxFailureRatio: 0.1 }
  ): Promise<SemanticIndex> {
    const metric = await store.getMetric();
    if (chunks.length === 0) {
      return new SemanticIndex(embeddings, store, namespace, metric, new Set(), []);
    }

    const outcomes = await embeddings.embedTexts(chunks.map(chunk => chunk.text));
    if (outcomes.length !== chunks.length) {
      throw new Error(`Embedding provider returned ${outcomes.length} results for ${chunks.length} chunks`);
    }

    const records: VectorRecord[] = [];
    const missing: string[] = [];
    for (let i = 0; i < chunks.length; i++) {
      const outcome = outcomes[i];
      if (outcome.embedding) {
        records.push({
          id: chunks[i].id,
          values: outcome.embedding,
          metadata: {
            document_name: chunks[i].documentName,
            page_number: chunks[i].pageNumber ?? 0,
            ordinal: chunks[i].ordinal
          }
        });
      } else {
        missing.push(chunks[i].id);
        log.warn(`Chunk ${chunks[i].id} was not embedded: ${outcome.error.message}`);
      }
    }

    const failureRatio = missing.length / chunks.length;
    if (failureRatio > options.maxFailureRatio) {
      throw new Error(
        `Too many embedding failures: ${missing.length}/${chunks.length} chunks ` +
        `(limit ${Math.round(options.maxFailureRatio * 100)}%)`
      );
    }

    await store.upsert(namespace, records);
    log.info(`Indexed ${records.length}/${chunks.length} chunk vectors into ${store.kind}:${namespace}`);

    return new SemanticIndex(embeddings, store, namespace, metric, new Set(records.map(r => r.id)), missing);
  }

  get size(): number {
    return this.indexedIds.size;
  }

  has(chunkId: string): boolean {
    return this.indexedIds.has(chunkId);
  }

  /**
   * k nearest chunks to the query, similarity normalized to [0,1].
   */
  async search(queryText: string, k: number, signal?: AbortSignal): Promise<ScoredChunkId[]> {
    if (k <= 0 || this.indexedIds.size === 0 || queryText.trim().length === 0) {
      return [];
    }

    const queryVector = await this.embeddings.embedText(queryText, { signal });
    const matches = await this.store.query(this.namespace, queryVector, k);

    return matches
      .filter(match => this.indexedIds.has(match.id))
      .map(match => ({ chunkId: match.id, score: normalizeScore(match.score, this.metric) }));
  }

  async drop(): Promise<void> {
    await this.store.deleteNamespace(this.namespace);
  }
}
