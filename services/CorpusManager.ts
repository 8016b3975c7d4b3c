import { Bm25Options, FusionOptions } from '../config';
import { Chunk, CorpusState, DocumentReport } from '../types';
import { ConfigurationError, DocumentSkippedError, IndexUnavailableError, errorMessage } from '../utils/errors';
import { mapWithConcurrency } from '../utils/concurrency';
import { createLogger } from '../utils/logger';
import { ChunkingService } from './ChunkingService';
import { DocumentLedger } from './DatabaseService';
import { DocumentProcessingWorker } from './DocumentProcessingWorker';
import { DocumentSource } from './DocumentSource';
import { EmbeddingProvider } from './EmbeddingService';
import { DEFAULT_FUSION, HybridRetriever } from './HybridRetriever';
import { DEFAULT_BM25, LexicalIndex } from './LexicalIndex';
import { SemanticIndex } from './SemanticIndex';
import { VectorStore } from './VectorStore';

const log = createLogger('CorpusManager');

/**
 * One immutable, atomically published version of the index pair. Queries
 * hold a reference to a generation, never to the manager's mutable state.
 */
export interface CorpusGeneration {
  readonly version: number;
  readonly builtAt: Date;
  readonly chunks: readonly Chunk[];
  readonly documents: readonly DocumentReport[];
  readonly lexical: LexicalIndex;
  readonly semantic: SemanticIndex;
  readonly retriever: HybridRetriever;
}

export interface CorpusManagerOptions {
  mode: 'lazy' | 'eager';
  concurrency: number;
  bm25: Bm25Options;
  fusion: FusionOptions;
  embeddingMaxFailureRatio: number;
}

export interface CorpusDependencies {
  source: DocumentSource;
  worker: DocumentProcessingWorker;
  chunker: ChunkingService;
  embeddings: EmbeddingProvider;
  vectorStore: VectorStore;
  ledger: DocumentLedger;
}

export interface CorpusStatus {
  state: CorpusState;
  source: string;
  generation: number | null;
  builtAt: string | null;
  chunkCount: number;
  semanticChunkCount: number;
  missingEmbeddings: number;
  documents: DocumentReport[];
  lastError: string | null;
}

const DEFAULT_OPTIONS: CorpusManagerOptions = {
  mode: 'lazy',
  concurrency: 4,
  bm25: DEFAULT_BM25,
  fusion: DEFAULT_FUSION,
  embeddingMaxFailureRatio: 0.1
};

/**
 * Owns the corpus lifecycle: empty → loading → ready → reloading → ready.
 *
 * Only one build runs at a time. Queries and startup join the running build;
 * a reload queues one more behind it. Queries read whichever generation is
 * published and never see a half-built one.
 */
export class CorpusManager {
  private state: CorpusState = 'empty';
  private current: CorpusGeneration | null = null;
  private retired: CorpusGeneration | null = null;
  private inFlight: Promise<CorpusGeneration> | null = null;
  private queued: Promise<CorpusGeneration> | null = null;
  private nextVersion = 1;
  private lastError: Error | null = null;
  private readonly options: CorpusManagerOptions;

  constructor(private readonly deps: CorpusDependencies, options: Partial<CorpusManagerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get mode(): 'lazy' | 'eager' {
    return this.options.mode;
  }

  getState(): CorpusState {
    return this.state;
  }

  getGeneration(): CorpusGeneration | null {
    return this.current;
  }

  /** Eager start: builds the first generation right away. */
  async initialize(): Promise<CorpusGeneration> {
    return this.current ?? this.rebuild();
  }

  /**
   * Generation to serve a query from. A published generation is returned
   * immediately, even while a reload runs. Before the first publication,
   * lazy mode builds (and the caller waits); eager mode waits for the
   * startup build or reports the index as unavailable.
   */
  async ensureReady(): Promise<CorpusGeneration> {
    if (this.current) {
      return this.current;
    }
    if (this.inFlight) {
      return this.awaitForQuery(this.inFlight);
    }
    if (this.options.mode === 'lazy') {
      log.info('First query received - building corpus');
      return this.awaitForQuery(this.rebuild());
    }
    throw new IndexUnavailableError(
      this.lastError ? `Document index is not available: ${this.lastError.message}` : undefined,
      this.lastError ?? undefined
    );
  }

  /**
   * Explicit rebuild. A build that is already running may have listed the
   * source before the caller's change, so one follow-up build is queued
   * behind it; every reload arriving meanwhile shares that follow-up.
   */
  async reload(): Promise<CorpusGeneration> {
    if (this.queued) {
      return this.queued;
    }
    const running = this.inFlight;
    if (!running) {
      return this.rebuild();
    }
    this.queued = running
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        this.queued = null;
        return this.rebuild();
      });
    return this.queued;
  }

  /**
   * Checks that the document source is readable and holds at least one PDF,
   * without building anything. Throws ConfigurationError otherwise.
   */
  async validateSource(): Promise<string[]> {
    return this.listDocuments();
  }

  private async awaitForQuery(build: Promise<CorpusGeneration>): Promise<CorpusGeneration> {
    try {
      return await build;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new IndexUnavailableError(`Document index build failed: ${errorMessage(error)}`, error);
    }
  }

  private rebuild(): Promise<CorpusGeneration> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const version = this.nextVersion++;
    this.state = this.current ? 'reloading' : 'loading';

    this.inFlight = this.build(version)
      .then(generation => {
        this.publish(generation);
        return generation;
      })
      .catch((error: unknown) => {
        this.lastError = error instanceof Error ? error : new Error(String(error));
        this.state = this.current ? 'ready' : 'failed';
        log.error(`Build of generation ${version} failed: ${this.lastError.message}`);
        throw error;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }

  private publish(generation: CorpusGeneration): void {
    const previous = this.current;
    this.current = generation;
    this.state = 'ready';
    this.lastError = null;
    log.info(`Published generation ${generation.version} (${generation.chunks.length} chunks)`);

    // The generation before `previous` can no longer be referenced by a query
    const stale = this.retired;
    this.retired = previous;
    if (stale) {
      stale.semantic.drop().catch((error: unknown) => {
        log.warn(`Could not drop vectors of generation ${stale.version}: ${errorMessage(error)}`);
      });
    }
  }

  private async listDocuments(): Promise<string[]> {
    const description = this.deps.source.describe();
    let names: string[];
    try {
      names = await this.deps.source.list();
    } catch (error) {
      throw new ConfigurationError(`Document source ${description} is not readable: ${errorMessage(error)}`, error);
    }
    if (names.length === 0) {
      throw new ConfigurationError(`No PDF files found in ${description}. Please add PDF files to index.`);
    }
    return names;
  }

  private async build(version: number): Promise<CorpusGeneration> {
    const startedAt = Date.now();
    const names = await this.listDocuments();
    log.info(`Found ${names.length} PDF file(s) to process for generation ${version}`);

    const outcomes = await mapWithConcurrency(names, this.options.concurrency, name =>
      this.deps.worker.processDocument(name)
    );

    const reports: DocumentReport[] = [];
    const documentChunks: Chunk[] = [];
    const indexed: Array<{ name: string; chunkCount: number; pageCount: number; fileHash: string }> = [];

    outcomes.forEach((outcome, i) => {
      const name = names[i];
      if (outcome.error) {
        let reason: string;
        if (outcome.error instanceof DocumentSkippedError) {
          reason = outcome.error.reason;
        } else {
          reason = outcome.error.message;
          log.warn(`Skipping ${name}: ${reason}`);
        }
        reports.push({ documentName: name, status: 'skipped', chunkCount: 0, pageCount: 0, reason });
        return;
      }
      const processed = outcome.value;
      documentChunks.push(...processed.chunks);
      indexed.push({
        name,
        chunkCount: processed.chunks.length,
        pageCount: processed.pageCount,
        fileHash: processed.fileHash
      });
    });

    if (indexed.length === 0) {
      throw new ConfigurationError(
        `None of the ${names.length} document(s) in ${this.deps.source.describe()} produced indexable text`
      );
    }

    const chunks: Chunk[] = this.deps.chunker
      .deduplicateChunks(documentChunks)
      .map((chunk, ordinal) => ({ ...chunk, ordinal }));

    const keptPerDocument = new Map<string, number>();
    for (const chunk of chunks) {
      keptPerDocument.set(chunk.documentName, (keptPerDocument.get(chunk.documentName) ?? 0) + 1);
    }
    for (const doc of indexed) {
      reports.push({
        documentName: doc.name,
        status: 'indexed',
        chunkCount: keptPerDocument.get(doc.name) ?? 0,
        pageCount: doc.pageCount,
        fileHash: doc.fileHash
      });
    }
    reports.sort((a, b) => (a.documentName < b.documentName ? -1 : a.documentName > b.documentName ? 1 : 0));

    const lexical = LexicalIndex.build(chunks, this.options.bm25);
    const semantic = await SemanticIndex.build(
      chunks,
      this.deps.embeddings,
      this.deps.vectorStore,
      `gen-${version}`,
      { maxFailureRatio: this.options.embeddingMaxFailureRatio }
    );
    const retriever = new HybridRetriever(lexical, semantic, chunks, this.options.fusion);

    for (const report of reports) {
      if (report.status !== 'indexed') continue;
      try {
        await this.deps.ledger.markIndexed(report.documentName, {
          generation: version,
          chunkCount: report.chunkCount,
          pageCount: report.pageCount,
          fileHash: report.fileHash
        });
      } catch (error) {
        log.warn(`Could not record ${report.documentName} in the document ledger: ${errorMessage(error)}`);
      }
    }

    log.info(
      `Generation ${version}: ${indexed.length}/${names.length} document(s), ${chunks.length} chunk(s), ` +
      `${semantic.size} vector(s) in ${Date.now() - startedAt}ms`
    );

    return {
      version,
      builtAt: new Date(),
      chunks,
      documents: reports,
      lexical,
      semantic,
      retriever
    };
  }

  status(): CorpusStatus {
    const generation = this.current;
    return {
      state: this.state,
      source: this.deps.source.describe(),
      generation: generation?.version ?? null,
      builtAt: generation?.builtAt.toISOString() ?? null,
      chunkCount: generation?.chunks.length ?? 0,
      semanticChunkCount: generation?.semantic.size ?? 0,
      missingEmbeddings: generation?.semantic.missingChunkIds.length ?? 0,
      documents: generation ? [...generation.documents] : [],
      lastError: this.lastError?.message ?? null
    };
  }
}
