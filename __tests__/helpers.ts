import { Chunk, PageText } from '../types';
import { ChunkingService, buildChunkId } from '../services/ChunkingService';
import { CorpusManager, CorpusManagerOptions } from '../services/CorpusManager';
import { InMemoryDocumentLedger } from '../services/DatabaseService';
import { DocumentProcessingWorker } from '../services/DocumentProcessingWorker';
import { DocumentSource } from '../services/DocumentSource';
import { EmbeddingOutcome, EmbeddingProvider, LocalEmbeddingService } from '../services/EmbeddingService';
import { TextCleaningService } from '../services/TextCleaningService';
import { DocumentParser, ExtractionResult } from '../services/TextExtractionService';
import { InMemoryVectorStore } from '../services/VectorStore';

export function makeChunk(documentName: string, pageNumber: number | null, index: number, text: string): Chunk {
  return {
    id: buildChunkId(documentName, pageNumber, index),
    documentName,
    pageNumber,
    text,
    ordinal: index,
    charStart: 0,
    charEnd: text.length,
    metadata: {
      document_name: documentName,
      page_number: pageNumber,
      source: documentName,
      chunk_index: index
    }
  };
}

export class FakeDocumentSource implements DocumentSource {
  readonly files = new Map<string, Buffer>();
  listError: Error | null = null;
  /** When set, list() snapshots the names and then waits for this before returning. */
  listGate: Promise<void> | null = null;

  constructor(names: string[] = []) {
    for (const name of names) {
      this.files.set(name, Buffer.from(`%PDF-fake ${name}`));
    }
  }

  describe(): string {
    return 'fake source';
  }

  async list(): Promise<string[]> {
    if (this.listError) {
      throw this.listError;
    }
    const names = [...this.files.keys()].sort();
    if (this.listGate) {
      await this.listGate;
    }
    return names;
  }

  async read(name: string): Promise<Buffer> {
    const buffer = this.files.get(name);
    if (!buffer) {
      throw new Error(`ENOENT: ${name}`);
    }
    return buffer;
  }

  async save(name: string, buffer: Buffer): Promise<void> {
    this.files.set(name, buffer);
  }
}

/**
 * Parser keyed by file name. Unknown names parse as corrupt files.
 */
export class FakeParser implements DocumentParser {
  readonly documents = new Map<string, ExtractionResult>();
  readonly calls: string[] = [];

  add(name: string, pages: PageText[], pageCount: number = pages.length): this {
    this.documents.set(name, { pages, pageCount });
    return this;
  }

  async extractPages(_buffer: Buffer, filename: string): Promise<ExtractionResult> {
    this.calls.push(filename);
    const result = this.documents.get(filename);
    if (!result) {
      throw new Error('Invalid PDF structure');
    }
    return result;
  }
}

/**
 * Embedding provider whose every call fails, leaving only the lexical
 * side of the index usable.
 */
export class FailingEmbeddings implements EmbeddingProvider {
  readonly modelName = 'failing';

  getDimension(): number {
    return 16;
  }

  async embedText(): Promise<number[]> {
    throw new Error('embedding service unreachable');
  }

  async embedTexts(texts: string[]): Promise<EmbeddingOutcome[]> {
    return texts.map(() => ({ embedding: null, error: new Error('embedding service unreachable') }));
  }
}

export interface TestCorpus {
  corpus: CorpusManager;
  source: FakeDocumentSource;
  parser: FakeParser;
  store: InMemoryVectorStore;
  ledger: InMemoryDocumentLedger;
}

export function createTestCorpus(
  source: FakeDocumentSource,
  parser: FakeParser,
  options: Partial<CorpusManagerOptions> = {},
  embeddings: EmbeddingProvider = new LocalEmbeddingService(64),
  chunker: ChunkingService = new ChunkingService(),
  ledger: InMemoryDocumentLedger = new InMemoryDocumentLedger()
): TestCorpus {
  const store = new InMemoryVectorStore();
  const worker = new DocumentProcessingWorker(source, parser, new TextCleaningService(), chunker, ledger, 0);
  const corpus = new CorpusManager(
    { source, worker, chunker, embeddings, vectorStore: store, ledger },
    options
  );
  return { corpus, source, parser, store, ledger };
}
