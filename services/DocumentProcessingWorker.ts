import { createHash } from 'crypto';
import { Chunk } from '../types';
import { DocumentSkippedError, errorMessage } from '../utils/errors';
import { sleep } from '../utils/concurrency';
import { createLogger } from '../utils/logger';
import { ChunkingService } from './ChunkingService';
import { DocumentLedger } from './DatabaseService';
import { DocumentSource } from './DocumentSource';
import { TextCleaningService } from './TextCleaningService';
import { DocumentParser, ExtractionResult } from './TextExtractionService';

const log = createLogger('DocumentProcessingWorker');

const MAX_READ_RETRIES = 3;
const RETRY_DELAY_MS = 500;

export interface ProcessedDocument {
  documentName: string;
  fileHash: string;
  pageCount: number;
  chunks: Chunk[];
}

/**
 * read → hash → parse → clean → chunk for a single document. Anything that
 * goes wrong surfaces as DocumentSkippedError so one bad file never stops
 * the rest of the corpus.
 */
export class DocumentProcessingWorker {
  constructor(
    private readonly source: DocumentSource,
    private readonly parser: DocumentParser,
    private readonly textCleaner: TextCleaningService,
    private readonly chunker: ChunkingService,
    private readonly ledger: DocumentLedger,
    private readonly retryDelayMs: number = RETRY_DELAY_MS
  ) {}

  private calculateFileHash(buffer: Buffer): string {
    return createHash('sha256').update(buffer).digest('hex');
  }

  async processDocument(documentName: string): Promise<ProcessedDocument> {
    log.debug(`Starting document processing - ${documentName}`);

    const buffer = await this.readWithRetry(documentName);
    const fileHash = this.calculateFileHash(buffer);
    await this.recordInLedger(documentName, () => this.ledger.markProcessing(documentName, fileHash));

    let extraction: ExtractionResult;
    try {
      extraction = await this.parser.extractPages(buffer, documentName);
    } catch (error) {
      return this.skip(documentName, `parse failed: ${errorMessage(error)}`, fileHash, error);
    }

    const pages = extraction.pages
      .map(page => ({ pageNumber: page.pageNumber, text: this.textCleaner.cleanText(page.text) }))
      .filter(page => page.text.length > 0);

    const extraMetadata: Record<string, string | number> = { file_hash: fileHash };
    if (extraction.title) {
      extraMetadata.title = extraction.title;
    }
    const chunks = this.chunker.chunkPages(pages, documentName, extraMetadata);

    if (chunks.length === 0) {
      return this.skip(documentName, 'no extractable text', fileHash);
    }

    log.info(`Processed ${documentName}: ${extraction.pageCount} page(s), ${chunks.length} chunk(s)`);
    return { documentName, fileHash, pageCount: extraction.pageCount, chunks };
  }

  private async readWithRetry(documentName: string): Promise<Buffer> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= MAX_READ_RETRIES; attempt++) {
      try {
        return await this.source.read(documentName);
      } catch (error) {
        lastError = error;
        log.warn(`Reading ${documentName} failed (attempt ${attempt}/${MAX_READ_RETRIES}): ${errorMessage(error)}`);
        if (attempt < MAX_READ_RETRIES) {
          await sleep(this.retryDelayMs * attempt);
        }
      }
    }
    return this.skip(documentName, `read failed: ${errorMessage(lastError)}`, undefined, lastError);
  }

  private async skip(documentName: string, reason: string, fileHash?: string, cause?: unknown): Promise<never> {
    log.warn(`Skipping ${documentName}: ${reason}`);
    await this.recordInLedger(documentName, () => this.ledger.markSkipped(documentName, reason, fileHash));
    throw new DocumentSkippedError(documentName, reason, cause);
  }

  // Ledger outages are logged; they never decide whether a document is indexed
  private async recordInLedger(documentName: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      log.warn(`Could not record ${documentName} in the document ledger: ${errorMessage(error)}`);
    }
  }
}
