import { ChunkingService } from '../services/ChunkingService';
import { InMemoryDocumentLedger } from '../services/DatabaseService';
import { LocalEmbeddingService } from '../services/EmbeddingService';
import { ConfigurationError, IndexUnavailableError } from '../utils/errors';
import { setLogLevel } from '../utils/logger';
import { FakeDocumentSource, FakeParser, createTestCorpus } from './helpers';

beforeAll(() => setLogLevel('error'));

class UnreachableLedger extends InMemoryDocumentLedger {
  async markProcessing(): Promise<void> {
    throw new Error('mongo down');
  }

  async markIndexed(): Promise<void> {
    throw new Error('mongo down');
  }

  async markSkipped(): Promise<void> {
    throw new Error('mongo down');
  }
}

function standardParser(): FakeParser {
  return new FakeParser()
    .add('alpha.pdf', [
      { pageNumber: 1, text: 'Alpha covers gradient boosting and decision trees.' },
      { pageNumber: 2, text: 'Alpha also mentions random forests.' }
    ])
    .add('beta.pdf', [{ pageNumber: 1, text: 'Beta is about convolutional neural networks.' }]);
}

describe('CorpusManager', () => {
  it('should build lazily on the first query', async () => {
    const { corpus } = createTestCorpus(new FakeDocumentSource(['alpha.pdf', 'beta.pdf']), standardParser());
    expect(corpus.getState()).toBe('empty');

    const generation = await corpus.ensureReady();

    expect(corpus.getState()).toBe('ready');
    expect(generation.version).toBe(1);
    expect(generation.chunks.map(c => c.id)).toEqual([
      'alpha.pdf::p1::chunk::0',
      'alpha.pdf::p2::chunk::1',
      'beta.pdf::p1::chunk::0'
    ]);
    expect(generation.chunks.map(c => c.ordinal)).toEqual([0, 1, 2]);
    expect(await corpus.ensureReady()).toBe(generation);
  });

  it('should share one in-flight build between concurrent queries', async () => {
    const parser = standardParser();
    const { corpus } = createTestCorpus(new FakeDocumentSource(['alpha.pdf', 'beta.pdf']), parser);

    const [a, b, c] = await Promise.all([corpus.ensureReady(), corpus.ensureReady(), corpus.initialize()]);

    expect(b).toBe(a);
    expect(c).toBe(a);
    expect(parser.calls.sort()).toEqual(['alpha.pdf', 'beta.pdf']);
  });

  it('should queue one more build when reloads arrive during a build', async () => {
    const { corpus, source } = createTestCorpus(new FakeDocumentSource(['alpha.pdf']), standardParser());
    let release: () => void = () => undefined;
    source.listGate = new Promise<void>(resolve => {
      release = resolve;
    });

    const first = corpus.reload();
    await source.save('beta.pdf', Buffer.from('%PDF-fake beta'));
    const second = corpus.reload();
    const third = corpus.reload();
    expect(corpus.getState()).toBe('loading');

    source.listGate = null;
    release();
    const [a, b, c] = await Promise.all([first, second, third]);

    expect(a.version).toBe(1);
    expect(a.documents.map(d => d.documentName)).toEqual(['alpha.pdf']);
    expect(b.version).toBe(2);
    expect(b.documents.map(d => d.documentName)).toEqual(['alpha.pdf', 'beta.pdf']);
    expect(c).toBe(b);
    expect(corpus.getGeneration()).toBe(b);
  });

  it('should produce identical chunks and rankings when rebuilt from the same documents', async () => {
    const { corpus } = createTestCorpus(new FakeDocumentSource(['alpha.pdf', 'beta.pdf']), standardParser());

    const first = await corpus.initialize();
    const second = await corpus.reload();

    expect(second).not.toBe(first);
    expect(second.version).toBe(2);
    expect(second.chunks).toEqual(first.chunks);
    const firstResults = await first.retriever.retrieve('decision trees', 3);
    const secondResults = await second.retriever.retrieve('decision trees', 3);
    expect(secondResults).toEqual(firstResults);
  });

  it('should skip a corrupt document and index the rest', async () => {
    const { corpus, ledger } = createTestCorpus(
      new FakeDocumentSource(['alpha.pdf', 'broken.pdf', 'beta.pdf']),
      standardParser()
    );

    const generation = await corpus.ensureReady();

    expect(generation.documents.map(d => [d.documentName, d.status])).toEqual([
      ['alpha.pdf', 'indexed'],
      ['beta.pdf', 'indexed'],
      ['broken.pdf', 'skipped']
    ]);
    expect(generation.documents[2].reason).toBe('parse failed: Invalid PDF structure');
    expect(generation.chunks.some(c => c.documentName === 'broken.pdf')).toBe(false);

    const record = await ledger.getDocument('broken.pdf');
    expect(record?.status).toBe('skipped');
    expect((await ledger.getDocument('alpha.pdf'))?.status).toBe('indexed');
    expect((await ledger.getDocument('alpha.pdf'))?.chunkCount).toBe(2);
  });

  it('should keep indexing when the document ledger is unreachable', async () => {
    const { corpus } = createTestCorpus(
      new FakeDocumentSource(['alpha.pdf', 'broken.pdf']),
      standardParser(),
      {},
      new LocalEmbeddingService(64),
      new ChunkingService(),
      new UnreachableLedger()
    );

    const generation = await corpus.ensureReady();

    expect(generation.documents).toEqual([
      expect.objectContaining({ documentName: 'alpha.pdf', status: 'indexed', chunkCount: 2 }),
      expect.objectContaining({ documentName: 'broken.pdf', status: 'skipped', reason: 'parse failed: Invalid PDF structure' })
    ]);
    expect(generation.chunks).toHaveLength(2);
  });

  it('should skip a document without extractable text', async () => {
    const parser = standardParser().add('scan.pdf', [{ pageNumber: 1, text: ' \n ' }]);
    const { corpus } = createTestCorpus(new FakeDocumentSource(['alpha.pdf', 'scan.pdf']), parser);

    const generation = await corpus.ensureReady();
    const scan = generation.documents.find(d => d.documentName === 'scan.pdf');
    expect(scan).toMatchObject({ status: 'skipped', reason: 'no extractable text' });
  });

  it('should raise ConfigurationError for an empty source and enter failed', async () => {
    const { corpus } = createTestCorpus(new FakeDocumentSource([]), standardParser());

    await expect(corpus.initialize()).rejects.toThrow('No PDF files found in fake source. Please add PDF files to index.');
    expect(corpus.getState()).toBe('failed');
    await expect(corpus.ensureReady()).rejects.toBeInstanceOf(ConfigurationError);
  });

  describe('validateSource', () => {
    it('should list the PDFs without building', async () => {
      const parser = standardParser();
      const { corpus } = createTestCorpus(new FakeDocumentSource(['beta.pdf', 'alpha.pdf']), parser);

      expect(await corpus.validateSource()).toEqual(['alpha.pdf', 'beta.pdf']);
      expect(corpus.getState()).toBe('empty');
      expect(parser.calls).toEqual([]);
    });

    it('should reject an empty source', async () => {
      const { corpus } = createTestCorpus(new FakeDocumentSource([]), standardParser());

      await expect(corpus.validateSource()).rejects.toThrow(
        new ConfigurationError('No PDF files found in fake source. Please add PDF files to index.')
      );
      expect(corpus.getState()).toBe('empty');
    });

    it('should reject an unreadable source', async () => {
      const source = new FakeDocumentSource(['alpha.pdf']);
      source.listError = new Error('permission denied');
      const { corpus } = createTestCorpus(source, standardParser());

      await expect(corpus.validateSource()).rejects.toBeInstanceOf(ConfigurationError);
      await expect(corpus.validateSource()).rejects.toThrow(
        'Document source fake source is not readable: permission denied'
      );
    });
  });

  it('should raise ConfigurationError when no document is indexable', async () => {
    const { corpus } = createTestCorpus(new FakeDocumentSource(['broken.pdf']), new FakeParser());
    await expect(corpus.ensureReady()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should report IndexUnavailable in eager mode before the first build', async () => {
    const { corpus } = createTestCorpus(new FakeDocumentSource(['alpha.pdf']), standardParser(), { mode: 'eager' });

    await expect(corpus.ensureReady()).rejects.toBeInstanceOf(IndexUnavailableError);
    await corpus.initialize();
    expect(corpus.getState()).toBe('ready');
  });

  it('should keep serving the current generation while reloading', async () => {
    const { corpus } = createTestCorpus(new FakeDocumentSource(['alpha.pdf', 'beta.pdf']), standardParser());
    const first = await corpus.initialize();

    const reloading = corpus.reload();
    expect(corpus.getState()).toBe('reloading');
    expect(await corpus.ensureReady()).toBe(first);

    const second = await reloading;
    expect(corpus.getState()).toBe('ready');
    expect(corpus.getGeneration()).toBe(second);
  });

  it('should keep the previous generation when a reload fails', async () => {
    const { corpus, source } = createTestCorpus(new FakeDocumentSource(['alpha.pdf']), standardParser());
    const first = await corpus.initialize();

    source.listError = new Error('bucket unreachable');
    await expect(corpus.reload()).rejects.toBeInstanceOf(ConfigurationError);

    expect(corpus.getState()).toBe('ready');
    expect(corpus.getGeneration()).toBe(first);
    expect(corpus.status().lastError).toBe('Document source fake source is not readable: bucket unreachable');
  });

  it('should pick up new documents on reload', async () => {
    const parser = standardParser();
    const { corpus, source } = createTestCorpus(new FakeDocumentSource(['alpha.pdf']), parser);
    await corpus.initialize();

    await source.save('beta.pdf', Buffer.from('%PDF-fake beta'));
    const generation = await corpus.reload();

    expect(generation.documents.map(d => d.documentName)).toEqual(['alpha.pdf', 'beta.pdf']);
    expect(corpus.status()).toMatchObject({ state: 'ready', generation: 2, chunkCount: 3, semanticChunkCount: 3 });
  });

  it('should drop the vectors of generations no query can reach', async () => {
    const { corpus, store } = createTestCorpus(new FakeDocumentSource(['alpha.pdf']), standardParser());

    await corpus.initialize();
    await corpus.reload();
    expect(store.namespaceSize('gen-1')).toBe(2);

    await corpus.reload();
    expect(store.namespaceSize('gen-1')).toBe(0);
    expect(store.namespaceSize('gen-2')).toBe(2);
    expect(store.namespaceSize('gen-3')).toBe(2);
  });
});
