import { EmbeddingOutcome, LocalEmbeddingService } from '../services/EmbeddingService';
import { SemanticIndex } from '../services/SemanticIndex';
import { InMemoryVectorStore, cosineSimilarity } from '../services/VectorStore';
import { setLogLevel } from '../utils/logger';
import { FailingEmbeddings, makeChunk } from './helpers';

beforeAll(() => setLogLevel('error'));

describe('LocalEmbeddingService', () => {
  const embeddings = new LocalEmbeddingService(64);

  it('should be deterministic and unit length', async () => {
    const a = await embeddings.embedText('Decision trees split on features');
    const b = await embeddings.embedText('Decision trees split on features');
    expect(a).toEqual(b);
    expect(a).toHaveLength(64);
    expect(Math.sqrt(a.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1, 10);
  });

  it('should place related text closer than unrelated text', async () => {
    const wide = new LocalEmbeddingService(512);
    const query = await wide.embedText('neural networks');
    const related = await wide.embedText('deep neural networks learn representations');
    const unrelated = await wide.embedText('quarterly tax filing deadline');
    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('should return the zero vector for text without words', async () => {
    expect(await embeddings.embedText('  ...  ')).toEqual(new Array(64).fill(0));
  });

  it('should refuse to embed once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(embeddings.embedText('text', { signal: controller.signal })).rejects.toThrow('Operation aborted');
  });
});

describe('InMemoryVectorStore', () => {
  it('should order by cosine similarity and keep upsert order on ties', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('ns', [
      { id: 'a', values: [1, 0] },
      { id: 'b', values: [0, 1] },
      { id: 'c', values: [0, 2] }
    ]);

    const matches = await store.query('ns', [0, 1], 3);
    expect(matches.map(m => m.id)).toEqual(['b', 'c', 'a']);
    expect(matches[0].score).toBeCloseTo(1, 10);
    expect(matches[2].score).toBe(0);
  });

  it('should keep namespaces apart and delete them whole', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('gen-1', [{ id: 'a', values: [1, 0] }]);
    await store.upsert('gen-2', [{ id: 'b', values: [1, 0] }]);
    await store.deleteNamespace('gen-1');

    expect(await store.query('gen-1', [1, 0], 5)).toEqual([]);
    expect(store.namespaceSize('gen-2')).toBe(1);
  });

  it('should reject mixed dimensions', async () => {
    const store = new InMemoryVectorStore();
    await expect(
      store.upsert('ns', [{ id: 'a', values: [1, 0] }, { id: 'b', values: [1, 0, 0] }])
    ).rejects.toThrow('Vector dimension mismatch');
  });
});

describe('SemanticIndex', () => {
  const chunks = [
    makeChunk('ml.pdf', 1, 0, 'Gradient boosting combines many weak decision trees'),
    makeChunk('ml.pdf', 2, 1, 'Convolutional neural networks process images'),
    makeChunk('ml.pdf', 3, 2, 'Invoices are due thirty days after delivery')
  ];

  it('should rank a chunk first when queried with its own text', async () => {
    const store = new InMemoryVectorStore();
    const index = await SemanticIndex.build(chunks, new LocalEmbeddingService(64), store, 'gen-1');

    for (const chunk of chunks) {
      const results = await index.search(chunk.text, 3);
      expect(results[0].chunkId).toBe(chunk.id);
      expect(results[0].score).toBeCloseTo(1, 10);
      for (const result of results) {
        expect(result.score).toBeGreaterThanOrEqual(0);
        expect(result.score).toBeLessThanOrEqual(1);
      }
    }
    expect(index.size).toBe(3);
    expect(store.namespaceSize('gen-1')).toBe(3);
  });

  it('should return nothing for a blank query or k <= 0', async () => {
    const index = await SemanticIndex.build(chunks, new LocalEmbeddingService(64), new InMemoryVectorStore(), 'gen-1');
    expect(await index.search('   ', 3)).toEqual([]);
    expect(await index.search('trees', 0)).toEqual([]);
  });

  it('should leave out chunks whose embedding failed, within the tolerated ratio', async () => {
    const local = new LocalEmbeddingService(64);
    const partial = {
      modelName: 'partial',
      getDimension: () => 64,
      embedText: (text: string) => local.embedText(text),
      embedTexts: async (texts: string[]): Promise<EmbeddingOutcome[]> => {
        const outcomes = await local.embedTexts(texts);
        return outcomes.map((outcome, i) => (i === 1 ? { embedding: null, error: new Error('rate limited') } : outcome));
      }
    };

    const index = await SemanticIndex.build(chunks, partial, new InMemoryVectorStore(), 'gen-1', { maxFailureRatio: 0.5 });
    expect(index.missingChunkIds).toEqual(['ml.pdf::p2::chunk::1']);
    expect(index.has('ml.pdf::p2::chunk::1')).toBe(false);
    const results = await index.search(chunks[1].text, 3);
    expect(results.map(r => r.chunkId)).not.toContain('ml.pdf::p2::chunk::1');
  });

  it('should fail the build when too many embeddings fail', async () => {
    await expect(
      SemanticIndex.build(chunks, new FailingEmbeddings(), new InMemoryVectorStore(), 'gen-1', { maxFailureRatio: 0.1 })
    ).rejects.toThrow('Too many embedding failures: 3/3 chunks (limit 10%)');
  });

  it('should drop its namespace', async () => {
    const store = new InMemoryVectorStore();
    const index = await SemanticIndex.build(chunks, new LocalEmbeddingService(64), store, 'gen-7');
    await index.drop();
    expect(store.namespaceSize('gen-7')).toBe(0);
  });
});
