import { Index, Pinecone } from '@pinecone-database/pinecone';
import { createLogger } from '../utils/logger';
import { VectorMetric } from '../utils/scoreNormalization';
import { VectorMatch, VectorRecord, VectorStore } from './VectorStore';

const log = createLogger('PineconeService');

/**
 * Pinecone-backed vector store. Every corpus generation writes into its own
 * namespace, so a half-written generation is never visible to queries.
 */
export class PineconeService implements VectorStore {
  readonly kind = 'pinecone';
  private pinecone: Pinecone;
  private index: Index;
  private indexName: string;
  private dimension: number;
  private metric: VectorMetric | null = null;
  private readonly UPSERT_BATCH_SIZE = 100;

  constructor(apiKey: string, indexName: string, dimension: number) {
    this.pinecone = new Pinecone({ apiKey });
    this.index = this.pinecone.index(indexName);
    this.indexName = indexName;
    this.dimension = dimension;
  }

  async getMetric(): Promise<VectorMetric> {
    if (this.metric) {
      return this.metric;
    }
    try {
      const description = await this.pinecone.describeIndex(this.indexName);
      const metric = description.metric;
      this.metric = metric === 'euclidean' || metric === 'dotproduct' ? metric : 'cosine';
      if (description.dimension !== undefined && description.dimension !== this.dimension) {
        log.warn(`Index dimension (${description.dimension}) doesn't match configured dimension (${this.dimension})`);
      }
    } catch (error) {
      log.warn(`Could not describe index ${this.indexName}, assuming cosine:`, error);
      this.metric = 'cosine';
    }
    return this.metric;
  }

  async upsert(namespace: string, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const firstDimension = records[0].values.length;
    for (const record of records) {
      if (record.values.length !== firstDimension) {
        throw new Error(`Vector dimension mismatch: expected ${firstDimension} but found ${record.values.length}`);
      }
    }
    if (firstDimension !== this.dimension) {
      throw new Error(
        `Vectors have ${firstDimension} dimensions but Pinecone index ${this.indexName} is configured for ${this.dimension}. ` +
        `Recreate the index or change EMBEDDING_DIMENSION to match your embedding model.`
      );
    }

    const target = this.index.namespace(namespace);
    try {
      for (let i = 0; i < records.length; i += this.UPSERT_BATCH_SIZE) {
        const batch = records.slice(i, i + this.UPSERT_BATCH_SIZE);
        await target.upsert(batch.map(record => ({
          id: record.id,
          values: record.values,
          ...(record.metadata ? { metadata: record.metadata } : {})
        })));
      }
    } catch (error) {
      throw new Error(`Failed to upsert vectors to Pinecone: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]> {
    if (topK <= 0) {
      return [];
    }
    try {
      const response = await this.index.namespace(namespace).query({
        vector,
        topK,
        includeMetadata: false,
        includeValues: false
      });
      return response.matches.map(match => ({ id: match.id, score: match.score ?? 0 }));
    } catch (error) {
      throw new Error(`Failed to query Pinecone: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async deleteNamespace(namespace: string): Promise<void> {
    try {
      await this.index.namespace(namespace).deleteAll();
    } catch (error) {
      throw new Error(`Failed to delete Pinecone namespace ${namespace}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
