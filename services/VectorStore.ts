import { VectorMetric } from '../utils/scoreNormalization';

export type VectorRecordMetadata = Record<string, string | number | boolean>;

export interface VectorRecord {
  id: string;
  values: number[];
  metadata?: VectorRecordMetadata;
}

export interface VectorMatch {
  id: string;
  /** Raw metric score; higher is closer for cosine and dotproduct, lower for euclidean. */
  score: number;
}

/**
 * Nearest-neighbour storage, partitioned into namespaces so each corpus
 * generation owns its own vectors.
 */
export interface VectorStore {
  readonly kind: string;
  getMetric(): Promise<VectorMetric>;
  upsert(namespace: string, records: VectorRecord[]): Promise<void>;
  query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]>;
  deleteNamespace(namespace: string): Promise<void>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Exact cosine search held in process memory. Equal scores keep upsert
 * order.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly kind = 'memory';
  private namespaces = new Map<string, Map<string, VectorRecord>>();

  async getMetric(): Promise<VectorMetric> {
    return 'cosine';
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

    let store = this.namespaces.get(namespace);
    if (!store) {
      store = new Map();
      this.namespaces.set(namespace, store);
    }
    for (const record of records) {
      store.set(record.id, { ...record, values: [...record.values] });
    }
  }

  async query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]> {
    const store = this.namespaces.get(namespace);
    if (!store || topK <= 0) {
      return [];
    }

    const matches = [...store.values()].map((record, position) => ({
      id: record.id,
      score: cosineSimilarity(vector, record.values),
      position
    }));

    return matches
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, topK)
      .map(({ id, score }) => ({ id, score }));
  }

  async deleteNamespace(namespace: string): Promise<void> {
    this.namespaces.delete(namespace);
  }

  namespaceSize(namespace: string): number {
    return this.namespaces.get(namespace)?.size ?? 0;
  }
}
