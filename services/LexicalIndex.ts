import { Bm25Options } from '../config';
import { Chunk, ScoredChunkId } from '../types';
import { termFrequencies, tokenize } from '../utils/tokenizer';

interface Posting {
  /** position of the chunk in the build input */
  slot: number;
  /** term frequency within the chunk */
  tf: number;
}

interface PostingsList {
  df: number;
  postings: Posting[];
}

export const DEFAULT_BM25: Bm25Options = { k1: 1.2, b: 0.75 };

/**
 * Okapi BM25 over an immutable chunk set. Built once per corpus generation.
 */
export class LexicalIndex {
  private readonly postings = new Map<string, PostingsList>();
  private readonly chunkIds: string[] = [];
  private readonly chunkLengths: number[] = [];
  private readonly avgChunkLength: number;
  private readonly k1: number;
  private readonly b: number;

  private constructor(chunks: readonly Chunk[], options: Bm25Options) {
    this.k1 = options.k1;
    this.b = options.b;

    let totalLength = 0;
    chunks.forEach((chunk, slot) => {
      const tokens = tokenize(chunk.text);
      this.chunkIds.push(chunk.id);
      this.chunkLengths.push(tokens.length);
      totalLength += tokens.length;

      for (const [term, tf] of termFrequencies(tokens)) {
        let list = this.postings.get(term);
        if (!list) {
          list = { df: 0, postings: [] };
          this.postings.set(term, list);
        }
        list.df++;
        list.postings.push({ slot, tf });
      }
    });

    this.avgChunkLength = chunks.length > 0 ? totalLength / chunks.length : 0;
  }

  static build(chunks: readonly Chunk[], options: Bm25Options = DEFAULT_BM25): LexicalIndex {
    return new LexicalIndex(chunks, options);
  }

  get size(): number {
    return this.chunkIds.length;
  }

  /** Non-negative BM25 IDF: ln(1 + (N - df + 0.5) / (df + 0.5)). */
  idf(term: string): number {
    const df = this.postings.get(term)?.df ?? 0;
    const n = this.chunkIds.length;
    return Math.log(1 + (n - df + 0.5) / (df + 0.5));
  }

  /**
   * Contribution of one term to a chunk's score. Exposed for tests and
   * score explanations.
   */
  termScore(idf: number, tf: number, chunkLength: number): number {
    if (tf <= 0) return 0;
    const lengthRatio = this.avgChunkLength > 0 ? chunkLength / this.avgChunkLength : 0;
    const denominator = tf + this.k1 * (1 - this.b + this.b * lengthRatio);
    return idf * (tf * (this.k1 + 1)) / denominator;
  }

  /**
   * Top-k chunks by BM25. Chunks sharing no term with the query are not
   * returned; equal scores keep build order.
   */
  search(queryText: string, k: number): ScoredChunkId[] {
    if (k <= 0 || this.chunkIds.length === 0) {
      return [];
    }

    // Repeated query terms count once
    const queryTerms = [...new Set(tokenize(queryText))];
    if (queryTerms.length === 0) {
      return [];
    }

    const scores = new Map<number, number>();
    for (const term of queryTerms) {
      const list = this.postings.get(term);
      if (!list) continue;

      const idf = this.idf(term);
      for (const { slot, tf } of list.postings) {
        const contribution = this.termScore(idf, tf, this.chunkLengths[slot]);
        scores.set(slot, (scores.get(slot) ?? 0) + contribution);
      }
    }

    return [...scores.entries()]
      .filter(([, score]) => score > 0)
      .sort((a, b) => b[1] - a[1] || a[0] - b[0])
      .slice(0, k)
      .map(([slot, score]) => ({ chunkId: this.chunkIds[slot], score }));
  }
}
