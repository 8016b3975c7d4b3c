import { FusionOptions } from '../config';
import { Chunk, RetrievalResult, ScoredChunkId } from '../types';
import { RetrievalTimeoutError } from '../utils/errors';
import { withTimeout } from '../utils/concurrency';
import { createLogger } from '../utils/logger';
import { minMaxNormalize } from '../utils/scoreNormalization';
import { LexicalIndex } from './LexicalIndex';
import { SemanticIndex } from './SemanticIndex';

const log = createLogger('HybridRetriever');

export const DEFAULT_FUSION: FusionOptions = { lexicalWeight: 0.5, candidateMultiplier: 2 };

export interface FusedCandidate {
  chunkId: string;
  fusedScore: number;
  lexicalScore: number;
  semanticScore: number;
  lexicalRank: number | null;
  semanticRank: number | null;
  rawLexicalScore: number | null;
  rawSemanticScore: number | null;
}

/**
 * Weighted-sum fusion of two ranked lists.
 *
 * Each list is min-max normalized on its own, then
 * `fused = lexicalWeight * lexical + (1 - lexicalWeight) * semantic`, a
 * source that did not return a chunk contributing 0. Order: fused score
 * desc, then the better of the two source ranks, then `ordinalOf(chunkId)`.
 */
export function fuseRankings(
  lexical: readonly ScoredChunkId[],
  semantic: readonly ScoredChunkId[],
  k: number,
  lexicalWeight: number,
  ordinalOf: (chunkId: string) => number
): FusedCandidate[] {
  const semanticWeight = 1 - lexicalWeight;
  const candidates = new Map<string, FusedCandidate>();

  const entry = (chunkId: string): FusedCandidate => {
    let candidate = candidates.get(chunkId);
    if (!candidate) {
      candidate = {
        chunkId,
        fusedScore: 0,
        lexicalScore: 0,
        semanticScore: 0,
        lexicalRank: null,
        semanticRank: null,
        rawLexicalScore: null,
        rawSemanticScore: null
      };
      candidates.set(chunkId, candidate);
    }
    return candidate;
  };

  const lexicalNormalized = minMaxNormalize(lexical.map(r => r.score));
  lexical.forEach((result, rank) => {
    const candidate = entry(result.chunkId);
    if (candidate.lexicalRank !== null) return;
    candidate.lexicalRank = rank;
    candidate.rawLexicalScore = result.score;
    candidate.lexicalScore = lexicalNormalized[rank];
  });

  const semanticNormalized = minMaxNormalize(semantic.map(r => r.score));
  semantic.forEach((result, rank) => {
    const candidate = entry(result.chunkId);
    if (candidate.semanticRank !== null) return;
    candidate.semanticRank = rank;
    candidate.rawSemanticScore = result.score;
    candidate.semanticScore = semanticNormalized[rank];
  });

  for (const candidate of candidates.values()) {
    candidate.fusedScore = lexicalWeight * candidate.lexicalScore + semanticWeight * candidate.semanticScore;
  }

  const bestRank = (candidate: FusedCandidate): number =>
    Math.min(candidate.lexicalRank ?? Infinity, candidate.semanticRank ?? Infinity);

  return [...candidates.values()]
    .sort((a, b) =>
      b.fusedScore - a.fusedScore ||
      bestRank(a) - bestRank(b) ||
      ordinalOf(a.chunkId) - ordinalOf(b.chunkId)
    )
    .slice(0, Math.max(0, k));
}

export interface RetrieveOptions {
  /** Aborts both sub-searches and throws RetrievalTimeoutError when exceeded. */
  timeoutMs?: number;
}

/**
 * Hybrid fusion ranker over one corpus generation's index pair.
 */
export class HybridRetriever {
  private readonly chunksById: ReadonlyMap<string, Chunk>;
  private readonly options: FusionOptions;

  constructor(
    private readonly lexical: LexicalIndex,
    private readonly semantic: SemanticIndex,
    chunks: readonly Chunk[],
    options: FusionOptions = DEFAULT_FUSION
  ) {
    if (options.lexicalWeight < 0 || options.lexicalWeight > 1) {
      throw new Error(`lexicalWeight must be in [0,1], got ${options.lexicalWeight}`);
    }
    this.chunksById = new Map(chunks.map(chunk => [chunk.id, chunk]));
    this.options = options;
  }

  async retrieve(queryText: string, k: number, options: RetrieveOptions = {}): Promise<RetrievalResult[]> {
    if (k <= 0 || queryText.trim().length === 0) {
      return [];
    }

    const candidatePool = Math.max(k, k * this.options.candidateMultiplier);
    const runBoth = async (signal?: AbortSignal) => {
      const lexicalSearch = Promise.resolve().then(() => this.lexical.search(queryText, candidatePool));
      const semanticSearch = this.semantic.search(queryText, candidatePool, signal);
      return Promise.all([lexicalSearch, semanticSearch]);
    };

    const [lexicalResults, semanticResults] = options.timeoutMs !== undefined
      ? await withTimeout(options.timeoutMs, runBoth, () => new RetrievalTimeoutError(options.timeoutMs ?? 0))
      : await runBoth();

    log.debug(`"${queryText}": ${lexicalResults.length} lexical, ${semanticResults.length} semantic candidates`);

    const fused = fuseRankings(
      lexicalResults,
      semanticResults,
      k,
      this.options.lexicalWeight,
      chunkId => this.chunksById.get(chunkId)?.ordinal ?? Number.MAX_SAFE_INTEGER
    );

    const results: RetrievalResult[] = [];
    for (const candidate of fused) {
      const chunk = this.chunksById.get(candidate.chunkId);
      if (!chunk) {
        log.warn(`Dropping unknown chunk id ${candidate.chunkId}`);
        continue;
      }
      results.push({
        chunk,
        fusedScore: candidate.fusedScore,
        lexicalScore: candidate.lexicalScore,
        semanticScore: candidate.semanticScore,
        lexicalRank: candidate.lexicalRank,
        semanticRank: candidate.semanticRank,
        rawLexicalScore: candidate.rawLexicalScore,
        rawSemanticScore: candidate.rawSemanticScore
      });
    }
    return results;
  }
}
