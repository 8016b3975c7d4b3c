export type VectorMetric = 'cosine' | 'euclidean' | 'dotproduct';

/**
 * Maps a raw vector-store score onto [0,1] so scores from different
 * metrics are comparable. Monotonic in similarity for every metric.
 */
export function normalizeScore(rawScore: number, metric: VectorMetric = 'cosine'): number {
  if (!Number.isFinite(rawScore)) return 0;

  if (metric === 'cosine') {
    // Cosine lives in [-1, 1]
    return clamp01((rawScore + 1) / 2);
  } else if (metric === 'dotproduct') {
    // Unit vectors: dot product equals cosine
    return clamp01((rawScore + 1) / 2);
  } else {
    // Euclidean distance: smaller is closer
    return clamp01(1 / (1 + Math.max(0, rawScore)));
  }
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * Min-max normalization of one ranked list. A non-empty list whose scores
 * are all equal maps every entry to 1 (each is the best that source found).
 */
export function minMaxNormalize(scores: number[]): number[] {
  if (scores.length === 0) return [];

  let min = Infinity;
  let max = -Infinity;
  for (const score of scores) {
    if (score < min) min = score;
    if (score > max) max = score;
  }

  const range = max - min;
  if (range <= 0) {
    return scores.map(() => 1);
  }
  return scores.map(score => (score - min) / range);
}
