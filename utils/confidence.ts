import { clamp01 } from './scoreNormalization';

/**
 * Confidence of an answer: mean fused score of the chunks it was grounded
 * on, clamped to [0,1] and rounded to 4 decimals. No chunks → 0.
 */
export function computeConfidence(fusedScores: readonly number[]): number {
  if (fusedScores.length === 0) {
    return 0;
  }
  const mean = fusedScores.reduce((sum, score) => sum + score, 0) / fusedScores.length;
  return Math.round(clamp01(mean) * 10000) / 10000;
}
