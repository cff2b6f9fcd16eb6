/**
 * Quality gate between stages: an item moves on only if its feedback score
 * reaches the threshold. The comparison is inclusive.
 */

export function passesQualityGate(score: number, threshold: number): boolean {
  return score >= threshold;
}

export interface NormalizedScore {
  score: number;
  /** True when the raw value was outside [0, 1] or not a number. */
  adjusted: boolean;
}

export function normalizeScore(raw: number): NormalizedScore {
  if (!Number.isFinite(raw)) return { score: 0, adjusted: true };
  if (raw < 0) return { score: 0, adjusted: true };
  if (raw > 1) return { score: 1, adjusted: true };
  return { score: raw, adjusted: false };
}

export function meanScore(scores: readonly number[]): number {
  if (scores.length === 0) return 0;
  return scores.reduce((total, score) => total + score, 0) / scores.length;
}
