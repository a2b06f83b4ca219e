import { cosine } from "./embedding";
import { DEFAULT_MATCHER, type MatcherConfig } from "./config";
import type { MatchResult, MovieFingerprint } from "./types";

/**
 * Decide whether two fingerprints describe the same film.
 *
 * Non-null external ids on both sides decide alone. Otherwise title
 * embedding cosine, runtime agreement and year agreement are averaged with
 * their weights renormalized over the signals both sides carry.
 */
export function sameMovie(
  a: MovieFingerprint,
  b: MovieFingerprint,
  config: MatcherConfig = DEFAULT_MATCHER,
): MatchResult {
  if (a.sourceId !== null && b.sourceId !== null) {
    const equal = a.sourceId === b.sourceId;
    return { isMatch: equal, confidence: equal ? 1 : 0 };
  }

  const signals: Array<{ weight: number; score: number }> = [];

  if (a.titleEmbedding !== null && b.titleEmbedding !== null) {
    const sim = cosine(a.titleEmbedding, b.titleEmbedding);
    signals.push({ weight: config.weights.title, score: Math.min(Math.max(sim, 0), 1) });
  }
  if (a.runtimeMinutes !== null && b.runtimeMinutes !== null) {
    const close = Math.abs(a.runtimeMinutes - b.runtimeMinutes) <= config.runtimeToleranceMin;
    signals.push({ weight: config.weights.runtime, score: close ? 1 : 0 });
  }
  if (a.releaseYear !== null && b.releaseYear !== null) {
    const close = Math.abs(a.releaseYear - b.releaseYear) <= config.yearTolerance;
    signals.push({ weight: config.weights.year, score: close ? 1 : 0 });
  }

  const totalWeight = signals.reduce((sum, s) => sum + s.weight, 0);
  if (totalWeight <= 0) return { isMatch: false, confidence: 0 };

  // Normalize weights first so a lone signal reports its score unchanged
  const confidence = signals.reduce(
    (sum, s) => sum + (s.weight / totalWeight) * s.score,
    0,
  );
  return { isMatch: confidence >= config.threshold, confidence };
}
