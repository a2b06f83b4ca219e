import { distance } from "fastest-levenshtein";

/**
 * Normalize title for comparison:
 * - Lowercase
 * - Remove diacritics (Amélie → Amelie)
 * - Strip leading articles (The, A, An)
 * - Remove punctuation (letters in any script are kept)
 * - Collapse whitespace
 */
export function normalizeTitle(title: string): string {
  return (
    title
      .toLowerCase()
      // Remove diacritics
      .normalize("NFD")
      .replace(/[\u0300-\u036f]/g, "")
      // Remove leading articles
      .replace(/^(the|a|an)\s+/i, "")
      // Remove punctuation
      .replace(/[^\p{L}\p{N}\s]/gu, "")
      // Collapse whitespace
      .replace(/\s+/g, " ")
      .trim()
  );
}

/**
 * Similarity on pre-normalized strings (avoids redundant normalizeTitle calls)
 */
function similarityNormalized(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  const dist = distance(a, b);
  const maxLen = Math.max(a.length, b.length);

  return Math.max(0, 1 - dist / maxLen);
}

/**
 * Calculate similarity between two titles (0-1 scale)
 * Uses Levenshtein distance normalized by max length
 */
export function titleSimilarity(a: string, b: string): number {
  return similarityNormalized(normalizeTitle(a), normalizeTitle(b));
}

/**
 * Best candidate whose normalized similarity to `target` is at least
 * `cutoff`, or null. Ties keep the earliest candidate.
 */
export function fuzzyMatch(
  target: string,
  candidates: readonly string[],
  cutoff = 0.8,
): string | null {
  const normTarget = normalizeTitle(target);
  if (normTarget.length === 0) return null;

  let best: string | null = null;
  let bestScore = cutoff;
  for (const candidate of candidates) {
    const score = similarityNormalized(normTarget, normalizeTitle(candidate));
    if (score >= bestScore && (best === null || score > bestScore)) {
      best = candidate;
      bestScore = score;
    }
    if (bestScore === 1) break; // Can't do better
  }
  return best;
}

/** Two titles name the same film once normalized. Blank titles never match. */
export function sameTitle(a: string, b: string): boolean {
  const normA = normalizeTitle(a);
  return normA.length > 0 && normA === normalizeTitle(b);
}
