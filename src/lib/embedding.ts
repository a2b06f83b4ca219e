import { normalizeTitle } from "./title";

/** Maps a title to a fixed-length vector; swap in a semantic model here. */
export type TitleEmbedder = (title: string) => number[];

export const EMBEDDING_DIMS = 64;

// FNV-1a, 32-bit
function hashGram(gram: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < gram.length; i++) {
    h ^= gram.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Hashed character-trigram embedding of the normalized title, L2-normalized.
 * Titles that normalize to nothing embed as the zero vector.
 */
export function embedTitle(title: string, dims: number = EMBEDDING_DIMS): number[] {
  const vec = new Array<number>(dims).fill(0);
  const norm = normalizeTitle(title);
  if (norm.length === 0) return vec;

  const padded = ` ${norm} `;
  for (let i = 0; i + 3 <= padded.length; i++) {
    vec[hashGram(padded.slice(i, i + 3)) % dims] += 1;
  }

  const length = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
  return vec.map((v) => v / length);
}

/** Cosine similarity; 0 when either vector has zero norm. */
export function cosine(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
