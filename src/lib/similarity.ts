import { ratingToAgeGroup } from "./reference";
import type { Movie, SimilarityPair, SimilarityResult } from "./types";

/** Genre and theme sets per movie. */
export interface SimilarityCatalog {
  genres(movieId: number): Promise<string[]>;
  themes(movieId: number): Promise<string[]>;
}

type Profile = { movie: Movie; genres: ReadonlySet<string>; themes: ReadonlySet<string> };

const NUMERIC_WEIGHT = 0.6;
const CATEGORICAL_WEIGHT = 0.4;

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

// ─── Numeric part: cosine over six scaled dimensions ─────────────────────────

export function featureVector(m: Movie): number[] {
  const pct = (x: number | null) => (x ?? 0) / 100;
  return [
    ((m.year ?? 2000) - 2000) / 50,
    (m.durationSeconds ?? 0) / 3600,
    m.boxOfficeActual ? Math.log10(Math.max(m.boxOfficeActual, 1)) : 0,
    pct(m.googleTrendScore),
    pct(m.combinedScore),
    pct(m.actorTrendScore),
  ];
}

/** Cosine clamped to [0, 1]; two all-zero vectors count as identical. */
export function numericSimilarity(a: Movie, b: Movie): number {
  const va = featureVector(a);
  const vb = featureVector(b);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < va.length; i++) {
    dot += va[i] * vb[i];
    na += va[i] * va[i];
    nb += vb[i] * vb[i];
  }
  if (na === 0 && nb === 0) return 1;
  if (na === 0 || nb === 0) return 0;
  return Math.min(Math.max(dot / (Math.sqrt(na) * Math.sqrt(nb)), 0), 1);
}

// ─── Categorical part: exact matches and set overlaps ────────────────────────

/** Jaccard overlap; two empty sets count as identical. */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const x of a) if (b.has(x)) shared++;
  return shared / (a.size + b.size - shared);
}

function categoricalSimilarity(a: Profile, b: Profile): number {
  const exact = [
    a.movie.releaseWindow === b.movie.releaseWindow,
    ratingToAgeGroup(a.movie.origin, a.movie.ratingCert) ===
      ratingToAgeGroup(b.movie.origin, b.movie.ratingCert),
    a.movie.origin === b.movie.origin,
  ];
  const exactScore = exact.filter(Boolean).length / exact.length;
  return (exactScore + jaccard(a.genres, b.genres) + jaccard(a.themes, b.themes)) / 3;
}

async function profile(movie: Movie, catalog: SimilarityCatalog): Promise<Profile> {
  const [genres, themes] = await Promise.all([catalog.genres(movie.id), catalog.themes(movie.id)]);
  return { movie, genres: new Set(genres), themes: new Set(themes) };
}

function profileSimilarity(a: Profile, b: Profile): number {
  return round3(
    NUMERIC_WEIGHT * numericSimilarity(a.movie, b.movie) +
      CATEGORICAL_WEIGHT * categoricalSimilarity(a, b),
  );
}

// ─── Public API ──────────────────────────────────────────────────────────────

export async function pairSimilarity(a: Movie, b: Movie, catalog: SimilarityCatalog): Promise<number> {
  const [pa, pb] = await Promise.all([profile(a, catalog), profile(b, catalog)]);
  return profileSimilarity(pa, pb);
}

/**
 * Similarity for every unordered pair of distinct movies (deduplicated by
 * id, first occurrence kept). No group-level total is computed.
 */
export async function calculateSimilarity(
  movies: readonly Movie[],
  catalog: SimilarityCatalog,
): Promise<SimilarityResult> {
  const unique = new Map<number, Movie>();
  for (const m of movies) if (!unique.has(m.id)) unique.set(m.id, m);

  const profiles: Profile[] = [];
  for (const m of unique.values()) profiles.push(await profile(m, catalog));

  const pairs: SimilarityPair[] = [];
  for (let i = 0; i < profiles.length; i++) {
    for (let j = i + 1; j < profiles.length; j++) {
      pairs.push({
        a: profiles[i].movie.id,
        b: profiles[j].movie.id,
        similarity: profileSimilarity(profiles[i], profiles[j]),
      });
    }
  }
  return { pairs, weightedTotal: null };
}
