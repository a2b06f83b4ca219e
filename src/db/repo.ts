import { and, asc, count, eq, gt, isNotNull, isNull, ne, or, sql } from "drizzle-orm";
import type { SimilarityCatalog } from "@/lib/similarity";
import type { TrailerStore } from "@/lib/trailer";
import type { TrendCacheStore } from "@/lib/trends";
import {
  SCORE_FIELDS,
  type Movie,
  type MovieField,
  type RatingSample,
  type RatingSource,
} from "@/lib/types";
import type { DbClient } from "./client";
import {
  genres,
  movieAliases,
  movieGenres,
  movies,
  movieThemes,
  ratings,
  themes,
  trendCache,
  type NewMovie,
} from "./schema";

export type NewMovieInput = Omit<NewMovie, "id">;

/** Everything the enrichment core reads from and writes to storage. */
export interface MovieStore extends TrailerStore, TrendCacheStore, SimilarityCatalog {
  byId(movieId: number): Promise<Movie | null>;
  isFieldMissing(movieId: number, field: MovieField): Promise<boolean>;
  updateField<K extends MovieField>(movieId: number, field: K, value: Movie[K]): Promise<void>;
  upsertRating(sample: RatingSample): Promise<void>;
  ratingSamples(movieId: number): Promise<RatingSample[]>;
  hasRating(movieId: number, source: RatingSource): Promise<boolean>;
  linkGenre(movieId: number, name: string): Promise<void>;
  linkTheme(movieId: number, name: string): Promise<void>;
  movieIdsSorted(after?: number | null): Promise<number[]>;
  moviesMissingTrailer(after?: number | null): Promise<Array<{ id: number; title: string }>>;
  originCounts(): Promise<Map<string, number>>;
}

const SCORE_FIELD_SET: ReadonlySet<MovieField> = new Set(SCORE_FIELDS);

/** `null`, `undefined` and blank strings all count as "not filled in yet". */
export function isMissingValue(value: unknown): boolean {
  return value == null || (typeof value === "string" && value.trim() === "");
}

function assertScore(field: MovieField, value: unknown): void {
  if (!SCORE_FIELD_SET.has(field) || value === null) return;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 100) {
    throw new RangeError(`${field} must be within [0, 100], got ${String(value)}`);
  }
}

export class MovieRepo implements MovieStore {
  constructor(private readonly db: DbClient) {}

  // ─── Movies ─────────────────────────────────────────────────────────────────

  async addMovie(values: NewMovieInput): Promise<number> {
    for (const field of SCORE_FIELDS) assertScore(field, values[field] ?? null);
    const row = this.db.insert(movies).values(values).returning({ id: movies.id }).get();
    return row.id;
  }

  async byId(movieId: number): Promise<Movie | null> {
    return this.db.select().from(movies).where(eq(movies.id, movieId)).get() ?? null;
  }

  /** Exact title first, then registered aliases. */
  async idByTitle(title: string): Promise<number | null> {
    const direct = this.db
      .select({ id: movies.id })
      .from(movies)
      .where(eq(movies.title, title))
      .orderBy(asc(movies.id))
      .get();
    if (direct) return direct.id;

    const alias = this.db
      .select({ movieId: movieAliases.movieId })
      .from(movieAliases)
      .where(eq(movieAliases.altTitle, title))
      .get();
    return alias?.movieId ?? null;
  }

  async addAlias(movieId: number, altTitle: string): Promise<void> {
    this.db
      .insert(movieAliases)
      .values({ altTitle, movieId })
      .onConflictDoUpdate({ target: movieAliases.altTitle, set: { movieId } })
      .run();
  }

  async isFieldMissing(movieId: number, field: MovieField): Promise<boolean> {
    const movie = await this.byId(movieId);
    return movie === null || isMissingValue(movie[field]);
  }

  async updateField<K extends MovieField>(movieId: number, field: K, value: Movie[K]): Promise<void> {
    assertScore(field, value);
    const patch: Partial<NewMovieInput> = {};
    patch[field] = value;
    this.db.update(movies).set(patch).where(eq(movies.id, movieId)).run();
  }

  async movieIdsSorted(after: number | null = null): Promise<number[]> {
    const rows = this.db
      .select({ id: movies.id })
      .from(movies)
      .where(after === null ? undefined : gt(movies.id, after))
      .orderBy(asc(movies.id))
      .all();
    return rows.map((r) => r.id);
  }

  async moviesMissingTrailer(after: number | null = null): Promise<Array<{ id: number; title: string }>> {
    const missing = or(isNull(movies.youtubeLink), eq(movies.youtubeLink, ""));
    return this.db
      .select({ id: movies.id, title: movies.title })
      .from(movies)
      .where(after === null ? missing : and(missing, gt(movies.id, after)))
      .orderBy(asc(movies.id))
      .all();
  }

  /** Stored films per origin country, for catalogue-share baselines. */
  async originCounts(): Promise<Map<string, number>> {
    const rows = this.db
      .select({ origin: movies.origin, n: count() })
      .from(movies)
      .where(isNotNull(movies.origin))
      .groupBy(movies.origin)
      .all();
    const counts = new Map<string, number>();
    for (const { origin, n } of rows) {
      if (origin) counts.set(origin, n);
    }
    return counts;
  }

  // ─── Trailers ───────────────────────────────────────────────────────────────

  /** Stored trailer for a title or alias, compared case-insensitively. */
  async trailerByTitle(title: string): Promise<string | null> {
    const wanted = title.trim().toLowerCase();
    const hasTrailer = and(isNotNull(movies.youtubeLink), ne(movies.youtubeLink, ""));

    const direct = this.db
      .select({ youtubeLink: movies.youtubeLink })
      .from(movies)
      .where(and(sql`lower(${movies.title}) = ${wanted}`, hasTrailer))
      .orderBy(asc(movies.id))
      .get();
    if (direct?.youtubeLink) return direct.youtubeLink;

    const aliased = this.db
      .select({ youtubeLink: movies.youtubeLink })
      .from(movieAliases)
      .innerJoin(movies, eq(movies.id, movieAliases.movieId))
      .where(and(sql`lower(${movieAliases.altTitle}) = ${wanted}`, hasTrailer))
      .orderBy(asc(movies.id))
      .get();
    return aliased?.youtubeLink ?? null;
  }

  async moviesWithTrailers(): Promise<Array<{ title: string; youtubeLink: string }>> {
    const rows = this.db
      .select({ title: movies.title, youtubeLink: movies.youtubeLink })
      .from(movies)
      .where(and(isNotNull(movies.youtubeLink), ne(movies.youtubeLink, "")))
      .orderBy(asc(movies.id))
      .all();
    return rows.flatMap(({ title, youtubeLink }) => (youtubeLink ? [{ title, youtubeLink }] : []));
  }

  // ─── Ratings ────────────────────────────────────────────────────────────────

  async upsertRating(sample: RatingSample): Promise<void> {
    if (!Number.isFinite(sample.score) || sample.score < 0 || sample.score > 100) {
      throw new RangeError(`rating score must be within [0, 100], got ${sample.score}`);
    }
    const values = {
      score: sample.score,
      sampleCount: sample.sampleCount,
      histogram: sample.histogram ? [...sample.histogram] : null,
    };
    this.db
      .insert(ratings)
      .values({ movieId: sample.movieId, source: sample.source, ...values })
      .onConflictDoUpdate({ target: [ratings.movieId, ratings.source], set: values })
      .run();
  }

  async ratingSamples(movieId: number): Promise<RatingSample[]> {
    const rows = this.db
      .select()
      .from(ratings)
      .where(eq(ratings.movieId, movieId))
      .orderBy(asc(ratings.source))
      .all();
    return rows.map((r) => ({
      movieId: r.movieId,
      source: r.source,
      score: r.score,
      sampleCount: r.sampleCount,
      histogram: r.histogram,
    }));
  }

  async hasRating(movieId: number, source: RatingSource): Promise<boolean> {
    const row = this.db
      .select({ source: ratings.source })
      .from(ratings)
      .where(and(eq(ratings.movieId, movieId), eq(ratings.source, source)))
      .get();
    return row !== undefined;
  }

  // ─── Genres and themes ──────────────────────────────────────────────────────

  async linkGenre(movieId: number, name: string): Promise<void> {
    const trimmed = name.trim();
    if (!trimmed) return;
    this.db.insert(genres).values({ name: trimmed }).onConflictDoNothing().run();
    const genre = this.db.select({ id: genres.id }).from(genres).where(eq(genres.name, trimmed)).get();
    if (!genre) return;
    this.db.insert(movieGenres).values({ movieId, genreId: genre.id }).onConflictDoNothing().run();
  }

  async linkTheme(movieId: number, name: string): Promise<void> {
    const trimmed = name.trim();
    if (!trimmed) return;
    this.db.insert(themes).values({ name: trimmed }).onConflictDoNothing().run();
    const theme = this.db.select({ id: themes.id }).from(themes).where(eq(themes.name, trimmed)).get();
    if (!theme) return;
    this.db.insert(movieThemes).values({ movieId, themeId: theme.id }).onConflictDoNothing().run();
  }

  async genres(movieId: number): Promise<string[]> {
    const rows = this.db
      .select({ name: genres.name })
      .from(movieGenres)
      .innerJoin(genres, eq(movieGenres.genreId, genres.id))
      .where(eq(movieGenres.movieId, movieId))
      .orderBy(asc(genres.name))
      .all();
    return rows.map((r) => r.name);
  }

  async themes(movieId: number): Promise<string[]> {
    const rows = this.db
      .select({ name: themes.name })
      .from(movieThemes)
      .innerJoin(themes, eq(movieThemes.themeId, themes.id))
      .where(eq(movieThemes.movieId, movieId))
      .orderBy(asc(themes.name))
      .all();
    return rows.map((r) => r.name);
  }

  // ─── Trend cache ────────────────────────────────────────────────────────────

  async trendCacheGet(term: string, day: string): Promise<number | null> {
    const row = this.db
      .select({ value: trendCache.value })
      .from(trendCache)
      .where(and(eq(trendCache.term, term), eq(trendCache.day, day)))
      .get();
    return row?.value ?? null;
  }

  async trendCacheSet(term: string, day: string, value: number): Promise<void> {
    this.db
      .insert(trendCache)
      .values({ term, day, value })
      .onConflictDoUpdate({ target: [trendCache.term, trendCache.day], set: { value } })
      .run();
  }
}
