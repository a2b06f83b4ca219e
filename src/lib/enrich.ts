import { isMissingValue, type MovieStore } from "@/db/repo";
import type { LRUCache } from "./cache";
import { DEFAULT_MATCHER, type MatcherConfig } from "./config";
import { isRateLimitError } from "./errors";
import { actorTrendFair, combinedScoreFair, gtrendFair } from "./fairness";
import type { DetailScraper } from "./imdb-scraper";
import { log, errorMessage } from "./logger";
import {
  omdbBoxOffice,
  omdbImdbId,
  omdbPlot,
  omdbRuntimeSeconds,
  parseOmdbRatings,
  type SecondaryMetadataSource,
} from "./omdb";
import { fingerprintFromRow, resolveSecondaryPayload } from "./resolve";
import type { PrimaryMetadataSource } from "./tmdb";
import { locateTrailer } from "./trailer";
import type { TrendClient } from "./trends";
import {
  MOVIE_FIELDS,
  type Baselines,
  type Movie,
  type MovieField,
  type MovieFingerprint,
  type RatingSource,
  type TrailerResult,
} from "./types";
import type { VideoSearch } from "./youtube";

export type EnrichStep = "primary" | "secondary" | "detail" | "trailer" | "trends" | "combined";

export type EnrichmentDeps = {
  store: MovieStore;
  baselines: Baselines;
  primary?: PrimaryMetadataSource | null;
  secondary?: SecondaryMetadataSource | null;
  detail?: DetailScraper | null;
  trends?: TrendClient | null;
  search?: VideoSearch | null;
  trailerCache?: LRUCache<TrailerResult>;
  matcher?: MatcherConfig;
};

export type EnrichmentReport = {
  movieId: number;
  title: string;
  filled: MovieField[];
  ratings: RatingSource[];
  failedSteps: EnrichStep[];
  combinedScore: number | null;
};

function toScore(n: number): number {
  return Math.round(Math.min(Math.max(n, 0), 100) * 100) / 100;
}

/** Mutable view of one movie for the duration of a single enrichment run. */
class EnrichmentRun {
  readonly filled: MovieField[] = [];
  readonly ratings: RatingSource[] = [];
  readonly failedSteps: EnrichStep[] = [];
  fingerprint: MovieFingerprint | null = null;

  constructor(
    readonly movie: Movie,
    private readonly store: MovieStore,
  ) {}

  missing(field: MovieField): boolean {
    return isMissingValue(this.movie[field]);
  }

  /** Write `value` only when the stored field is still empty. */
  async fill<K extends MovieField>(field: K, value: Movie[K] | undefined): Promise<void> {
    if (value === undefined || isMissingValue(value) || !this.missing(field)) return;
    await this.store.updateField(this.movie.id, field, value);
    this.movie[field] = value;
    this.filled.push(field);
  }

  async addRating(
    source: RatingSource,
    score: number | null,
    sampleCount: number | null = null,
  ): Promise<void> {
    if (score === null || !Number.isFinite(score)) return;
    if (await this.store.hasRating(this.movie.id, source)) return;
    await this.store.upsertRating({
      movieId: this.movie.id,
      source,
      score: toScore(score),
      sampleCount,
      histogram: null,
    });
    this.ratings.push(source);
  }

  /** Run one step; anything but a rate limit is logged and skipped. */
  async step(name: EnrichStep, body: () => Promise<void>): Promise<void> {
    try {
      await body();
    } catch (err) {
      if (isRateLimitError(err)) throw err;
      log.warn("enrich_step_failed", {
        movieId: this.movie.id,
        title: this.movie.title,
        step: name,
        error: errorMessage(err),
      });
      this.failedSteps.push(name);
    }
  }
}

// ─── Steps ────────────────────────────────────────────────────────────────────

async function primarySweep(run: EnrichmentRun, primary: PrimaryMetadataSource, store: MovieStore) {
  const { movie } = run;
  const meta = await primary.fetchMetadata(movie.title);
  if (meta) {
    for (const field of MOVIE_FIELDS) {
      await run.fill(field, meta.movieFields[field]);
    }
    for (const genre of meta.genres) await store.linkGenre(movie.id, genre);
    run.fingerprint = meta.fingerprint;
  }

  if (!(await store.hasRating(movie.id, "TMDB"))) {
    const rating = await primary.fetchUserRating(movie.title);
    if (rating) await run.addRating("TMDB", rating.mean * 10, rating.votes);
  }
}

// Ratings are picked up whenever the payload is fetched, but never trigger a fetch
function needsSecondary(run: EnrichmentRun): boolean {
  return (
    run.missing("durationSeconds") ||
    run.missing("boxOfficeActual") ||
    run.missing("plotDesc") ||
    run.missing("imdbId")
  );
}

async function secondarySweep(
  run: EnrichmentRun,
  secondary: SecondaryMetadataSource,
  matcher: MatcherConfig,
) {
  const { movie } = run;
  const payload = await resolveSecondaryPayload(
    secondary,
    {
      title: movie.title,
      imdbId: movie.imdbId,
      fingerprint: run.fingerprint ?? fingerprintFromRow(movie),
    },
    matcher,
  );
  if (!payload) return;

  await run.fill("durationSeconds", omdbRuntimeSeconds(payload));
  await run.fill("boxOfficeActual", omdbBoxOffice(payload));
  await run.fill("plotDesc", omdbPlot(payload));
  await run.fill("imdbId", omdbImdbId(payload));

  const ratings = parseOmdbRatings(payload);
  await run.addRating("IMDB", ratings.imdb === null ? null : ratings.imdb * 10, ratings.imdbVotes);
  await run.addRating("RT_CRITIC", ratings.rottenTomatoes);
  await run.addRating("METACRITIC", ratings.metacritic);
}

async function detailSweep(run: EnrichmentRun, detail: DetailScraper, store: MovieStore) {
  const { imdbId } = run.movie;
  if (!imdbId || (await store.hasRating(run.movie.id, "IMDB_DETAIL"))) return;
  const data = await detail.fetchAll(imdbId);
  if (data) await run.addRating("IMDB_DETAIL", data.rating * 10, data.voteCount);
}

async function trailerSweep(run: EnrichmentRun, deps: EnrichmentDeps) {
  const result = await locateTrailer(run.movie.title, {
    store: deps.store,
    primary: deps.primary,
    search: deps.search,
    cache: deps.trailerCache,
  });
  if (result.url) await run.fill("youtubeLink", result.url);
}

async function trendSweep(run: EnrichmentRun, deps: EnrichmentDeps) {
  const { movie } = run;
  if (deps.trends && run.missing("googleTrendScore")) {
    const raw = await deps.trends.fetch7DayAverage(movie.title);
    if (raw !== null) await run.fill("googleTrendScore", gtrendFair(raw, movie.origin, deps.baselines));
  }

  // Actor trend blends in the search trend, so it waits until one is stored
  const trend = movie.googleTrendScore;
  if (deps.primary && trend !== null && run.missing("actorTrendScore")) {
    const popularity = await deps.primary.fetchCastPopularity(movie.title);
    if (popularity !== null) {
      await run.fill("actorTrendScore", actorTrendFair(popularity, trend, movie.origin, deps.baselines));
    }
  }
}

// ─── Orchestrator ─────────────────────────────────────────────────────────────

/**
 * Fill whatever is still missing for one movie, cheapest and most trusted
 * source first, then recompute its combined score. Only a provider rate
 * limit escapes; the caller decides whether to pause.
 */
export async function enrichMovie(movieId: number, deps: EnrichmentDeps): Promise<EnrichmentReport> {
  const { store } = deps;
  const movie = await store.byId(movieId);
  if (!movie) throw new Error(`movie ${movieId} not found`);

  const run = new EnrichmentRun({ ...movie }, store);
  const { primary, secondary, detail } = deps;

  if (primary && movie.tmdbId === null) {
    await run.step("primary", () => primarySweep(run, primary, store));
  }

  if (secondary && needsSecondary(run)) {
    await run.step("secondary", () => secondarySweep(run, secondary, deps.matcher ?? DEFAULT_MATCHER));
  }

  if (detail) {
    await run.step("detail", () => detailSweep(run, detail, store));
  }

  if (run.missing("youtubeLink")) {
    await run.step("trailer", () => trailerSweep(run, deps));
  }

  await run.step("trends", () => trendSweep(run, deps));

  let combinedScore: number | null = null;
  await run.step("combined", async () => {
    const samples = await store.ratingSamples(movieId);
    combinedScore = combinedScoreFair(samples, run.movie.origin, deps.baselines);
    await store.updateField(movieId, "combinedScore", combinedScore);
    run.movie.combinedScore = combinedScore;
  });

  log.info("enrich_complete", {
    movieId,
    title: movie.title,
    filled: run.filled,
    ratings: run.ratings,
    failedSteps: run.failedSteps,
    combinedScore,
  });

  return {
    movieId,
    title: movie.title,
    filled: run.filled,
    ratings: run.ratings,
    failedSteps: run.failedSteps,
    combinedScore,
  };
}
