import { fetchJson, buildUrl } from "./http";
import { HttpError, ProviderRateLimitError } from "./errors";
import { LRUCache } from "./cache";
import { normalize } from "./fingerprint";
import { asRecord, asRecords, readNumber, readString, type JsonRecord } from "./json";
import { log } from "./logger";
import { classifyReleaseWindow } from "./reference";
import { sameTitle } from "./title";
import { unlimited, type RateLimiter } from "./throttle";
import { videoUrl } from "./youtube";
import type { Movie, MovieFingerprint } from "./types";

const TMDB_BASE = "https://api.themoviedb.org/3";
const DETAILS_APPEND = "release_dates,videos,credits";
const THEATRICAL_RELEASE = 3;
const SEARCH_PAGES = 2;
const CACHE_TTL_MS = 10 * 60 * 1000;

export type MovieFieldValues = Partial<Omit<Movie, "id">>;

export type TmdbMetadata = {
  movieFields: MovieFieldValues;
  genres: string[];
  fingerprint: MovieFingerprint;
};

export type TmdbUserRating = { mean: number; votes: number };

export type TmdbVideos = { trailerUrl: string | null; canonicalTitle: string };

/** What the enrichment and trailer pipelines need from the primary provider. */
export interface PrimaryMetadataSource {
  fetchMetadata(title: string): Promise<TmdbMetadata | null>;
  fetchUserRating(title: string): Promise<TmdbUserRating | null>;
  fetchVideosExact(title: string): Promise<TmdbVideos | null>;
  fetchCastPopularity(title: string): Promise<number | null>;
}

type FetchJson = typeof fetchJson;

// ─── Detail readers (pure) ───────────────────────────────────────────────────

export function originCountry(details: JsonRecord): string {
  const first = asRecords(details.production_countries)[0];
  return (first ? readString(first, "iso_3166_1") ?? "US" : "US").toUpperCase();
}

/** Theatrical certification for `country`, or null. */
export function extractCertification(details: JsonRecord, country: string): string | null {
  for (const block of asRecords(asRecord(details.release_dates).results)) {
    if (readString(block, "iso_3166_1") !== country) continue;
    for (const rd of asRecords(block.release_dates)) {
      const cert = readString(rd, "certification");
      if (readNumber(rd, "type") === THEATRICAL_RELEASE && cert) return cert;
    }
  }
  return null;
}

export function firstTrailerUrl(details: JsonRecord): string | null {
  for (const video of asRecords(asRecord(details.videos).results)) {
    const key = readString(video, "key");
    if (video.site === "YouTube" && video.type === "Trailer" && key) {
      return videoUrl(key);
    }
  }
  return null;
}

/** Mean popularity of the top three billed cast members, capped at 100. */
export function castPopularity(details: JsonRecord): number | null {
  const cast = asRecords(asRecord(details.credits).cast)
    .map((c) => ({ order: readNumber(c, "order") ?? Number.MAX_SAFE_INTEGER, pop: readNumber(c, "popularity") }))
    .filter((c): c is { order: number; pop: number } => c.pop !== null)
    .sort((a, b) => a.order - b.order)
    .slice(0, 3);
  if (cast.length === 0) return null;
  const mean = cast.reduce((sum, c) => sum + c.pop, 0) / cast.length;
  return Math.round(Math.min(Math.max(mean, 0), 100) * 100) / 100;
}

export function detailsToMetadata(details: JsonRecord): TmdbMetadata {
  const releaseDate = readString(details, "release_date");
  const origin = originCountry(details);
  const runtime = readNumber(details, "runtime");
  const revenue = readNumber(details, "revenue");
  const yearMatch = releaseDate?.match(/^(\d{4})/);

  const movieFields: MovieFieldValues = {
    title: readString(details, "title") ?? undefined,
    tmdbId: readNumber(details, "id"),
    imdbId: readString(details, "imdb_id"),
    plotDesc: readString(details, "overview"),
    year: yearMatch ? Number(yearMatch[1]) : null,
    releaseWindow: classifyReleaseWindow(releaseDate, origin) || null,
    ratingCert: extractCertification(details, origin),
    durationSeconds: runtime && runtime > 0 ? runtime * 60 : null,
    youtubeLink: firstTrailerUrl(details),
    boxOfficeActual: revenue && revenue > 0 ? revenue : null,
    franchise: readString(asRecord(details.belongs_to_collection), "name"),
    origin,
  };

  const genres = asRecords(details.genres)
    .map((g) => readString(g, "name"))
    .filter((name): name is string => name !== null);

  return { movieFields, genres, fingerprint: normalize("tmdb", details) };
}

// ─── Client ──────────────────────────────────────────────────────────────────

export class TmdbClient implements PrimaryMetadataSource {
  // Several pipeline steps ask about the same title in one run
  private searches = new LRUCache<{ match: JsonRecord | null }>(CACHE_TTL_MS, 500);
  private details = new LRUCache<JsonRecord>(CACHE_TTL_MS, 500);

  constructor(
    private readonly apiKey: string,
    private readonly limiter: RateLimiter = unlimited,
    private readonly fetcher: FetchJson = fetchJson,
  ) {}

  private async get(path: string, params: Record<string, string | number | undefined> = {}): Promise<JsonRecord> {
    await this.limiter.acquire();
    try {
      const body = await this.fetcher(buildUrl(`${TMDB_BASE}${path}`, { ...params, api_key: this.apiKey }));
      return asRecord(body);
    } catch (err) {
      if (err instanceof HttpError && err.status === 429) {
        throw new ProviderRateLimitError("tmdb");
      }
      throw err;
    }
  }

  /** The single result (pages 1–2) whose normalized title equals `title`. */
  async searchExact(title: string): Promise<JsonRecord | null> {
    const cached = this.searches.get(title);
    if (cached) return cached.match;

    const results: JsonRecord[] = [];
    for (let page = 1; page <= SEARCH_PAGES; page += 1) {
      const body = await this.get("/search/movie", { query: title, page });
      results.push(...asRecords(body.results));
      if (page >= (readNumber(body, "total_pages") ?? 1)) break;
    }

    const matches = results.filter((r) => sameTitle(readString(r, "title") ?? "", title));
    const match = matches.length === 1 ? matches[0] : null;
    if (matches.length > 1) {
      log.debug("tmdb_ambiguous_title", { title, candidates: matches.length });
    }
    this.searches.set(title, { match });
    return match;
  }

  async getDetails(tmdbId: number): Promise<JsonRecord> {
    const key = String(tmdbId);
    const cached = this.details.get(key);
    if (cached) return cached;
    const details = await this.get(`/movie/${tmdbId}`, { append_to_response: DETAILS_APPEND });
    this.details.set(key, details);
    return details;
  }

  private async detailsFor(title: string): Promise<JsonRecord | null> {
    const match = await this.searchExact(title);
    const id = match ? readNumber(match, "id") : null;
    if (id === null) return null;
    return this.getDetails(id);
  }

  async fetchMetadata(title: string): Promise<TmdbMetadata | null> {
    const details = await this.detailsFor(title);
    return details ? detailsToMetadata(details) : null;
  }

  async fetchUserRating(title: string): Promise<TmdbUserRating | null> {
    const details = await this.detailsFor(title);
    if (!details) return null;
    return {
      mean: readNumber(details, "vote_average") ?? 0,
      votes: readNumber(details, "vote_count") ?? 0,
    };
  }

  async fetchVideosExact(title: string): Promise<TmdbVideos | null> {
    const details = await this.detailsFor(title);
    if (!details) return null;
    return {
      trailerUrl: firstTrailerUrl(details),
      canonicalTitle: readString(details, "title") ?? title,
    };
  }

  async fetchCastPopularity(title: string): Promise<number | null> {
    const details = await this.detailsFor(title);
    return details ? castPopularity(details) : null;
  }
}
