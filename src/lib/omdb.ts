import { fetchJson, buildUrl } from "./http";
import { HttpError, ProviderRateLimitError } from "./errors";
import { LRUCache } from "./cache";
import { parseMinutes, parseYear } from "./fingerprint";
import { asRecords, isRecord, readString, type JsonRecord } from "./json";
import { log, errorMessage } from "./logger";
import type { PayloadCache } from "./kv";
import { unlimited, type RateLimiter } from "./throttle";

const OMDB_URL = "https://www.omdbapi.com/";
const CACHE_TTL_MS = 60 * 60 * 1000;

export type OmdbLookup = { imdbId?: string | null; title?: string | null };

export type OmdbRatings = {
  imdb: number | null; // 0-10
  imdbVotes: number | null;
  metacritic: number | null; // 0-100
  rottenTomatoes: number | null; // 0-100
};

/** Raw-payload access to the secondary metadata provider. */
export interface SecondaryMetadataSource {
  getPayload(lookup: OmdbLookup): Promise<JsonRecord | null>;
}

// ─── Extractors (pure) ───────────────────────────────────────────────────────

/** OMDb marks absent values with "N/A". */
function field(d: JsonRecord, key: string): string | null {
  const value = readString(d, key);
  return value === "N/A" ? null : value;
}

function numeric(raw: string | null): number | null {
  if (raw === null) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

export function omdbRuntimeSeconds(d: JsonRecord): number | null {
  const minutes = parseMinutes(field(d, "Runtime"));
  return minutes === null ? null : minutes * 60;
}

/** "$1,234,567" → 1234567 */
export function omdbBoxOffice(d: JsonRecord): number | null {
  const raw = field(d, "BoxOffice");
  if (!raw?.startsWith("$")) return null;
  const n = numeric(raw.slice(1).replace(/,/g, ""));
  return n !== null && n > 0 ? n : null;
}

export function omdbPlot(d: JsonRecord): string | null {
  return field(d, "Plot");
}

export function omdbImdbId(d: JsonRecord): string | null {
  return field(d, "imdbID");
}

export function parseOmdbRatings(movie: JsonRecord): OmdbRatings {
  let rottenTomatoes: number | null = null;
  const rt = asRecords(movie.Ratings).find((r) => r.Source === "Rotten Tomatoes");
  const rtValue = rt ? readString(rt, "Value") : null;
  if (rtValue?.endsWith("%")) {
    rottenTomatoes = numeric(rtValue.replace("%", ""));
  }
  const imdb = numeric(field(movie, "imdbRating"));
  const votesRaw = field(movie, "imdbVotes");
  const imdbVotes = votesRaw ? numeric(votesRaw.replace(/,/g, "")) : null;
  // Metascore sometimes arrives as "74/100"
  const metaRaw = field(movie, "Metascore");
  const metacritic = metaRaw ? numeric(metaRaw.split("/")[0]) : null;
  return { imdb, imdbVotes, metacritic, rottenTomatoes };
}

// ─── Client ──────────────────────────────────────────────────────────────────

type FetchJson = typeof fetchJson;

export type OmdbClientOptions = {
  limiter?: RateLimiter;
  kv?: PayloadCache | null;
  fetcher?: FetchJson;
};

type KeyOutcome =
  | { kind: "hit"; payload: JsonRecord }
  | { kind: "miss" }
  | { kind: "exhausted" };

function cacheKey(lookup: OmdbLookup): string | null {
  const imdbId = lookup.imdbId?.trim();
  if (imdbId) return `id:${imdbId}`;
  const title = lookup.title?.trim().toLowerCase();
  return title ? `title:${title}` : null;
}

export class OmdbClient implements SecondaryMetadataSource {
  // One fetch per film per run; misses are remembered too
  private l1 = new LRUCache<{ payload: JsonRecord | null }>(CACHE_TTL_MS, 512);
  private readonly limiter: RateLimiter;
  private readonly kv: PayloadCache | null;
  private readonly fetcher: FetchJson;

  constructor(
    private readonly apiKeys: readonly string[],
    options: OmdbClientOptions = {},
  ) {
    this.limiter = options.limiter ?? unlimited;
    this.kv = options.kv ?? null;
    this.fetcher = options.fetcher ?? fetchJson;
  }

  async getPayload(lookup: OmdbLookup): Promise<JsonRecord | null> {
    const key = cacheKey(lookup);
    if (key === null) return null;

    const cached = this.l1.get(key);
    if (cached) return cached.payload;

    const stored = this.kv ? await this.kv.get(key) : null;
    if (stored) {
      this.l1.set(key, { payload: stored });
      return stored;
    }

    let payload: JsonRecord | null;
    try {
      payload = await this.fetchWithRotation(lookup);
    } catch (err) {
      if (err instanceof ProviderRateLimitError) throw err;
      log.warn("omdb_fetch_failed", { key, error: errorMessage(err) });
      return null;
    }

    this.l1.set(key, { payload });
    if (payload && this.kv) {
      await this.kv.set(key, payload, parseYear(field(payload, "Year")));
    }
    return payload;
  }

  private async fetchWithRotation(lookup: OmdbLookup): Promise<JsonRecord | null> {
    if (this.apiKeys.length === 0) return null;
    for (const apiKey of this.apiKeys) {
      const outcome = await this.fetchWithKey(lookup, apiKey);
      if (outcome.kind === "hit") return outcome.payload;
      if (outcome.kind === "miss") return null;
      log.info("omdb_key_exhausted", { keyIndex: this.apiKeys.indexOf(apiKey) });
    }
    throw new ProviderRateLimitError("omdb");
  }

  private async fetchWithKey(lookup: OmdbLookup, apiKey: string): Promise<KeyOutcome> {
    await this.limiter.acquire();
    let body: unknown;
    try {
      body = await this.fetcher(
        buildUrl(OMDB_URL, {
          apikey: apiKey,
          plot: "short",
          type: "movie",
          i: lookup.imdbId?.trim() || undefined,
          t: lookup.imdbId?.trim() ? undefined : lookup.title?.trim(),
        }),
      );
    } catch (err) {
      // 401 is how OMDb reports an invalid or over-quota key
      if (err instanceof HttpError && (err.status === 401 || err.status === 429)) {
        return { kind: "exhausted" };
      }
      throw err;
    }

    if (!isRecord(body)) return { kind: "miss" };
    if (body.Response === "True") return { kind: "hit", payload: body };
    const error = readString(body, "Error") ?? "";
    return /limit|invalid api key/i.test(error) ? { kind: "exhausted" } : { kind: "miss" };
  }

  // ─── Accessors over the shared payload ─────────────────────────────────────

  async getRuntimeSeconds(lookup: OmdbLookup): Promise<number | null> {
    const d = await this.getPayload(lookup);
    return d ? omdbRuntimeSeconds(d) : null;
  }

  async getBoxOffice(lookup: OmdbLookup): Promise<number | null> {
    const d = await this.getPayload(lookup);
    return d ? omdbBoxOffice(d) : null;
  }

  async getPlot(lookup: OmdbLookup): Promise<string | null> {
    const d = await this.getPayload(lookup);
    return d ? omdbPlot(d) : null;
  }

  async getRatings(lookup: OmdbLookup): Promise<OmdbRatings | null> {
    const d = await this.getPayload(lookup);
    return d ? parseOmdbRatings(d) : null;
  }

  async getImdbId(lookup: OmdbLookup): Promise<string | null> {
    const d = await this.getPayload(lookup);
    return d ? omdbImdbId(d) : null;
  }
}
