import { fetchJson, buildUrl } from "./http";
import { HttpError, ProviderRateLimitError } from "./errors";
import { asRecord, asRecords, readString } from "./json";
import { log, errorMessage } from "./logger";
import { normalizeTitle } from "./title";
import { unlimited, type RateLimiter } from "./throttle";

const VIDEO_ID_RE = /(?:v=|\/videos\/|embed\/|youtu\.be\/)([A-Za-z0-9_-]{11})/;
const SEARCH_URL = "https://www.googleapis.com/youtube/v3/search";

export function extractVideoId(url: string | null | undefined): string | null {
  if (!url) return null;
  const m = url.match(VIDEO_ID_RE);
  return m ? m[1] : null;
}

/** A trailer link is usable only if a video id can be read from it. */
export function isValidVideoUrl(url: string | null | undefined): url is string {
  return extractVideoId(url) !== null;
}

export function videoUrl(id: string): string {
  return `https://www.youtube.com/watch?v=${id}`;
}

/** Video search used by the trailer resolver's fallback tiers. */
export interface VideoSearch {
  /** First result whose title contains the query, as a video id. */
  searchExact(query: string): Promise<string | null>;
  searchFirstMatch(query: string, exact: boolean, maxRetries?: number): Promise<string | null>;
}

type FetchJson = typeof fetchJson;

export class YoutubeSearchClient implements VideoSearch {
  constructor(
    private readonly apiKey: string,
    private readonly limiter: RateLimiter = unlimited,
    private readonly fetcher: FetchJson = fetchJson,
  ) {}

  searchExact(query: string): Promise<string | null> {
    return this.searchFirstMatch(query, true, 1);
  }

  async searchFirstMatch(query: string, exact: boolean, maxRetries = 1): Promise<string | null> {
    const attempts = Math.max(1, maxRetries);
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        return await this.search(query, exact);
      } catch (err) {
        if (err instanceof ProviderRateLimitError) throw err;
        log.warn("youtube_search_failed", { query, attempt, error: errorMessage(err) });
        if (attempt === attempts) throw err;
      }
    }
    return null;
  }

  private async search(query: string, exact: boolean): Promise<string | null> {
    await this.limiter.acquire();
    let body: unknown;
    try {
      body = await this.fetcher(
        buildUrl(SEARCH_URL, {
          part: "snippet",
          type: "video",
          maxResults: 5,
          q: query,
          key: this.apiKey,
        }),
      );
    } catch (err) {
      // Quota exhaustion arrives as 403 from this API
      if (err instanceof HttpError && (err.status === 429 || err.status === 403)) {
        throw new ProviderRateLimitError("youtube");
      }
      throw err;
    }

    const wanted = normalizeTitle(query);
    for (const item of asRecords(asRecord(body).items)) {
      const id = readString(asRecord(item.id), "videoId");
      if (!id) continue;
      if (!exact) return id;
      const title = readString(asRecord(item.snippet), "title") ?? "";
      if (wanted.length > 0 && normalizeTitle(title).includes(wanted)) return id;
    }
    return null;
  }
}
