import { LRUCache } from "./cache";
import { isRateLimitError } from "./errors";
import { log, errorMessage } from "./logger";
import { fuzzyMatch } from "./title";
import type { PrimaryMetadataSource } from "./tmdb";
import type { TrailerResult } from "./types";
import { isValidVideoUrl, videoUrl, type VideoSearch } from "./youtube";

/** Local lookups the resolver needs; never rate limited. */
export interface TrailerStore {
  trailerByTitle(title: string): Promise<string | null>;
  moviesWithTrailers(): Promise<Array<{ title: string; youtubeLink: string }>>;
}

export type TrailerDeps = {
  store: TrailerStore;
  primary?: Pick<PrimaryMetadataSource, "fetchVideosExact"> | null;
  search?: VideoSearch | null;
  cache?: LRUCache<TrailerResult>;
};

const FUZZY_CUTOFF = 0.8;
const SECONDARY_RETRIES = 3;
const MISS: TrailerResult = { url: null, source: "none", confidence: 0 };

export function createTrailerCache(): LRUCache<TrailerResult> {
  return new LRUCache<TrailerResult>(24 * 60 * 60 * 1000, 1000);
}

function fromVideoId(id: string | null): string | null {
  if (!id) return null;
  const url = videoUrl(id);
  return isValidVideoUrl(url) ? url : null;
}

async function localTier(store: TrailerStore, title: string): Promise<TrailerResult | null> {
  const exact = await store.trailerByTitle(title);
  if (isValidVideoUrl(exact)) return { url: exact, source: "db", confidence: 1.0 };

  const rows = (await store.moviesWithTrailers()).filter((r) => isValidVideoUrl(r.youtubeLink));
  const best = fuzzyMatch(title, rows.map((r) => r.title), FUZZY_CUTOFF);
  const row = best === null ? undefined : rows.find((r) => r.title === best);
  return row ? { url: row.youtubeLink, source: "db_fuzzy", confidence: 0.9 } : null;
}

/**
 * Find a trailer for `title`, cheapest tier first: earlier hits, the local
 * store, the primary provider's videos, then video search. A network tier
 * that fails is logged and skipped; a provider rate limit propagates so the
 * caller can pause.
 */
export async function locateTrailer(title: string, deps: TrailerDeps): Promise<TrailerResult> {
  const cacheKey = title.trim().toLowerCase();
  const remembered = deps.cache?.get(cacheKey);
  if (remembered) return remembered;

  const remember = (result: TrailerResult): TrailerResult => {
    deps.cache?.set(cacheKey, result);
    return result;
  };

  const local = await localTier(deps.store, title);
  if (local) return remember(local);

  let canonicalTitle: string | null = null;
  if (deps.primary) {
    try {
      const videos = await deps.primary.fetchVideosExact(title);
      if (videos && isValidVideoUrl(videos.trailerUrl)) {
        return remember({ url: videos.trailerUrl, source: "provider", confidence: 0.95 });
      }
      canonicalTitle = videos?.canonicalTitle ?? null;
    } catch (err) {
      if (isRateLimitError(err)) throw err;
      log.warn("trailer_tier_failed", { title, tier: "provider", error: errorMessage(err) });
    }
  }

  if (deps.search && canonicalTitle) {
    try {
      const url = fromVideoId(await deps.search.searchExact(`${canonicalTitle} trailer`));
      if (url) return remember({ url, source: "secondary_exact", confidence: 0.8 });
    } catch (err) {
      if (isRateLimitError(err)) throw err;
      log.warn("trailer_tier_failed", { title, tier: "secondary_exact", error: errorMessage(err) });
    }
  }

  if (deps.search) {
    try {
      const id = await deps.search.searchFirstMatch(`${title} trailer`, false, SECONDARY_RETRIES);
      const url = fromVideoId(id);
      if (url) return remember({ url, source: "secondary_fuzzy", confidence: 0.6 });
    } catch (err) {
      if (isRateLimitError(err)) throw err;
      log.warn("trailer_tier_failed", { title, tier: "secondary_fuzzy", error: errorMessage(err) });
    }
  }

  return MISS;
}
