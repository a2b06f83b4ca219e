import type { AppConfig } from "./config";
import { ImdbDetailScraper } from "./imdb-scraper";
import { KvPayloadCache } from "./kv";
import { OmdbClient } from "./omdb";
import { MinIntervalLimiter } from "./throttle";
import { TmdbClient } from "./tmdb";
import { YoutubeSearchClient } from "./youtube";

export type Providers = {
  primary: TmdbClient | null;
  secondary: OmdbClient | null;
  search: YoutubeSearchClient | null;
  detail: ImdbDetailScraper;
};

/** One throttled client per configured provider; unconfigured ones are null. */
export function createProviders(config: AppConfig): Providers {
  const { throttle } = config;
  const limiter = (ms: number) => new MinIntervalLimiter(ms, { jitterMs: throttle.jitterMs });

  return {
    primary: config.tmdbKey ? new TmdbClient(config.tmdbKey, limiter(throttle.tmdbMs)) : null,
    secondary:
      config.omdbKeys.length > 0
        ? new OmdbClient(config.omdbKeys, {
            limiter: limiter(throttle.omdbMs),
            kv: config.kv ? new KvPayloadCache(config.kv) : null,
          })
        : null,
    search: config.youtubeKey
      ? new YoutubeSearchClient(config.youtubeKey, limiter(throttle.youtubeMs))
      : null,
    detail: new ImdbDetailScraper(limiter(throttle.scraperMs)),
  };
}
