import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";
import { ImdbDetailScraper } from "./imdb-scraper";
import { OmdbClient } from "./omdb";
import { createProviders } from "./providers";
import { TmdbClient } from "./tmdb";
import { YoutubeSearchClient } from "./youtube";

describe("createProviders", () => {
  it("leaves unconfigured providers out", () => {
    const providers = createProviders(loadConfig({}));
    expect(providers.primary).toBeNull();
    expect(providers.secondary).toBeNull();
    expect(providers.search).toBeNull();
    expect(providers.detail).toBeInstanceOf(ImdbDetailScraper);
  });

  it("builds a client for every configured key", () => {
    const providers = createProviders(
      loadConfig({
        TMDB_API_KEY: "test-tmdb-key",
        OMDB_API_KEY: "test-omdb-key",
        YOUTUBE_API_KEY: "test-youtube-key",
      }),
    );
    expect(providers.primary).toBeInstanceOf(TmdbClient);
    expect(providers.secondary).toBeInstanceOf(OmdbClient);
    expect(providers.search).toBeInstanceOf(YoutubeSearchClient);
  });
});
