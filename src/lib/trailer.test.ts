import { describe, it, expect, vi } from "vitest";
import { openDb } from "@/db/client";
import { MovieRepo } from "@/db/repo";
import { createTrailerCache, locateTrailer, type TrailerStore } from "./trailer";
import { ProviderRateLimitError } from "./errors";
import type { VideoSearch } from "./youtube";

const STORED = "https://www.youtube.com/watch?v=ORFWdXl_zJ4";

function store(rows: Array<{ title: string; youtubeLink: string }> = []): TrailerStore {
  return {
    trailerByTitle: vi.fn(async (title: string) => rows.find((r) => r.title === title)?.youtubeLink ?? null),
    moviesWithTrailers: vi.fn(async () => rows),
  };
}

function search(exactId: string | null, looseId: string | null) {
  const client = {
    searchExact: vi.fn(async () => exactId),
    searchFirstMatch: vi.fn(async () => looseId),
  } satisfies VideoSearch;
  return client;
}

describe("locateTrailer", () => {
  it("returns a stored trailer without touching the network", async () => {
    const primary = { fetchVideosExact: vi.fn() };
    const yt = search("aaaaaaaaaaa", "bbbbbbbbbbb");
    const result = await locateTrailer("Up", { store: store([{ title: "Up", youtubeLink: STORED }]), primary, search: yt });
    expect(result).toEqual({ url: STORED, source: "db", confidence: 1 });
    expect(primary.fetchVideosExact).not.toHaveBeenCalled();
    expect(yt.searchExact).not.toHaveBeenCalled();
    expect(yt.searchFirstMatch).not.toHaveBeenCalled();
  });

  it("resolves differently cased titles and aliases at the exact local tier", async () => {
    const handle = openDb(":memory:");
    try {
      const repo = new MovieRepo(handle.db);
      const id = await repo.addMovie({ title: "The Matrix", youtubeLink: STORED });
      await repo.addAlias(id, "Matrix");
      expect(await locateTrailer("the matrix", { store: repo })).toEqual({ url: STORED, source: "db", confidence: 1 });
      expect(await locateTrailer("Matrix", { store: repo })).toEqual({ url: STORED, source: "db", confidence: 1 });
    } finally {
      handle.close();
    }
  });

  it("falls back to a fuzzy local title match", async () => {
    const result = await locateTrailer("Spirited Awey", {
      store: store([{ title: "Spirited Away", youtubeLink: STORED }]),
    });
    expect(result).toEqual({ url: STORED, source: "db_fuzzy", confidence: 0.9 });
  });

  it("treats an invalid stored link as absent", async () => {
    const primary = { fetchVideosExact: vi.fn(async () => ({ trailerUrl: STORED, canonicalTitle: "Up" })) };
    const result = await locateTrailer("Up", {
      store: store([{ title: "Up", youtubeLink: "not-a-url" }]),
      primary,
    });
    expect(result).toEqual({ url: STORED, source: "provider", confidence: 0.95 });
  });

  it("searches by the canonical title when the provider has no trailer", async () => {
    const primary = { fetchVideosExact: vi.fn(async () => ({ trailerUrl: null, canonicalTitle: "Up" })) };
    const yt = search("aaaaaaaaaaa", "bbbbbbbbbbb");
    const result = await locateTrailer("up", { store: store(), primary, search: yt });
    expect(result).toEqual({
      url: "https://www.youtube.com/watch?v=aaaaaaaaaaa",
      source: "secondary_exact",
      confidence: 0.8,
    });
    expect(yt.searchExact).toHaveBeenCalledWith("Up trailer");
    expect(yt.searchFirstMatch).not.toHaveBeenCalled();
  });

  it("falls through to a loose search with retries", async () => {
    const primary = { fetchVideosExact: vi.fn(async () => null) };
    const yt = search("aaaaaaaaaaa", "bbbbbbbbbbb");
    const result = await locateTrailer("Up", { store: store(), primary, search: yt });
    expect(result).toEqual({
      url: "https://www.youtube.com/watch?v=bbbbbbbbbbb",
      source: "secondary_fuzzy",
      confidence: 0.6,
    });
    expect(yt.searchExact).not.toHaveBeenCalled();
    expect(yt.searchFirstMatch).toHaveBeenCalledWith("Up trailer", false, 3);
  });

  it("treats network errors as tier failures", async () => {
    const primary = { fetchVideosExact: vi.fn().mockRejectedValue(new Error("tmdb timed out after 10000ms")) };
    const yt = {
      searchExact: vi.fn(),
      searchFirstMatch: vi.fn().mockRejectedValue(new Error("fetch failed")),
    };
    const result = await locateTrailer("Up", { store: store(), primary, search: yt });
    expect(result).toEqual({ url: null, source: "none", confidence: 0 });
    expect(yt.searchFirstMatch).toHaveBeenCalledTimes(1);
  });

  it("lets a provider rate limit escape instead of falling through", async () => {
    const primary = { fetchVideosExact: vi.fn().mockRejectedValue(new ProviderRateLimitError("tmdb")) };
    const yt = search("aaaaaaaaaaa", "bbbbbbbbbbb");
    await expect(locateTrailer("Up", { store: store(), primary, search: yt })).rejects.toBeInstanceOf(
      ProviderRateLimitError,
    );
    expect(yt.searchFirstMatch).not.toHaveBeenCalled();
  });

  it("lets a search quota error escape", async () => {
    const yt = {
      searchExact: vi.fn(),
      searchFirstMatch: vi.fn().mockRejectedValue(new ProviderRateLimitError("youtube")),
    };
    await expect(locateTrailer("Up", { store: store(), search: yt })).rejects.toBeInstanceOf(ProviderRateLimitError);
  });

  it("rejects malformed video ids from search", async () => {
    const yt = search(null, "short");
    const result = await locateTrailer("Up", { store: store(), search: yt });
    expect(result.source).toBe("none");
  });

  it("remembers earlier hits", async () => {
    const cache = createTrailerCache();
    const primary = { fetchVideosExact: vi.fn(async () => ({ trailerUrl: STORED, canonicalTitle: "Up" })) };
    const deps = { store: store(), primary, cache };
    await locateTrailer("Up", deps);
    const again = await locateTrailer("Up", deps);
    expect(again).toEqual({ url: STORED, source: "provider", confidence: 0.95 });
    expect(primary.fetchVideosExact).toHaveBeenCalledTimes(1);
  });

  it("does not remember misses", async () => {
    const cache = createTrailerCache();
    const primary = { fetchVideosExact: vi.fn(async () => null) };
    await locateTrailer("Up", { store: store(), primary, cache });
    await locateTrailer("Up", { store: store(), primary, cache });
    expect(primary.fetchVideosExact).toHaveBeenCalledTimes(2);
  });
});
