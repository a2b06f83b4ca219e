import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { openDb, type OpenDb } from "@/db/client";
import { MovieRepo } from "@/db/repo";
import { enrichMovie, type EnrichmentDeps } from "./enrich";
import { ProviderRateLimitError } from "./errors";
import { buildBaselines } from "./fairness";
import { normalize } from "./fingerprint";
import type { JsonRecord } from "./json";
import type { SecondaryMetadataSource } from "./omdb";
import type { PrimaryMetadataSource } from "./tmdb";
import type { TrendClient } from "./trends";

const TRAILER = "https://www.youtube.com/watch?v=abcdefghijk";

const OMDB_HEAT: JsonRecord = {
  Title: "Heat",
  Year: "1995",
  imdbID: "tt0113277",
  Runtime: "170 min",
  BoxOffice: "$67,436,818",
  Plot: "A heist.",
  imdbRating: "8.3",
  imdbVotes: "700,000",
  Metascore: "76",
  Ratings: [{ Source: "Rotten Tomatoes", Value: "88%" }],
};

function fakePrimary(): PrimaryMetadataSource {
  return {
    fetchMetadata: vi.fn(async () => ({
      movieFields: {
        title: "Heat",
        imdbId: "tt0113277",
        tmdbId: 949,
        year: 1995,
        ratingCert: "R",
        durationSeconds: 10200,
        origin: "US",
      },
      genres: ["Crime", "Drama"],
      fingerprint: normalize("tmdb", {
        imdb_id: "tt0113277",
        title: "Heat",
        runtime: 170,
        release_date: "1995-12-15",
      }),
    })),
    fetchUserRating: vi.fn(async () => ({ mean: 8.2, votes: 1000 })),
    fetchVideosExact: vi.fn(async () => ({ trailerUrl: TRAILER, canonicalTitle: "Heat" })),
    fetchCastPopularity: vi.fn(async () => 50),
  };
}

function fakeSecondary(payload: JsonRecord | null = OMDB_HEAT): SecondaryMetadataSource {
  return { getPayload: vi.fn(async () => payload) };
}

function fakeTrends(value: number | null = 7): TrendClient {
  return { fetch7DayAverage: vi.fn(async () => value) };
}

let handle: OpenDb;
let repo: MovieRepo;
const baselines = buildBaselines(new Map(), {});

beforeEach(() => {
  handle = openDb(":memory:");
  repo = new MovieRepo(handle.db);
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  handle.close();
  vi.restoreAllMocks();
});

describe("enrichMovie", () => {
  it("fills every missing field from the providers in order", async () => {
    const id = await repo.addMovie({ title: "Heat" });
    const secondary = fakeSecondary();
    const deps: EnrichmentDeps = {
      store: repo,
      baselines,
      primary: fakePrimary(),
      secondary,
      trends: fakeTrends(),
    };

    const report = await enrichMovie(id, deps);

    expect(report.filled).toEqual([
      "imdbId",
      "tmdbId",
      "year",
      "ratingCert",
      "durationSeconds",
      "origin",
      "boxOfficeActual",
      "plotDesc",
      "youtubeLink",
      "googleTrendScore",
      "actorTrendScore",
    ]);
    expect(report.ratings).toEqual(["TMDB", "IMDB", "RT_CRITIC", "METACRITIC"]);
    expect(report.failedSteps).toEqual([]);
    expect(report.combinedScore).toBe(83);

    expect(secondary.getPayload).toHaveBeenCalledWith({ imdbId: "tt0113277" });

    const movie = await repo.byId(id);
    expect(movie).toMatchObject({
      tmdbId: 949,
      durationSeconds: 10200,
      boxOfficeActual: 67436818,
      plotDesc: "A heist.",
      youtubeLink: TRAILER,
      googleTrendScore: 20,
      actorTrendScore: 29,
      combinedScore: 83,
    });
    expect(await repo.genres(id)).toEqual(["Crime", "Drama"]);
    expect(await repo.ratingSamples(id)).toEqual([
      { movieId: id, source: "IMDB", score: 83, sampleCount: 700000, histogram: null },
      { movieId: id, source: "METACRITIC", score: 76, sampleCount: null, histogram: null },
      { movieId: id, source: "RT_CRITIC", score: 88, sampleCount: null, histogram: null },
      { movieId: id, source: "TMDB", score: 82, sampleCount: 1000, histogram: null },
    ]);
  });

  it("makes no provider calls and one write on a second run", async () => {
    const id = await repo.addMovie({ title: "Heat" });
    const primary = fakePrimary();
    const secondary = fakeSecondary();
    const trends = fakeTrends();
    const deps: EnrichmentDeps = { store: repo, baselines, primary, secondary, trends };
    await enrichMovie(id, deps);
    vi.clearAllMocks();

    const updateField = vi.spyOn(repo, "updateField");
    const upsertRating = vi.spyOn(repo, "upsertRating");
    const report = await enrichMovie(id, deps);

    expect(primary.fetchMetadata).not.toHaveBeenCalled();
    expect(primary.fetchUserRating).not.toHaveBeenCalled();
    expect(primary.fetchVideosExact).not.toHaveBeenCalled();
    expect(primary.fetchCastPopularity).not.toHaveBeenCalled();
    expect(secondary.getPayload).not.toHaveBeenCalled();
    expect(trends.fetch7DayAverage).not.toHaveBeenCalled();
    expect(upsertRating).not.toHaveBeenCalled();
    expect(updateField).toHaveBeenCalledTimes(1);
    expect(updateField).toHaveBeenCalledWith(id, "combinedScore", 83);
    expect(report.filled).toEqual([]);
    expect(report.combinedScore).toBe(83);
  });

  it("does not query the secondary source again for ratings it never reports", async () => {
    const id = await repo.addMovie({ title: "Heat", imdbId: "tt0113277" });
    const secondary = fakeSecondary({
      Title: "Heat",
      Year: "1995",
      imdbID: "tt0113277",
      Runtime: "170 min",
      BoxOffice: "$67,436,818",
      Plot: "A heist.",
      imdbRating: "8.3",
      imdbVotes: "700,000",
      Metascore: "N/A",
      Ratings: [],
    });
    const deps: EnrichmentDeps = { store: repo, baselines, secondary };

    const first = await enrichMovie(id, deps);
    await enrichMovie(id, deps);

    expect(first.ratings).toEqual(["IMDB"]);
    expect(secondary.getPayload).toHaveBeenCalledTimes(1);
    expect(await repo.hasRating(id, "METACRITIC")).toBe(false);
  });

  it("leaves the actor trend empty until a search trend is stored", async () => {
    const id = await repo.addMovie({ title: "Heat", tmdbId: 949 });
    const primary = fakePrimary();

    const report = await enrichMovie(id, { store: repo, baselines, primary });

    expect(primary.fetchCastPopularity).not.toHaveBeenCalled();
    expect(report.filled).toEqual(["youtubeLink"]);
    expect((await repo.byId(id))?.actorTrendScore).toBeNull();
  });

  it("lets a provider rate limit escape", async () => {
    const id = await repo.addMovie({ title: "Heat" });
    const primary = fakePrimary();
    vi.mocked(primary.fetchMetadata).mockRejectedValueOnce(new ProviderRateLimitError("tmdb"));

    await expect(enrichMovie(id, { store: repo, baselines, primary })).rejects.toBeInstanceOf(
      ProviderRateLimitError,
    );
  });

  it("logs and skips a failing step, then still writes the combined score", async () => {
    const id = await repo.addMovie({ title: "Heat" });
    const warn = vi.spyOn(console, "log");
    const primary: PrimaryMetadataSource = {
      fetchMetadata: vi.fn(async () => {
        throw new Error("boom");
      }),
      fetchUserRating: vi.fn(async () => null),
      fetchVideosExact: vi.fn(async () => null),
      fetchCastPopularity: vi.fn(async () => null),
    };

    const report = await enrichMovie(id, { store: repo, baselines, primary });

    expect(report.failedSteps).toEqual(["primary"]);
    expect(report.filled).toEqual([]);
    expect(report.combinedScore).toBeNull();
    expect(primary.fetchUserRating).not.toHaveBeenCalled();
    expect(primary.fetchVideosExact).toHaveBeenCalledWith("Heat");
    const logged = warn.mock.calls.map(([line]) => JSON.parse(String(line)));
    expect(logged).toContainEqual(
      expect.objectContaining({ level: "warn", msg: "enrich_step_failed", step: "primary", error: "boom" }),
    );
  });

  it("rejects a title lookup that does not match the stored film", async () => {
    const id = await repo.addMovie({ title: "Up", year: 2009, durationSeconds: 5760 });
    const secondary = fakeSecondary({ Title: "Up!", Year: "1976", Runtime: "80 min", Plot: "Other film." });

    const report = await enrichMovie(id, { store: repo, baselines, secondary });

    expect(secondary.getPayload).toHaveBeenCalledWith({ title: "Up" });
    expect(report.filled).toEqual([]);
    expect((await repo.byId(id))?.plotDesc).toBeNull();
  });

  it("adds the detail-page rating once an imdb id is known", async () => {
    const id = await repo.addMovie({ title: "Heat", imdbId: "tt0113277" });
    const detail = { fetchAll: vi.fn(async () => ({ rating: 8.3, voteCount: 720000 })) };

    const report = await enrichMovie(id, { store: repo, baselines, detail });

    expect(detail.fetchAll).toHaveBeenCalledWith("tt0113277");
    expect(report.ratings).toEqual(["IMDB_DETAIL"]);
    expect(await repo.hasRating(id, "IMDB_DETAIL")).toBe(true);
  });

  it("fails for an unknown movie id", async () => {
    await expect(enrichMovie(999, { store: repo, baselines })).rejects.toThrow("movie 999 not found");
  });
});
