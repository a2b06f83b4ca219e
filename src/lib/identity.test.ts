import { describe, it, expect } from "vitest";
import { sameMovie } from "./identity";
import { normalize } from "./fingerprint";
import { DEFAULT_MATCHER } from "./config";
import type { MovieFingerprint } from "./types";

function fp(overrides: Partial<MovieFingerprint>): MovieFingerprint {
  return {
    source: "tmdb",
    sourceId: null,
    title: null,
    titleEmbedding: null,
    runtimeMinutes: null,
    releaseYear: null,
    ...overrides,
  };
}

describe("sameMovie", () => {
  it("treats equal external ids as decisive", () => {
    const a = fp({ sourceId: "tt1049413", title: "Up", titleEmbedding: [1, 0], releaseYear: 2009 });
    const b = fp({ sourceId: "tt1049413", title: "Oben", titleEmbedding: [0, 1], releaseYear: 1950 });
    expect(sameMovie(a, b)).toEqual({ isMatch: true, confidence: 1 });
  });

  it("treats different external ids as decisive", () => {
    const a = fp({ sourceId: "tt1049413", titleEmbedding: [1, 0], runtimeMinutes: 96, releaseYear: 2009 });
    const b = fp({ sourceId: "tt0075376", titleEmbedding: [1, 0], runtimeMinutes: 96, releaseYear: 2009 });
    expect(sameMovie(a, b)).toEqual({ isMatch: false, confidence: 0 });
  });

  it("ignores an id present on one side only", () => {
    const a = fp({ sourceId: "tt1049413", runtimeMinutes: 96 });
    const b = fp({ runtimeMinutes: 100 });
    expect(sameMovie(a, b)).toEqual({ isMatch: true, confidence: 1 });
  });

  it("returns no match with zero confidence when no signal is shared", () => {
    const a = fp({ titleEmbedding: [1, 0] });
    const b = fp({ runtimeMinutes: 96 });
    expect(sameMovie(a, b)).toEqual({ isMatch: false, confidence: 0 });
  });

  it("matches exactly at the threshold", () => {
    // cosine([4,3],[4,0]) = 16 / 20 = 0.8, the only shared signal
    const result = sameMovie(fp({ titleEmbedding: [4, 3] }), fp({ titleEmbedding: [4, 0] }));
    expect(result.confidence).toBe(0.8);
    expect(result.isMatch).toBe(true);
  });

  it("renormalizes weights over the shared signals", () => {
    const a = fp({ titleEmbedding: [4, 3], runtimeMinutes: 96 });
    const b = fp({ titleEmbedding: [4, 0], runtimeMinutes: 120 });
    const result = sameMovie(a, b);
    // (0.6 * 0.8 + 0.2 * 0) / 0.8
    expect(result.confidence).toBeCloseTo(0.6, 10);
    expect(result.isMatch).toBe(false);
  });

  it("applies runtime and year tolerances inclusively", () => {
    const base = fp({ runtimeMinutes: 96, releaseYear: 2009 });
    expect(sameMovie(base, fp({ runtimeMinutes: 106, releaseYear: 2010 })).confidence).toBe(1);
    expect(sameMovie(base, fp({ runtimeMinutes: 107, releaseYear: 2011 })).confidence).toBe(0);
  });

  it("is symmetric", () => {
    const a = normalize("omdb", { Title: "Spirited Away", Runtime: "125 min", Year: "2001" });
    const b = normalize("tmdb", { title: "Spirited Away!", runtime: 124, release_date: "2002-03-01" });
    expect(sameMovie(a, b)).toEqual(sameMovie(b, a));
  });

  it("tells apart two films sharing a title", () => {
    const pixar = normalize("tmdb", { title: "Up", runtime: 96, release_date: "2009-05-28" });
    const older = normalize("omdb", { Title: "Up!", Runtime: "80 min", Year: "1976" });
    const result = sameMovie(pixar, older);
    expect(result.confidence).toBeCloseTo(0.6, 10);
    expect(result.isMatch).toBe(false);

    const again = normalize("omdb", { Title: "Up", Runtime: "96 min", Released: "29 May 2009" });
    expect(sameMovie(pixar, again).isMatch).toBe(true);
  });

  it("matches the same film listed with slightly different runtimes and no ids", () => {
    const a = normalize("tmdb", { title: "Up", runtime: 96, release_date: "2009-05-29" });
    const b = normalize("omdb", { Title: "Up", Runtime: "98 min", Year: "2009" });
    const result = sameMovie(a, b);
    expect(result.isMatch).toBe(true);
    expect(result.confidence).toBeCloseTo(1, 10);
  });

  it("reads threshold and tolerances from config", () => {
    const a = fp({ runtimeMinutes: 96, releaseYear: 2009 });
    const b = fp({ runtimeMinutes: 101, releaseYear: 2009 });
    const strict = { ...DEFAULT_MATCHER, runtimeToleranceMin: 2 };
    expect(sameMovie(a, b, strict)).toEqual({ isMatch: false, confidence: 0.5 });
    expect(sameMovie(a, b, { ...strict, threshold: 0.5 }).isMatch).toBe(true);
  });
});
