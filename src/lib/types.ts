export type FingerprintSource = "imdb" | "omdb" | "tmdb";

export type MovieFingerprint = Readonly<{
  source: FingerprintSource;
  sourceId: string | null; // IMDb-style id (tt…)
  title: string | null;
  titleEmbedding: readonly number[] | null;
  runtimeMinutes: number | null;
  releaseYear: number | null;
}>;

export type MatchResult = {
  isMatch: boolean;
  confidence: number; // 0-1
};

export type Movie = {
  id: number;
  title: string;
  imdbId: string | null;
  tmdbId: number | null;
  plotDesc: string | null;
  year: number | null;
  releaseWindow: string | null;
  ratingCert: string | null;
  durationSeconds: number | null;
  youtubeLink: string | null;
  boxOfficeExpected: number | null;
  boxOfficeActual: number | null;
  googleTrendScore: number | null; // 0-100
  actorTrendScore: number | null; // 0-100
  combinedScore: number | null; // 0-100
  franchise: string | null;
  origin: string | null; // ISO 3166-1 alpha-2
};

/** Columns the enrichment pipeline may write one at a time. */
export type MovieField = Exclude<keyof Movie, "id">;

export const MOVIE_FIELDS = [
  "title",
  "imdbId",
  "tmdbId",
  "plotDesc",
  "year",
  "releaseWindow",
  "ratingCert",
  "durationSeconds",
  "youtubeLink",
  "boxOfficeExpected",
  "boxOfficeActual",
  "googleTrendScore",
  "actorTrendScore",
  "combinedScore",
  "franchise",
  "origin",
] as const satisfies readonly MovieField[];

export const SCORE_FIELDS = [
  "googleTrendScore",
  "actorTrendScore",
  "combinedScore",
] as const satisfies readonly MovieField[];

export type RatingSource =
  | "IMDB"
  | "IMDB_DETAIL"
  | "TMDB"
  | "RT_CRITIC"
  | "RT_AUDIENCE"
  | "METACRITIC";

export type RatingSample = {
  movieId: number;
  source: RatingSource;
  score: number; // 0-100
  sampleCount: number | null;
  histogram: readonly number[] | null; // vote counts for stars 1..10
};

export type Baselines = Readonly<{
  populationShare: ReadonlyMap<string, number>;
  catalogueShare: ReadonlyMap<string, number>;
  internetPenetration: ReadonlyMap<string, number>;
}>;

export type TrailerSource =
  | "db"
  | "db_fuzzy"
  | "provider"
  | "secondary_exact"
  | "secondary_fuzzy"
  | "none";

export type TrailerResult = {
  url: string | null;
  source: TrailerSource;
  confidence: number;
};

export type SimilarityPair = {
  a: number;
  b: number;
  similarity: number; // 0-1
};

export type SimilarityResult = {
  pairs: SimilarityPair[];
  // Group-level total is undefined until the product defines a formula.
  weightedTotal: null;
};
