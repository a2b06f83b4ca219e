export type MatcherConfig = {
  threshold: number;
  runtimeToleranceMin: number;
  yearTolerance: number;
  weights: { title: number; runtime: number; year: number };
};

export type ThrottleConfig = {
  tmdbMs: number;
  omdbMs: number;
  youtubeMs: number;
  trendMs: number;
  scraperMs: number;
  jitterMs: number;
};

export type KvConfig = { url: string; token: string };

export type AppConfig = {
  tmdbKey?: string;
  omdbKeys: string[];
  youtubeKey?: string;
  databasePath: string;
  kv: KvConfig | null;
  throttle: ThrottleConfig;
  matcher: MatcherConfig;
};

export const DEFAULT_MATCHER: MatcherConfig = {
  threshold: 0.8,
  runtimeToleranceMin: 10,
  yearTolerance: 1,
  weights: { title: 0.6, runtime: 0.2, year: 0.2 },
};

// Spacing per outbound call, tuned to stay under each provider's quota.
export const DEFAULT_THROTTLE: ThrottleConfig = {
  tmdbMs: 400,
  omdbMs: 600,
  youtubeMs: 400,
  trendMs: 1200,
  scraperMs: 1500,
  jitterMs: 300,
};

const DEFAULT_DATABASE_PATH = "movie_night.sqlite";

type Env = Record<string, string | undefined>;

function splitKeys(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function readKv(env: Env): KvConfig | null {
  // KV_REST_API_* and native UPSTASH_REDIS_REST_* names are both accepted
  const url = env.KV_REST_API_URL ?? env.UPSTASH_REDIS_REST_URL;
  const token = env.KV_REST_API_TOKEN ?? env.UPSTASH_REDIS_REST_TOKEN;
  return url && token ? { url, token } : null;
}

export function loadConfig(env: Env): AppConfig {
  const omdbKeys = splitKeys(env.OMDB_API_KEY);
  return {
    tmdbKey: splitKeys(env.TMDB_API_KEY)[0],
    omdbKeys,
    youtubeKey: env.YOUTUBE_API_KEY || undefined,
    databasePath: env.MOVIE_NIGHT_DB || DEFAULT_DATABASE_PATH,
    kv: readKv(env),
    throttle: {
      ...DEFAULT_THROTTLE,
      jitterMs: readNumber(env, "THROTTLE_JITTER_MS", DEFAULT_THROTTLE.jitterMs),
    },
    matcher: {
      ...DEFAULT_MATCHER,
      threshold: readNumber(env, "MATCH_THRESHOLD", DEFAULT_MATCHER.threshold),
      runtimeToleranceMin: readNumber(
        env,
        "MATCH_RUNTIME_TOLERANCE_MIN",
        DEFAULT_MATCHER.runtimeToleranceMin,
      ),
      yearTolerance: readNumber(
        env,
        "MATCH_YEAR_TOLERANCE",
        DEFAULT_MATCHER.yearTolerance,
      ),
    },
  };
}
