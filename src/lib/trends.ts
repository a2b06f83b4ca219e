import { log } from "./logger";
import { unlimited, type RateLimiter } from "./throttle";

/** Daily search-interest values (0-100), oldest first. */
export interface TrendSource {
  interestOverTime(term: string, days: number): Promise<number[]>;
}

/** One stored value per term and calendar day. */
export interface TrendCacheStore {
  trendCacheGet(term: string, day: string): Promise<number | null>;
  trendCacheSet(term: string, day: string, value: number): Promise<void>;
}

export interface TrendClient {
  fetch7DayAverage(term: string): Promise<number | null>;
}

const WINDOW_DAYS = 7;

export function calendarDay(at: Date): string {
  return at.toISOString().slice(0, 10);
}

/** Rounded mean of the last seven values, or null when there are none. */
export function sevenDayAverage(values: readonly number[]): number | null {
  const window = values.filter((v) => Number.isFinite(v)).slice(-WINDOW_DAYS);
  if (window.length === 0) return null;
  const mean = window.reduce((sum, v) => sum + v, 0) / window.length;
  return Math.round(Math.min(Math.max(mean, 0), 100));
}

export class CachedTrendClient implements TrendClient {
  constructor(
    private readonly source: TrendSource,
    private readonly cache: TrendCacheStore,
    private readonly limiter: RateLimiter = unlimited,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async fetch7DayAverage(term: string): Promise<number | null> {
    const key = term.trim().toLowerCase();
    if (key.length === 0) return null;

    const day = calendarDay(this.now());
    const cached = await this.cache.trendCacheGet(key, day);
    if (cached !== null) {
      log.debug("trend_cache_hit", { term: key, day });
      return cached;
    }

    await this.limiter.acquire();
    const value = sevenDayAverage(await this.source.interestOverTime(term, WINDOW_DAYS));
    if (value !== null) await this.cache.trendCacheSet(key, day, value);
    return value;
  }
}
