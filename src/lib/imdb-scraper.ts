import { fetchText } from "./http";
import { HttpError, ProviderRateLimitError } from "./errors";
import { unlimited, type RateLimiter } from "./throttle";

const BROWSER_UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export type DetailRating = { rating: number; voteCount: number | null };

/** Optional title-page scraper used for a vote-weighted IMDb sample. */
export interface DetailScraper {
  fetchAll(imdbId: string): Promise<DetailRating | null>;
}

/** Reads the JSON-LD aggregateRating block; fields can appear in any order. */
export function parseImdbAggregateRating(html: string): DetailRating | null {
  const ratingBlock = html.match(/"aggregateRating":\{[^}]+\}/);
  if (!ratingBlock) return null;

  const valueMatch = ratingBlock[0].match(/"ratingValue":([\d.]+)/);
  const countMatch = ratingBlock[0].match(/"ratingCount":(\d+)/);

  const rating = valueMatch ? parseFloat(valueMatch[1]) : NaN;
  if (!Number.isFinite(rating)) return null;
  const voteCount = countMatch ? parseInt(countMatch[1], 10) : null;

  return { rating, voteCount };
}

type FetchText = typeof fetchText;

export class ImdbDetailScraper implements DetailScraper {
  constructor(
    private readonly limiter: RateLimiter = unlimited,
    private readonly fetcher: FetchText = fetchText,
  ) {}

  async fetchAll(imdbId: string): Promise<DetailRating | null> {
    await this.limiter.acquire();
    try {
      const html = await this.fetcher(`https://www.imdb.com/title/${encodeURIComponent(imdbId)}/`, {
        headers: { "user-agent": BROWSER_UA, "accept-language": "en-US,en;q=0.9" },
      });
      return parseImdbAggregateRating(html);
    } catch (err) {
      if (err instanceof HttpError && err.status === 429) {
        throw new ProviderRateLimitError("imdb");
      }
      throw err;
    }
  }
}
