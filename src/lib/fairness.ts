import baselineData from "../../data/baselines.json";
import type { Baselines, RatingSample, RatingSource } from "./types";

/**
 * Fairness-weighted scoring.
 *
 * Every numeric signal is re-normalized against a baseline share before it is
 * trusted: films from countries under-represented in the catalogue (relative
 * to world population) get extra weight and a small flat bonus, and trend
 * values are scaled by the origin country's internet penetration.
 */

// ─── Constants ────────────────────────────────────────────────────────────────

const FAIRNESS_K = 5;
const ORIGIN_BONUS_SLOPE = 3;
const DEFAULT_PENETRATION = baselineData.defaultInternetPenetration;
const MIN_PENETRATION = 0.05;
const ACTOR_POPULARITY_SHARE = 0.3;
const ACTOR_TREND_SHARE = 0.7;
const ACTOR_BONUS_CAP = 2.5;

// Sources with a known audience skew count for less
const SOURCE_PENALTY: Partial<Record<RatingSource, number>> = {
  IMDB: 1.5,
  IMDB_DETAIL: 1.5,
  METACRITIC: 1.2,
  RT_CRITIC: 1.2,
};

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

// ─── Baselines ────────────────────────────────────────────────────────────────

type CountryBaseline = { populationShare: number; internetPenetration: number };

/** Population share and internet penetration shipped with the project. */
export function loadReferenceBaselines(): Record<string, CountryBaseline> {
  return baselineData.countries;
}

/**
 * Freeze baselines for one run. Catalogue share comes from the count of
 * stored films per origin country.
 */
export function buildBaselines(
  originCounts: ReadonlyMap<string, number>,
  reference: Record<string, CountryBaseline> = loadReferenceBaselines(),
): Baselines {
  const total = [...originCounts.values()].reduce((sum, n) => sum + n, 0);
  const catalogueShare = new Map<string, number>();
  if (total > 0) {
    for (const [country, n] of originCounts) catalogueShare.set(country, n / total);
  }

  const entries = Object.entries(reference);
  return Object.freeze({
    populationShare: new Map(entries.map(([c, b]) => [c, b.populationShare])),
    catalogueShare,
    internetPenetration: new Map(entries.map(([c, b]) => [c, b.internetPenetration])),
  });
}

function representationGap(origin: string | null, base: Baselines): number {
  if (!origin) return 0;
  const global = base.populationShare.get(origin) ?? 0;
  const catalogue = base.catalogueShare.get(origin) ?? 0;
  return Math.max(global - catalogue, 0);
}

// ─── Generic helpers ──────────────────────────────────────────────────────────

/** Extra points (0..k) for a film whose origin is under-represented. */
export function fairnessBonus(origin: string | null, base: Baselines, k: number = FAIRNESS_K): number {
  return round2(k * representationGap(origin, base));
}

/**
 * Beta-Binomial posterior over a 10-bucket histogram (stars 1..10), with
 * add-one smoothing. Mean is on a 0-10 scale.
 */
export function posterior(histogram: readonly number[]): { mean: number; variance: number } {
  let alpha = 1;
  let beta = 1;
  for (let k = 1; k <= 10; k++) {
    const count = Math.max(histogram[k - 1] ?? 0, 0);
    alpha += k * count;
    beta += (11 - k) * count;
  }
  const total = alpha + beta;
  return {
    mean: (10 * alpha) / total,
    variance: (100 * alpha * beta) / (total * total * (total + 1)),
  };
}

export function demographicWeight(source: RatingSource, origin: string | null, base: Baselines): number {
  const penalty = SOURCE_PENALTY[source] ?? 1;
  return (1 + ORIGIN_BONUS_SLOPE * representationGap(origin, base)) / penalty;
}

// ─── Public scoring ───────────────────────────────────────────────────────────

/**
 * Fuse rating samples into one 0-100 score. Histogram sources are weighted by
 * posterior precision, scalar sources by their sample count.
 */
export function combinedScoreFair(
  samples: readonly RatingSample[],
  origin: string | null,
  base: Baselines,
): number | null {
  let weighted = 0;
  let totalWeight = 0;

  for (const sample of samples) {
    let mean: number;
    let quantity: number;
    if (sample.histogram && sample.histogram.length > 0) {
      const post = posterior(sample.histogram);
      mean = post.mean;
      quantity = 1 / post.variance;
    } else {
      mean = sample.score / 10;
      quantity = sample.sampleCount !== null && sample.sampleCount > 0 ? sample.sampleCount : 1;
    }
    const w = quantity * demographicWeight(sample.source, origin, base);
    weighted += w * mean;
    totalWeight += w;
  }

  if (totalWeight <= 0) return null;
  const raw = (weighted / totalWeight) * 10;
  const final = Math.min(raw + fairnessBonus(origin, base), 100);
  return round2(Math.max(final, 0));
}

/** Google Trends value normalized by the country's internet penetration. */
export function gtrendFair(rawTrend: number, country: string | null, base: Baselines): number {
  const known = country ? base.internetPenetration.get(country) : undefined;
  const pen = Math.max(known ?? DEFAULT_PENETRATION, MIN_PENETRATION);
  return Math.min(round2(Math.max(rawTrend, 0) / pen), 100);
}

/** 30% cast popularity + 70% search trend, plus half the fairness bonus. */
export function actorTrendFair(
  popularity: number,
  trend: number,
  origin: string | null,
  base: Baselines,
): number {
  const raw = ACTOR_POPULARITY_SHARE * popularity + ACTOR_TREND_SHARE * trend;
  const bonus = Math.min(fairnessBonus(origin, base) / 2, ACTOR_BONUS_CAP);
  return round2(Math.min(Math.max(raw + bonus, 0), 100));
}
