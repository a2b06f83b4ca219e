import { DEFAULT_MATCHER, type MatcherConfig } from "./config";
import { normalize } from "./fingerprint";
import { sameMovie } from "./identity";
import type { JsonRecord } from "./json";
import { log } from "./logger";
import type { SecondaryMetadataSource } from "./omdb";
import type { MovieFingerprint } from "./types";

export type SecondaryLookup = {
  title: string;
  imdbId: string | null;
  /** What the primary provider (or the stored row) says the film is. */
  fingerprint: MovieFingerprint | null;
};

/**
 * Secondary payload for a film: an IMDb-id lookup is trusted as-is; a title
 * lookup is kept only when its fingerprint matches the primary one.
 */
export async function resolveSecondaryPayload(
  secondary: SecondaryMetadataSource,
  lookup: SecondaryLookup,
  matcher: MatcherConfig = DEFAULT_MATCHER,
): Promise<JsonRecord | null> {
  if (lookup.imdbId) {
    const byId = await secondary.getPayload({ imdbId: lookup.imdbId });
    if (byId) return byId;
  }

  const byTitle = await secondary.getPayload({ title: lookup.title });
  if (!byTitle) return null;
  if (!lookup.fingerprint) return byTitle;

  const { isMatch, confidence } = sameMovie(
    lookup.fingerprint,
    normalize("omdb", byTitle),
    matcher,
  );
  if (!isMatch) {
    log.info("secondary_payload_rejected", { title: lookup.title, confidence });
    return null;
  }
  return byTitle;
}

/** Fingerprint of a stored row, for when the primary sweep did not run. */
export function fingerprintFromRow(row: {
  title: string;
  imdbId: string | null;
  durationSeconds: number | null;
  year: number | null;
}): MovieFingerprint {
  return normalize("tmdb", {
    title: row.title,
    imdb_id: row.imdbId,
    runtime: row.durationSeconds === null ? null : Math.round(row.durationSeconds / 60),
    release_date: row.year === null ? null : String(row.year),
  });
}
