import { embedTitle, type TitleEmbedder } from "./embedding";
import type { FingerprintSource, MovieFingerprint } from "./types";

type Payload = Record<string, unknown>;
type Normalizer = (payload: Payload, embed: TitleEmbedder) => MovieFingerprint;

// ─── Field readers (never throw) ─────────────────────────────────────────────

const MINUTES_RE = /(\d+)\s*min/i;
const YEAR_RE = /^(\d{4})/;

function isPayload(value: unknown): value is Payload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Trimmed string, with the "not available" markers of each source as null. */
function text(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (trimmed === "" || trimmed === "N/A" || trimmed === "\\N") return null;
  return trimmed;
}

function positiveInt(n: number): number | null {
  return Number.isFinite(n) && n > 0 ? Math.round(n) : null;
}

/** 142, "142", "142 min" → 142 */
export function parseMinutes(value: unknown): number | null {
  if (typeof value === "number") return positiveInt(value);
  const raw = text(value);
  if (raw === null) return null;
  if (/^\d+$/.test(raw)) return positiveInt(Number(raw));
  const m = raw.match(MINUTES_RE);
  return m ? positiveInt(Number(m[1])) : null;
}

/** 2001, "2001", "2001-07-20", "2001–2003" → 2001 */
export function parseYear(value: unknown): number | null {
  if (typeof value === "number") return positiveInt(value);
  const raw = text(value);
  if (raw === null) return null;
  const m = raw.match(YEAR_RE);
  return m ? positiveInt(Number(m[1])) : null;
}

/** OMDb "Released" dates read "20 Jul 2001" */
function yearFromReleased(value: unknown): number | null {
  const raw = text(value);
  if (raw === null) return null;
  const m = raw.match(/\b(\d{4})\b/);
  return m ? positiveInt(Number(m[1])) : null;
}

function build(
  source: FingerprintSource,
  sourceId: string | null,
  title: string | null,
  runtimeMinutes: number | null,
  releaseYear: number | null,
  embed: TitleEmbedder,
): MovieFingerprint {
  return Object.freeze({
    source,
    sourceId,
    title,
    titleEmbedding: title === null ? null : Object.freeze(embed(title)),
    runtimeMinutes,
    releaseYear,
  });
}

// ─── Registry ────────────────────────────────────────────────────────────────

const NORMALIZERS: Record<FingerprintSource, Normalizer> = {
  // IMDb dataset rows (title.basics)
  imdb: (p, embed) =>
    build(
      "imdb",
      text(p.tconst),
      text(p.primaryTitle),
      parseMinutes(p.runtimeMinutes),
      parseYear(p.startYear),
      embed,
    ),

  omdb: (p, embed) =>
    build(
      "omdb",
      text(p.imdbID),
      text(p.Title),
      parseMinutes(p.Runtime),
      yearFromReleased(p.Released) ?? parseYear(p.Year),
      embed,
    ),

  tmdb: (p, embed) =>
    build(
      "tmdb",
      text(p.imdb_id),
      text(p.title),
      parseMinutes(p.runtime),
      parseYear(p.release_date),
      embed,
    ),
};

export function isFingerprintSource(value: string): value is FingerprintSource {
  return value === "imdb" || value === "omdb" || value === "tmdb";
}

/**
 * Build a fingerprint from a raw provider payload. Malformed payloads give a
 * partial (or all-null) fingerprint rather than an error.
 */
export function normalize(
  source: FingerprintSource,
  payload: unknown,
  embed: TitleEmbedder = embedTitle,
): MovieFingerprint {
  return NORMALIZERS[source](isPayload(payload) ? payload : {}, embed);
}
