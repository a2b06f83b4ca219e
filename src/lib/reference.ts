import reference from "../../data/international-reference.json";

export type ReleaseWindow = { start: string; end: string; label: string };
export type RatingScheme = { body: string; levels: string[]; adultCutoff: string };
export type AgeGroup = "all_ages" | "kids" | "teen" | "adult" | "unknown";

const RELEASE_WINDOWS: Record<string, ReleaseWindow[]> = reference.releaseWindows;
const LETTER_TO_AGE: Record<string, number> = reference.letterToAge;
const RATING_SCHEMES: Record<string, RatingScheme> = reference.ratingSchemes;
const SOUTHERN_HEMISPHERE: ReadonlySet<string> = new Set(reference.southernHemisphere);

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** "YYYY-MM-DD" → "MM-DD", or null for anything that is not a real date */
function monthDay(date: string): { md: string; month: number } | null {
  const m = date.trim().match(ISO_DATE_RE);
  if (!m) return null;
  const [, y, mo, d] = m;
  const parsed = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d)));
  if (parsed.getUTCMonth() !== Number(mo) - 1 || parsed.getUTCDate() !== Number(d)) {
    return null;
  }
  return { md: `${mo}-${d}`, month: Number(mo) };
}

function inWindow(md: string, w: ReleaseWindow): boolean {
  // Windows such as 12-20 → 01-06 run across the new year
  return w.start <= w.end
    ? md >= w.start && md <= w.end
    : md >= w.start || md <= w.end;
}

/**
 * Label a release date with the country's holiday window, falling back to the
 * meteorological season of the country's hemisphere. Invalid dates give "".
 */
export function classifyReleaseWindow(date: string | null, country: string | null): string {
  if (!date) return "";
  const parsed = monthDay(date);
  if (!parsed) return "";

  const code = (country ?? "US").toUpperCase();
  const hit = (RELEASE_WINDOWS[code] ?? []).find((w) => inWindow(parsed.md, w));
  if (hit) return hit.label;

  const seasons = SOUTHERN_HEMISPHERE.has(code)
    ? reference.seasons.south
    : reference.seasons.north;
  return seasons[Math.floor((parsed.month % 12) / 3)];
}

export function ratingMinAge(cert: string): number | null {
  const symbol = cert.trim().toUpperCase();
  const digits = symbol.match(/\d+/);
  if (digits) return Number(digits[0]);
  return LETTER_TO_AGE[symbol] ?? null;
}

/** Map a local certification to a broad audience bucket. */
export function ratingToAgeGroup(country: string | null, cert: string | null): AgeGroup {
  if (!cert || cert.trim() === "") return "unknown";

  const age = ratingMinAge(cert);
  if (age === null) {
    const scheme = country ? RATING_SCHEMES[country.toUpperCase()] : undefined;
    return scheme && cert.trim() === scheme.adultCutoff ? "adult" : "unknown";
  }
  if (age < 7) return "all_ages";
  if (age < 13) return "kids";
  if (age < 17) return "teen";
  return "adult";
}

export function ratingScheme(country: string): RatingScheme | null {
  return RATING_SCHEMES[country.toUpperCase()] ?? null;
}
