import { HttpError, TransportError } from "./errors";

const DEFAULT_TIMEOUT_MS = 10_000;
const USER_AGENT = "movie-night-core/0.1";

// GET/HEAD only. 429 is never retried here: provider clients turn it into a
// rate-limit error so a batch can pause instead of hammering the quota.
const MAX_ATTEMPTS = 3;
const TRANSIENT_STATUS = new Set([408, 500, 502, 503, 504]);
const BACKOFF_STEP_MS = 250;

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRepeatable(init: RequestInit): boolean {
  const method = (init.method ?? "GET").toUpperCase();
  return method === "GET" || method === "HEAD";
}

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * One request with a hard deadline. A timeout or network failure becomes a
 * TransportError; an abort requested by the caller is passed through.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<Response> {
  const deadline = new AbortController();
  const timer = setTimeout(() => deadline.abort(), timeoutMs);
  const signal = init.signal ? AbortSignal.any([init.signal, deadline.signal]) : deadline.signal;

  try {
    return await fetch(url, {
      ...init,
      signal,
      headers: { "user-agent": USER_AGENT, ...(init.headers ?? {}) },
    });
  } catch (err) {
    if (init.signal?.aborted) throw err;
    if (isAbortError(err)) {
      throw new TransportError(`${hostOf(url)} timed out after ${timeoutMs}ms`, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransportError(`${hostOf(url)} unreachable: ${reason}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

async function request(url: string, init: RequestInit = {}, timeoutMs?: number): Promise<Response> {
  const attempts = isRepeatable(init) ? MAX_ATTEMPTS : 1;

  for (let attempt = 1; ; attempt++) {
    const last = attempt >= attempts || Boolean(init.signal?.aborted);
    let res: Response;
    try {
      res = await fetchWithTimeout(url, init, timeoutMs);
    } catch (err) {
      if (last || !(err instanceof TransportError)) throw err;
      await delay(BACKOFF_STEP_MS * attempt);
      continue;
    }

    if (res.ok || last || !TRANSIENT_STATUS.has(res.status)) return res;
    await delay(BACKOFF_STEP_MS * attempt);
  }
}

/** Parsed JSON body; callers narrow it at their boundary. */
export async function fetchJson(url: string, init?: RequestInit, timeoutMs?: number): Promise<unknown> {
  const res = await request(url, init, timeoutMs);
  if (!res.ok) throw new HttpError(res.status, res.statusText);
  const body: unknown = await res.json();
  return body;
}

export async function fetchText(url: string, init?: RequestInit, timeoutMs?: number): Promise<string> {
  const res = await request(url, init, timeoutMs);
  if (!res.ok) throw new HttpError(res.status, res.statusText);
  return res.text();
}

/** Absolute URL with query params; undefined values are left out. */
export function buildUrl(base: string, params: Record<string, string | number | undefined>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}
