import { Redis } from "@upstash/redis";
import { log, errorMessage } from "./logger";
import type { KvConfig } from "./config";

export type JsonPayload = Record<string, unknown>;

/** Second-level cache for raw provider payloads. Never throws. */
export interface PayloadCache {
  get(key: string): Promise<JsonPayload | null>;
  set(key: string, payload: JsonPayload, year: number | null): Promise<void>;
}

// ─── TTL computation (pure) ──────────────────────────────────────────────────

const ONE_DAY_SEC = 24 * 60 * 60;
const THIRTY_DAYS_SEC = 30 * 24 * 60 * 60;

/**
 * Seconds to keep a payload, or null to skip caching. Current-year films
 * still gain box office and ratings, so they are not cached.
 */
export function computeKvTtl(year: number | null, now: Date = new Date()): number | null {
  if (year === null || !Number.isFinite(year)) return null;
  const age = now.getFullYear() - year;
  if (age < 1) return null;
  if (age < 2) return ONE_DAY_SEC;
  return THIRTY_DAYS_SEC;
}

// ─── Upstash-backed cache (lazy client, gracefully degrading) ────────────────

// Bump when the cached shape changes to auto-invalidate stale entries
const KV_SCHEMA_VERSION = 1;

type CachedPayload = { payload: JsonPayload; _v: number };

function isCachedPayload(value: unknown): value is CachedPayload {
  if (typeof value !== "object" || value === null) return false;
  if (!("_v" in value) || !("payload" in value)) return false;
  const payload = value.payload;
  return typeof payload === "object" && payload !== null && !Array.isArray(payload);
}

export class KvPayloadCache implements PayloadCache {
  private client: Redis | null | undefined; // undefined = not initialized

  constructor(
    private readonly config: KvConfig | null,
    private readonly namespace = "omdb",
  ) {}

  private getClient(): Redis | null {
    if (this.client !== undefined) return this.client;

    if (!this.config) {
      log.info("kv_disabled", { reason: "Missing Redis env vars" });
      this.client = null;
      return null;
    }

    try {
      this.client = new Redis({ url: this.config.url, token: this.config.token });
      log.info("kv_enabled");
      return this.client;
    } catch (err) {
      log.warn("kv_init_failed", { error: errorMessage(err) });
      this.client = null;
      return null;
    }
  }

  private kvKey(key: string): string {
    return `${this.namespace}:${key}`;
  }

  async get(key: string): Promise<JsonPayload | null> {
    try {
      const client = this.getClient();
      if (!client) return null;
      const data = await client.get<unknown>(this.kvKey(key));
      if (isCachedPayload(data) && data._v === KV_SCHEMA_VERSION) {
        log.debug("kv_hit", { key });
        return data.payload;
      }
      return null;
    } catch (err) {
      log.warn("kv_get_failed", { key, error: errorMessage(err) });
      return null;
    }
  }

  async set(key: string, payload: JsonPayload, year: number | null): Promise<void> {
    try {
      const ttl = computeKvTtl(year);
      if (ttl === null) return;
      const client = this.getClient();
      if (!client) return;
      const cached: CachedPayload = { payload, _v: KV_SCHEMA_VERSION };
      await client.set(this.kvKey(key), cached, { ex: ttl });
      log.debug("kv_set", { key, ttlSec: ttl });
    } catch (err) {
      log.warn("kv_set_failed", { key, error: errorMessage(err) });
    }
  }
}
