/**
 * Metadata sweep: fills missing fields, ratings, trailers and scores for every
 * stored movie, resuming after the last checkpoint.
 *
 * Usage:
 *   npx tsx scripts/refresh-metadata.ts [--full]
 *
 * Optional env vars: TMDB_API_KEY, OMDB_API_KEY, YOUTUBE_API_KEY,
 * MOVIE_NIGHT_DB, KV_REST_API_URL + KV_REST_API_TOKEN
 */

import { SqliteCheckpointStore } from "@/db/checkpoints";
import { getDb } from "@/db/client";
import { MovieRepo } from "@/db/repo";
import { runMetadataBatch } from "@/lib/batch";
import { loadConfig } from "@/lib/config";
import { buildBaselines } from "@/lib/fairness";
import { log, errorMessage } from "@/lib/logger";
import { createProviders } from "@/lib/providers";
import { createTrailerCache } from "@/lib/trailer";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const db = getDb(config.databasePath);
  const store = new MovieRepo(db);
  const providers = createProviders(config);

  if (!providers.primary && !providers.secondary) {
    log.warn("refresh_limited", { reason: "Neither TMDB_API_KEY nor OMDB_API_KEY is configured" });
  }

  const baselines = buildBaselines(await store.originCounts());
  const summary = await runMetadataBatch(
    {
      store,
      checkpoints: new SqliteCheckpointStore(db),
      baselines,
      ...providers,
      trailerCache: createTrailerCache(),
      matcher: config.matcher,
    },
    {
      full: process.argv.includes("--full"),
      onProgress: (done, total, title) => log.info("refresh_progress", { label: `[${done}/${total}] ${title}` }),
    },
  );

  if (summary.status === "paused") process.exitCode = 2;
}

main().catch((err: unknown) => {
  log.error("refresh_fatal", { error: errorMessage(err) });
  process.exit(1);
});
