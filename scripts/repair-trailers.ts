/**
 * Trailer sweep: looks up a trailer for every movie that has none.
 *
 * Usage:
 *   npx tsx scripts/repair-trailers.ts [--full]
 *
 * Optional env vars: TMDB_API_KEY, YOUTUBE_API_KEY, MOVIE_NIGHT_DB
 */

import { SqliteCheckpointStore } from "@/db/checkpoints";
import { getDb } from "@/db/client";
import { MovieRepo } from "@/db/repo";
import { runTrailerBatch } from "@/lib/batch";
import { loadConfig } from "@/lib/config";
import { log, errorMessage } from "@/lib/logger";
import { createProviders } from "@/lib/providers";
import { createTrailerCache } from "@/lib/trailer";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const db = getDb(config.databasePath);
  const { primary, search } = createProviders(config);

  const summary = await runTrailerBatch(
    {
      store: new MovieRepo(db),
      checkpoints: new SqliteCheckpointStore(db),
      primary,
      search,
      trailerCache: createTrailerCache(),
    },
    {
      full: process.argv.includes("--full"),
      onProgress: (done, total, title) => log.info("trailer_progress", { label: `[${done}/${total}] ${title}` }),
    },
  );

  if (summary.status === "paused") process.exitCode = 2;
}

main().catch((err: unknown) => {
  log.error("repair_trailers_fatal", { error: errorMessage(err) });
  process.exit(1);
});
