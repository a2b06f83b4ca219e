import type { CheckpointStore, JobName } from "@/db/checkpoints";
import type { MovieStore } from "@/db/repo";
import type { LRUCache } from "./cache";
import { enrichMovie, type EnrichmentDeps } from "./enrich";
import { isRateLimitError } from "./errors";
import { log, errorMessage } from "./logger";
import type { PrimaryMetadataSource } from "./tmdb";
import { locateTrailer } from "./trailer";
import type { TrailerResult } from "./types";
import type { VideoSearch } from "./youtube";

export type BatchStatus = "completed" | "paused";

export type BatchSummary = {
  status: BatchStatus;
  total: number;
  succeeded: number;
  failed: number;
  /** Last item processed in this run (checkpointed), if any. */
  lastId: number | null;
};

export type BatchOptions = {
  /** Ignore the stored checkpoint and start from the first movie. */
  full?: boolean;
  onProgress?: (done: number, total: number, title: string) => void;
};

type SweepItem = { id: number; title: string };

/**
 * Process items in id order, checkpointing after each one. A provider rate
 * limit stops the sweep and leaves the checkpoint in place for the next run.
 */
async function runSweep(
  job: JobName,
  items: readonly SweepItem[],
  checkpoints: CheckpointStore,
  work: (item: SweepItem) => Promise<{ ok: boolean; title: string }>,
  onProgress?: BatchOptions["onProgress"],
): Promise<BatchSummary> {
  const total = items.length;
  let succeeded = 0;
  let failed = 0;
  let lastId: number | null = null;

  log.info("batch_start", { job, total });

  for (const item of items) {
    let title = item.title;
    try {
      const outcome = await work(item);
      title = outcome.title;
      if (outcome.ok) succeeded++;
      else failed++;
    } catch (err) {
      if (isRateLimitError(err)) {
        log.warn("batch_paused", { job, provider: err.provider, total, succeeded, failed, lastId });
        return { status: "paused", total, succeeded, failed, lastId };
      }
      log.warn("batch_item_failed", { job, movieId: item.id, error: errorMessage(err) });
      failed++;
    }

    await checkpoints.set(job, item.id);
    lastId = item.id;
    onProgress?.(succeeded + failed, total, title);
  }

  await checkpoints.clear(job);
  log.info("batch_complete", { job, total, succeeded, failed });
  return { status: "completed", total, succeeded, failed, lastId };
}

export type MetadataBatchDeps = EnrichmentDeps & { checkpoints: CheckpointStore };

/** Enrich every movie, resuming after the last checkpoint unless `full`. */
export async function runMetadataBatch(
  deps: MetadataBatchDeps,
  options: BatchOptions = {},
): Promise<BatchSummary> {
  const after = options.full ? null : await deps.checkpoints.get("metadata");
  const ids = await deps.store.movieIdsSorted(after);
  const items = ids.map((id) => ({ id, title: `movie ${id}` }));

  return runSweep(
    "metadata",
    items,
    deps.checkpoints,
    async ({ id }) => {
      const report = await enrichMovie(id, deps);
      return { ok: report.failedSteps.length === 0, title: report.title };
    },
    options.onProgress,
  );
}

export type TrailerBatchDeps = {
  store: MovieStore;
  checkpoints: CheckpointStore;
  primary?: Pick<PrimaryMetadataSource, "fetchVideosExact"> | null;
  search?: VideoSearch | null;
  trailerCache?: LRUCache<TrailerResult>;
};

/** Find and store trailers for movies that have none; a miss counts as failed. */
export async function runTrailerBatch(
  deps: TrailerBatchDeps,
  options: BatchOptions = {},
): Promise<BatchSummary> {
  const after = options.full ? null : await deps.checkpoints.get("trailers");
  const items = await deps.store.moviesMissingTrailer(after);

  return runSweep(
    "trailers",
    items,
    deps.checkpoints,
    async ({ id, title }) => {
      const result = await locateTrailer(title, {
        store: deps.store,
        primary: deps.primary,
        search: deps.search,
        cache: deps.trailerCache,
      });
      if (!result.url) return { ok: false, title };
      await deps.store.updateField(id, "youtubeLink", result.url);
      log.info("trailer_stored", { movieId: id, title, source: result.source, confidence: result.confidence });
      return { ok: true, title };
    },
    options.onProgress,
  );
}
