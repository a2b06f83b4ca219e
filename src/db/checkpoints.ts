import { eq } from "drizzle-orm";
import type { DbClient } from "./client";
import { checkpoints } from "./schema";

export type JobName = "metadata" | "trailers";

/** Last processed movie id per batch job, so an interrupted sweep can resume. */
export interface CheckpointStore {
  get(job: JobName): Promise<number | null>;
  set(job: JobName, lastId: number): Promise<void>;
  clear(job: JobName): Promise<void>;
}

export class SqliteCheckpointStore implements CheckpointStore {
  constructor(
    private readonly db: DbClient,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async get(job: JobName): Promise<number | null> {
    const row = this.db
      .select({ lastId: checkpoints.lastId })
      .from(checkpoints)
      .where(eq(checkpoints.job, job))
      .get();
    return row?.lastId ?? null;
  }

  async set(job: JobName, lastId: number): Promise<void> {
    const updatedAt = this.now().toISOString();
    this.db
      .insert(checkpoints)
      .values({ job, lastId, updatedAt })
      .onConflictDoUpdate({ target: checkpoints.job, set: { lastId, updatedAt } })
      .run();
  }

  async clear(job: JobName): Promise<void> {
    this.db.delete(checkpoints).where(eq(checkpoints.job, job)).run();
  }
}
