import BetterSqlite3 from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { loadConfig } from "@/lib/config";
import { log, errorMessage } from "@/lib/logger";
import * as schema from "./schema";

export type DbClient = BetterSQLite3Database<typeof schema>;

export type OpenDb = {
  db: DbClient;
  close(): void;
};

/** Open (or create) a database file and make sure the schema exists. */
export function openDb(path: string): OpenDb {
  const sqlite = new BetterSqlite3(path);
  applySchemaOrClose(sqlite);
  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

function applySchemaOrClose(sqlite: BetterSqlite3.Database): void {
  try {
    schema.applySchema(sqlite);
  } catch (err) {
    sqlite.close();
    throw err;
  }
}

// undefined = not initialized, OpenDb = active
let dbClient: OpenDb | undefined;

/** Process-wide connection to the configured database file. */
export function getDb(path: string = loadConfig(process.env).databasePath): DbClient {
  if (dbClient !== undefined) return dbClient.db;

  try {
    dbClient = openDb(path);
    log.info("db_enabled", { path });
    return dbClient.db;
  } catch (err) {
    log.error("db_init_failed", { path, error: errorMessage(err) });
    throw err;
  }
}

/** Close and forget the shared client; the next getDb() reopens. */
export function _resetDbClient(): void {
  dbClient?.close();
  dbClient = undefined;
}
