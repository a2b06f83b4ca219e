import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  primaryKey,
} from "drizzle-orm/sqlite-core";
import type Database from "better-sqlite3";
import type { RatingSource } from "@/lib/types";

// ─── Movies table ─────────────────────────────────────────────────────────────

export const movies = sqliteTable("movies", {
  id: integer("id").primaryKey(),
  title: text("title").notNull(),
  imdbId: text("imdb_id"),
  tmdbId: integer("tmdb_id"),
  plotDesc: text("plot_desc"),
  year: integer("year"),
  releaseWindow: text("release_window"),
  ratingCert: text("rating_cert"),
  durationSeconds: integer("duration_seconds"),
  youtubeLink: text("youtube_link"),
  boxOfficeExpected: real("box_office_expected"),
  boxOfficeActual: real("box_office_actual"),
  googleTrendScore: real("google_trend_score"),
  actorTrendScore: real("actor_trend_score"),
  combinedScore: real("combined_score"),
  franchise: text("franchise"),
  origin: text("origin"),
}, (table) => [
  index("idx_movies_title").on(table.title),
  index("idx_movies_imdb_id").on(table.imdbId),
]);

// ─── Ratings table ────────────────────────────────────────────────────────────

export const ratings = sqliteTable("ratings", {
  movieId: integer("movie_id").notNull().references(() => movies.id, { onDelete: "cascade" }),
  source: text("source").$type<RatingSource>().notNull(),
  score: real("score").notNull(),
  sampleCount: integer("sample_count"),
  histogram: text("histogram", { mode: "json" }).$type<number[]>(),
}, (table) => [
  primaryKey({ columns: [table.movieId, table.source] }),
]);

// ─── Genres and themes ────────────────────────────────────────────────────────

export const genres = sqliteTable("genres", {
  id: integer("id").primaryKey(),
  name: text("name").notNull().unique(),
});

export const movieGenres = sqliteTable("movie_genres", {
  movieId: integer("movie_id").notNull().references(() => movies.id, { onDelete: "cascade" }),
  genreId: integer("genre_id").notNull().references(() => genres.id),
}, (table) => [
  primaryKey({ columns: [table.movieId, table.genreId] }),
]);

export const themes = sqliteTable("themes", {
  id: integer("id").primaryKey(),
  name: text("name").notNull().unique(),
});

export const movieThemes = sqliteTable("movie_themes", {
  movieId: integer("movie_id").notNull().references(() => movies.id, { onDelete: "cascade" }),
  themeId: integer("theme_id").notNull().references(() => themes.id),
}, (table) => [
  primaryKey({ columns: [table.movieId, table.themeId] }),
]);

// ─── Lookup and bookkeeping tables ────────────────────────────────────────────

export const movieAliases = sqliteTable("movie_aliases", {
  altTitle: text("alt_title").primaryKey(),
  movieId: integer("movie_id").notNull().references(() => movies.id, { onDelete: "cascade" }),
});

export const trendCache = sqliteTable("trend_cache", {
  term: text("term").notNull(),
  day: text("day").notNull(), // YYYY-MM-DD (UTC)
  value: real("value").notNull(),
}, (table) => [
  primaryKey({ columns: [table.term, table.day] }),
]);

export const checkpoints = sqliteTable("checkpoints", {
  job: text("job").primaryKey(),
  lastId: integer("last_id").notNull(),
  updatedAt: text("updated_at").notNull(),
});

// ─── Inferred types ───────────────────────────────────────────────────────────

export type MovieRow = typeof movies.$inferSelect;
export type NewMovie = typeof movies.$inferInsert;
export type RatingRow = typeof ratings.$inferSelect;

// ─── DDL ──────────────────────────────────────────────────────────────────────

export const SCHEMA_VERSION = 1;

/** Create every table on a fresh file; a no-op on an existing one. */
export function applySchema(db: Database.Database): void {
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("synchronous = NORMAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS movies (
      id                  INTEGER PRIMARY KEY,
      title               TEXT NOT NULL,
      imdb_id             TEXT,
      tmdb_id             INTEGER,
      plot_desc           TEXT,
      year                INTEGER,
      release_window      TEXT,
      rating_cert         TEXT,
      duration_seconds    INTEGER,
      youtube_link        TEXT,
      box_office_expected REAL,
      box_office_actual   REAL,
      google_trend_score  REAL,   -- 0-100
      actor_trend_score   REAL,   -- 0-100
      combined_score      REAL,   -- 0-100
      franchise           TEXT,
      origin              TEXT    -- ISO 3166-1 alpha-2
    );
    CREATE INDEX IF NOT EXISTS idx_movies_title ON movies(title);
    CREATE INDEX IF NOT EXISTS idx_movies_imdb_id ON movies(imdb_id);

    CREATE TABLE IF NOT EXISTS ratings (
      movie_id     INTEGER NOT NULL REFERENCES movies(id) ON DELETE CASCADE,
      source       TEXT NOT NULL,
      score        REAL NOT NULL,  -- 0-100
      sample_count INTEGER,
      histogram    TEXT,           -- JSON array, vote counts for stars 1..10
      PRIMARY KEY (movie_id, source)
    );

    CREATE TABLE IF NOT EXISTS genres (
      id   INTEGER PRIMARY KEY,
      name TEXT UNIQUE NOT NULL
    );

    CREATE TABLE IF NOT EXISTS movie_genres (
      movie_id INTEGER NOT NULL REFERENCES movies(id) ON DELETE CASCADE,
      genre_id INTEGER NOT NULL REFERENCES genres(id),
      PRIMARY KEY (movie_id, genre_id)
    );

    CREATE TABLE IF NOT EXISTS themes (
      id   INTEGER PRIMARY KEY,
      name TEXT UNIQUE NOT NULL
    );

    CREATE TABLE IF NOT EXISTS movie_themes (
      movie_id INTEGER NOT NULL REFERENCES movies(id) ON DELETE CASCADE,
      theme_id INTEGER NOT NULL REFERENCES themes(id),
      PRIMARY KEY (movie_id, theme_id)
    );

    CREATE TABLE IF NOT EXISTS movie_aliases (
      alt_title TEXT PRIMARY KEY,
      movie_id  INTEGER NOT NULL REFERENCES movies(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS trend_cache (
      term  TEXT NOT NULL,
      day   TEXT NOT NULL,
      value REAL NOT NULL,
      PRIMARY KEY (term, day)
    );

    CREATE TABLE IF NOT EXISTS checkpoints (
      job        TEXT PRIMARY KEY,
      last_id    INTEGER NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);

  const current = db.prepare("SELECT version FROM schema_version LIMIT 1").get();
  if (current === undefined) {
    db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);
  }
}
