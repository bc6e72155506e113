import { sql } from "drizzle-orm";
import { PLATFORMS, RESULT_CODES } from "../drizzle/schema";
import type { DbExecutor } from "./db";
import { DimensionResolver, UNKNOWN_EVENT } from "./warehouse/dimensions";

/**
 * Idempotent DDL for the star schema, the derived tables and run metadata.
 * Mirrors drizzle/schema.ts; constraint names are the ones the upserts target.
 */
const STATEMENTS = [
  `DO $$
  BEGIN
    IF NOT EXISTS (SELECT 1 FROM pg_type WHERE typname = 'platform') THEN
      CREATE TYPE platform AS ENUM (${PLATFORMS.map((p) => `'${p}'`).join(", ")});
    END IF;
    IF NOT EXISTS (SELECT 1 FROM pg_type WHERE typname = 'ingestion_status') THEN
      CREATE TYPE ingestion_status AS ENUM ('success', 'failure', 'partial');
    END IF;
  END $$;`,

  `CREATE TABLE IF NOT EXISTS dim_player (
    id SERIAL PRIMARY KEY,
    username VARCHAR(255) NOT NULL,
    display_name TEXT,
    CONSTRAINT dim_player_username_unique UNIQUE (username)
  )`,

  `CREATE TABLE IF NOT EXISTS dim_date (
    id SERIAL PRIMARY KEY,
    iso_date DATE NOT NULL,
    year INTEGER NOT NULL,
    month INTEGER NOT NULL,
    day INTEGER NOT NULL,
    CONSTRAINT dim_date_iso_date_unique UNIQUE (iso_date)
  )`,
  `CREATE INDEX IF NOT EXISTS dim_date_year_month_idx ON dim_date (year, month)`,

  `CREATE TABLE IF NOT EXISTS dim_event (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL DEFAULT '',
    site TEXT NOT NULL DEFAULT '',
    round TEXT NOT NULL DEFAULT '',
    CONSTRAINT dim_event_natural_key_unique UNIQUE (name, site, round)
  )`,

  `CREATE TABLE IF NOT EXISTS dim_result (
    id SERIAL PRIMARY KEY,
    code VARCHAR(16) NOT NULL,
    CONSTRAINT dim_result_code_unique UNIQUE (code)
  )`,

  `CREATE TABLE IF NOT EXISTS dim_source (
    id SERIAL PRIMARY KEY,
    platform platform NOT NULL,
    CONSTRAINT dim_source_platform_unique UNIQUE (platform)
  )`,

  `CREATE TABLE IF NOT EXISTS dim_opening (
    id SERIAL PRIMARY KEY,
    eco VARCHAR(8) NOT NULL,
    name TEXT,
    variation TEXT,
    created_at TIMESTAMP NOT NULL DEFAULT now(),
    updated_at TIMESTAMP NOT NULL DEFAULT now(),
    CONSTRAINT dim_opening_eco_unique UNIQUE (eco)
  )`,

  `CREATE TABLE IF NOT EXISTS fact_games (
    id SERIAL PRIMARY KEY,
    source_id INTEGER NOT NULL REFERENCES dim_source(id),
    source_game_id VARCHAR(128) NOT NULL,
    white_id INTEGER NOT NULL REFERENCES dim_player(id),
    black_id INTEGER NOT NULL REFERENCES dim_player(id),
    date_id INTEGER REFERENCES dim_date(id),
    event_id INTEGER NOT NULL REFERENCES dim_event(id),
    result_id INTEGER NOT NULL REFERENCES dim_result(id),
    opening_id INTEGER REFERENCES dim_opening(id),
    eco VARCHAR(8),
    moves TEXT NOT NULL DEFAULT '',
    time_control VARCHAR(32),
    url TEXT,
    created_at TIMESTAMP NOT NULL DEFAULT now(),
    updated_at TIMESTAMP NOT NULL DEFAULT now(),
    CONSTRAINT fact_games_natural_key_unique UNIQUE (source_id, source_game_id)
  )`,
  `CREATE INDEX IF NOT EXISTS fact_games_updated_at_idx ON fact_games (updated_at)`,

  `CREATE TABLE IF NOT EXISTS stg_games (
    game_id INTEGER PRIMARY KEY,
    platform platform NOT NULL,
    source_game_id VARCHAR(128) NOT NULL,
    white_player VARCHAR(255) NOT NULL,
    black_player VARCHAR(255) NOT NULL,
    iso_date DATE,
    year INTEGER,
    month INTEGER,
    day INTEGER,
    event_name TEXT,
    event_site TEXT,
    event_round TEXT,
    result VARCHAR(16) NOT NULL,
    winner VARCHAR(255) NOT NULL,
    eco VARCHAR(8),
    opening_name TEXT,
    opening_variation TEXT,
    time_control VARCHAR(32),
    url TEXT,
    moves TEXT NOT NULL,
    move_count INTEGER NOT NULL,
    projected_at TIMESTAMP NOT NULL DEFAULT now()
  )`,

  `CREATE TABLE IF NOT EXISTS monthly_win_rate (
    player VARCHAR(255) NOT NULL,
    platform platform NOT NULL,
    year INTEGER NOT NULL,
    month INTEGER NOT NULL,
    period VARCHAR(7) NOT NULL,
    games INTEGER NOT NULL,
    wins INTEGER NOT NULL,
    win_rate DOUBLE PRECISION NOT NULL,
    CONSTRAINT monthly_win_rate_pk PRIMARY KEY (player, platform, year, month)
  )`,

  `CREATE TABLE IF NOT EXISTS time_control_breakdown (
    player VARCHAR(255) NOT NULL,
    platform platform NOT NULL,
    time_control VARCHAR(32) NOT NULL,
    games INTEGER NOT NULL,
    CONSTRAINT time_control_breakdown_pk PRIMARY KEY (player, platform, time_control)
  )`,

  `CREATE TABLE IF NOT EXISTS opening_performance (
    player VARCHAR(255) NOT NULL,
    platform platform NOT NULL,
    eco VARCHAR(8) NOT NULL,
    opening_name TEXT,
    games INTEGER NOT NULL,
    wins INTEGER NOT NULL,
    draws INTEGER NOT NULL,
    losses INTEGER NOT NULL,
    CONSTRAINT opening_performance_pk PRIMARY KEY (player, platform, eco)
  )`,

  `CREATE TABLE IF NOT EXISTS player_stats (
    player VARCHAR(255) NOT NULL,
    platform platform NOT NULL,
    games INTEGER NOT NULL,
    wins INTEGER NOT NULL,
    draws INTEGER NOT NULL,
    losses INTEGER NOT NULL,
    CONSTRAINT player_stats_pk PRIMARY KEY (player, platform)
  )`,

  `CREATE TABLE IF NOT EXISTS opening_stats (
    platform platform NOT NULL,
    eco VARCHAR(8) NOT NULL,
    opening_name TEXT,
    total_games INTEGER NOT NULL,
    white_wins INTEGER NOT NULL,
    black_wins INTEGER NOT NULL,
    draws INTEGER NOT NULL,
    white_win_pct DOUBLE PRECISION NOT NULL,
    CONSTRAINT opening_stats_pk PRIMARY KEY (platform, eco)
  )`,

  `CREATE TABLE IF NOT EXISTS transform_watermarks (
    model VARCHAR(64) PRIMARY KEY,
    high_watermark INTEGER NOT NULL,
    refreshed_at TIMESTAMP NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS ingestion_runs (
    id SERIAL PRIMARY KEY,
    worker VARCHAR(100) NOT NULL,
    platform platform,
    username VARCHAR(255),
    status ingestion_status NOT NULL,
    records_processed INTEGER NOT NULL DEFAULT 0,
    records_inserted INTEGER NOT NULL DEFAULT 0,
    records_updated INTEGER NOT NULL DEFAULT 0,
    records_skipped INTEGER NOT NULL DEFAULT 0,
    records_rejected INTEGER NOT NULL DEFAULT 0,
    error_message TEXT,
    started_at TIMESTAMP NOT NULL,
    completed_at TIMESTAMP
  )`,
  `CREATE INDEX IF NOT EXISTS ingestion_runs_worker_idx ON ingestion_runs (worker)`,
  `CREATE INDEX IF NOT EXISTS ingestion_runs_started_at_idx ON ingestion_runs (started_at)`,
];

/**
 * Create the schema and seed the enumerable dimensions.
 * Safe to run on every open.
 */
export async function migrate(db: DbExecutor): Promise<void> {
  for (const statement of STATEMENTS) {
    await db.execute(sql.raw(statement));
  }

  const resolver = new DimensionResolver(db);
  for (const platform of PLATFORMS) {
    await resolver.resolve("source", { platform });
  }
  for (const code of RESULT_CODES) {
    await resolver.resolve("result", { code });
  }
  await resolver.resolve("event", UNKNOWN_EVENT);
}
