import { pgTable, pgEnum, serial, text, timestamp, varchar, integer, date, doublePrecision, index, unique, primaryKey } from "drizzle-orm/pg-core";

/**
 * Chess Games Warehouse - Star Schema
 *
 * Dimensions (append-only, surrogate keyed):
 * - Player, Date, Event, Result, Source, Opening
 *
 * Fact:
 * - Games, deduplicated on (source, source-native game id)
 *
 * Derived (rebuilt by the transform layer):
 * - stg_games projection, monthly win rate, time control and opening rollups,
 *   player and opening stats
 */

// ============================================================================
// ENUMS (must be defined before tables in PostgreSQL)
// ============================================================================

export const PLATFORMS = ["lichess", "chesscom"] as const;
export const RESULT_CODES = ["1-0", "0-1", "1/2-1/2", "*"] as const;

export const platformEnum = pgEnum("platform", PLATFORMS);
export const ingestionStatusEnum = pgEnum("ingestion_status", ["success", "failure", "partial"]);

// ============================================================================
// DIMENSIONS
// ============================================================================

export const dimPlayer = pgTable("dim_player", {
  id: serial("id").primaryKey(),
  username: varchar("username", { length: 255 }).notNull(),
  displayName: text("display_name"),
}, (table) => ({
  usernameUnique: unique("dim_player_username_unique").on(table.username),
}));

export const dimDate = pgTable("dim_date", {
  id: serial("id").primaryKey(),
  isoDate: date("iso_date", { mode: "string" }).notNull(),
  year: integer("year").notNull(),
  month: integer("month").notNull(),
  day: integer("day").notNull(),
}, (table) => ({
  isoDateUnique: unique("dim_date_iso_date_unique").on(table.isoDate),
  yearMonthIdx: index("dim_date_year_month_idx").on(table.year, table.month),
}));

// Absent parts are stored as '' so the natural key stays comparable.
// ('', '', '') is the "unknown event" sentinel.
export const dimEvent = pgTable("dim_event", {
  id: serial("id").primaryKey(),
  name: text("name").default("").notNull(),
  site: text("site").default("").notNull(),
  round: text("round").default("").notNull(),
}, (table) => ({
  naturalKeyUnique: unique("dim_event_natural_key_unique").on(table.name, table.site, table.round),
}));

export const dimResult = pgTable("dim_result", {
  id: serial("id").primaryKey(),
  code: varchar("code", { length: 16 }).notNull(),
}, (table) => ({
  codeUnique: unique("dim_result_code_unique").on(table.code),
}));

export const dimSource = pgTable("dim_source", {
  id: serial("id").primaryKey(),
  platform: platformEnum("platform").notNull(),
}, (table) => ({
  platformUnique: unique("dim_source_platform_unique").on(table.platform),
}));

export const dimOpening = pgTable("dim_opening", {
  id: serial("id").primaryKey(),
  eco: varchar("eco", { length: 8 }).notNull(),
  name: text("name"),
  variation: text("variation"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  ecoUnique: unique("dim_opening_eco_unique").on(table.eco),
}));

// ============================================================================
// FACT
// ============================================================================

export const factGames = pgTable("fact_games", {
  id: serial("id").primaryKey(),
  sourceId: integer("source_id").notNull().references(() => dimSource.id),
  sourceGameId: varchar("source_game_id", { length: 128 }).notNull(),
  whiteId: integer("white_id").notNull().references(() => dimPlayer.id),
  blackId: integer("black_id").notNull().references(() => dimPlayer.id),
  dateId: integer("date_id").references(() => dimDate.id), // null = unresolved date
  eventId: integer("event_id").notNull().references(() => dimEvent.id),
  resultId: integer("result_id").notNull().references(() => dimResult.id),
  openingId: integer("opening_id").references(() => dimOpening.id), // null = no ECO
  eco: varchar("eco", { length: 8 }),
  moves: text("moves").default("").notNull(),
  timeControl: varchar("time_control", { length: 32 }),
  url: text("url"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  naturalKeyUnique: unique("fact_games_natural_key_unique").on(table.sourceId, table.sourceGameId),
  updatedAtIdx: index("fact_games_updated_at_idx").on(table.updatedAt),
}));

// ============================================================================
// DERIVED TABLES
// ============================================================================

export const stgGames = pgTable("stg_games", {
  gameId: integer("game_id").primaryKey(),
  platform: platformEnum("platform").notNull(),
  sourceGameId: varchar("source_game_id", { length: 128 }).notNull(),
  whitePlayer: varchar("white_player", { length: 255 }).notNull(),
  blackPlayer: varchar("black_player", { length: 255 }).notNull(),
  isoDate: date("iso_date", { mode: "string" }),
  year: integer("year"),
  month: integer("month"),
  day: integer("day"),
  eventName: text("event_name"),
  eventSite: text("event_site"),
  eventRound: text("event_round"),
  result: varchar("result", { length: 16 }).notNull(),
  winner: varchar("winner", { length: 255 }).notNull(),
  eco: varchar("eco", { length: 8 }),
  openingName: text("opening_name"),
  openingVariation: text("opening_variation"),
  timeControl: varchar("time_control", { length: 32 }),
  url: text("url"),
  moves: text("moves").notNull(),
  moveCount: integer("move_count").notNull(),
  projectedAt: timestamp("projected_at").defaultNow().notNull(),
});

export const monthlyWinRate = pgTable("monthly_win_rate", {
  player: varchar("player", { length: 255 }).notNull(),
  platform: platformEnum("platform").notNull(),
  year: integer("year").notNull(),
  month: integer("month").notNull(),
  period: varchar("period", { length: 7 }).notNull(), // YYYY-MM
  games: integer("games").notNull(),
  wins: integer("wins").notNull(),
  winRate: doublePrecision("win_rate").notNull(),
}, (table) => ({
  pk: primaryKey({ name: "monthly_win_rate_pk", columns: [table.player, table.platform, table.year, table.month] }),
}));

export const timeControlBreakdown = pgTable("time_control_breakdown", {
  player: varchar("player", { length: 255 }).notNull(),
  platform: platformEnum("platform").notNull(),
  timeControl: varchar("time_control", { length: 32 }).notNull(),
  games: integer("games").notNull(),
}, (table) => ({
  pk: primaryKey({ name: "time_control_breakdown_pk", columns: [table.player, table.platform, table.timeControl] }),
}));

export const openingPerformance = pgTable("opening_performance", {
  player: varchar("player", { length: 255 }).notNull(),
  platform: platformEnum("platform").notNull(),
  eco: varchar("eco", { length: 8 }).notNull(),
  openingName: text("opening_name"),
  games: integer("games").notNull(),
  wins: integer("wins").notNull(),
  draws: integer("draws").notNull(),
  losses: integer("losses").notNull(),
}, (table) => ({
  pk: primaryKey({ name: "opening_performance_pk", columns: [table.player, table.platform, table.eco] }),
}));

// Results per player and platform, all sides and months together.
export const playerStats = pgTable("player_stats", {
  player: varchar("player", { length: 255 }).notNull(),
  platform: platformEnum("platform").notNull(),
  games: integer("games").notNull(),
  wins: integer("wins").notNull(),
  draws: integer("draws").notNull(),
  losses: integer("losses").notNull(),
}, (table) => ({
  pk: primaryKey({ name: "player_stats_pk", columns: [table.player, table.platform] }),
}));

// Results per ECO code and platform across all players, from white's side.
export const openingStats = pgTable("opening_stats", {
  platform: platformEnum("platform").notNull(),
  eco: varchar("eco", { length: 8 }).notNull(),
  openingName: text("opening_name"),
  totalGames: integer("total_games").notNull(),
  whiteWins: integer("white_wins").notNull(),
  blackWins: integer("black_wins").notNull(),
  draws: integer("draws").notNull(),
  whiteWinPct: doublePrecision("white_win_pct").notNull(),
}, (table) => ({
  pk: primaryKey({ name: "opening_stats_pk", columns: [table.platform, table.eco] }),
}));

// ============================================================================
// METADATA
// ============================================================================

export const transformWatermarks = pgTable("transform_watermarks", {
  model: varchar("model", { length: 64 }).primaryKey(),
  highWatermark: integer("high_watermark").notNull(),
  refreshedAt: timestamp("refreshed_at").notNull(),
});

export const ingestionRuns = pgTable("ingestion_runs", {
  id: serial("id").primaryKey(),
  worker: varchar("worker", { length: 100 }).notNull(),
  platform: platformEnum("platform"),
  username: varchar("username", { length: 255 }),
  status: ingestionStatusEnum("status").notNull(),
  recordsProcessed: integer("records_processed").default(0).notNull(),
  recordsInserted: integer("records_inserted").default(0).notNull(),
  recordsUpdated: integer("records_updated").default(0).notNull(),
  recordsSkipped: integer("records_skipped").default(0).notNull(),
  recordsRejected: integer("records_rejected").default(0).notNull(),
  errorMessage: text("error_message"),
  startedAt: timestamp("started_at").notNull(),
  completedAt: timestamp("completed_at"),
}, (table) => ({
  workerIdx: index("ingestion_runs_worker_idx").on(table.worker),
  startedAtIdx: index("ingestion_runs_started_at_idx").on(table.startedAt),
}));

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type Platform = (typeof PLATFORMS)[number];
export type ResultCode = (typeof RESULT_CODES)[number];

export type DimPlayer = typeof dimPlayer.$inferSelect;
export type DimDate = typeof dimDate.$inferSelect;
export type DimEvent = typeof dimEvent.$inferSelect;
export type DimResult = typeof dimResult.$inferSelect;
export type DimSource = typeof dimSource.$inferSelect;
export type DimOpening = typeof dimOpening.$inferSelect;

export type FactGame = typeof factGames.$inferSelect;
export type InsertFactGame = typeof factGames.$inferInsert;

export type StgGame = typeof stgGames.$inferSelect;
export type MonthlyWinRate = typeof monthlyWinRate.$inferSelect;
export type TimeControlBreakdown = typeof timeControlBreakdown.$inferSelect;
export type OpeningPerformance = typeof openingPerformance.$inferSelect;
export type PlayerStats = typeof playerStats.$inferSelect;
export type OpeningStats = typeof openingStats.$inferSelect;

export type TransformWatermark = typeof transformWatermarks.$inferSelect;

export type IngestionRun = typeof ingestionRuns.$inferSelect;
export type InsertIngestionRun = typeof ingestionRuns.$inferInsert;
