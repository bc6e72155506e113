import { and, asc, desc, eq, gte, sql, type SQL } from "drizzle-orm";
import { alias, type PgColumn } from "drizzle-orm/pg-core";
import {
  dimDate,
  dimOpening,
  dimPlayer,
  dimResult,
  dimSource,
  factGames,
  monthlyWinRate,
  openingPerformance,
  openingStats,
  playerStats,
  timeControlBreakdown,
  type Platform,
} from "../../drizzle/schema";
import type { DbExecutor } from "../db";

export interface GameListRow {
  gameId: number;
  platform: Platform;
  sourceGameId: string;
  white: string;
  black: string;
  isoDate: string | null;
  result: string;
  eco: string | null;
  openingName: string | null;
  timeControl: string | null;
  moves: string;
  url: string | null;
}

export interface GameListFilter {
  platform?: Platform;
  newestFirst?: boolean;
  limit?: number;
}

export interface RollupFilter {
  player?: string;
  platform?: Platform;
}

/**
 * Games straight off the star schema, oldest first unless `newestFirst`.
 * Works before any transform has run.
 */
export async function listGames(db: DbExecutor, filter: GameListFilter = {}): Promise<GameListRow[]> {
  const whitePlayer = alias(dimPlayer, "white_player");
  const blackPlayer = alias(dimPlayer, "black_player");

  const query = db
    .select({
      gameId: factGames.id,
      platform: dimSource.platform,
      sourceGameId: factGames.sourceGameId,
      white: whitePlayer.username,
      black: blackPlayer.username,
      isoDate: dimDate.isoDate,
      result: dimResult.code,
      eco: factGames.eco,
      openingName: dimOpening.name,
      timeControl: factGames.timeControl,
      moves: factGames.moves,
      url: factGames.url,
    })
    .from(factGames)
    .innerJoin(dimSource, eq(factGames.sourceId, dimSource.id))
    .innerJoin(whitePlayer, eq(factGames.whiteId, whitePlayer.id))
    .innerJoin(blackPlayer, eq(factGames.blackId, blackPlayer.id))
    .innerJoin(dimResult, eq(factGames.resultId, dimResult.id))
    .leftJoin(dimDate, eq(factGames.dateId, dimDate.id))
    .leftJoin(dimOpening, eq(factGames.openingId, dimOpening.id))
    .where(filter.platform ? eq(dimSource.platform, filter.platform) : undefined)
    .orderBy(filter.newestFirst ? desc(factGames.id) : asc(factGames.id))
    .$dynamic();

  return filter.limit === undefined ? query : query.limit(filter.limit);
}

function rollupWhere(player: PgColumn, platform: PgColumn, filter: RollupFilter): SQL | undefined {
  return and(
    filter.player ? eq(player, filter.player) : undefined,
    filter.platform ? eq(platform, filter.platform) : undefined
  );
}

export async function getMonthlyWinRate(db: DbExecutor, filter: RollupFilter = {}) {
  return db
    .select()
    .from(monthlyWinRate)
    .where(rollupWhere(monthlyWinRate.player, monthlyWinRate.platform, filter))
    .orderBy(asc(monthlyWinRate.player), asc(monthlyWinRate.platform), asc(monthlyWinRate.year), asc(monthlyWinRate.month));
}

/** Most played time controls first. */
export async function getTimeControlBreakdown(db: DbExecutor, filter: RollupFilter = {}) {
  return db
    .select()
    .from(timeControlBreakdown)
    .where(rollupWhere(timeControlBreakdown.player, timeControlBreakdown.platform, filter))
    .orderBy(asc(timeControlBreakdown.player), asc(timeControlBreakdown.platform), desc(timeControlBreakdown.games), asc(timeControlBreakdown.timeControl));
}

export async function getOpeningPerformance(db: DbExecutor, filter: RollupFilter = {}) {
  return db
    .select()
    .from(openingPerformance)
    .where(rollupWhere(openingPerformance.player, openingPerformance.platform, filter))
    .orderBy(asc(openingPerformance.player), desc(openingPerformance.games), asc(openingPerformance.eco));
}

export async function getPlayerStats(db: DbExecutor, filter: RollupFilter = {}) {
  return db
    .select()
    .from(playerStats)
    .where(rollupWhere(playerStats.player, playerStats.platform, filter))
    .orderBy(asc(playerStats.player), asc(playerStats.platform));
}

/** Most played openings first; `minGames` drops rarely seen codes. */
export async function getOpeningStats(db: DbExecutor, filter: { platform?: Platform; minGames?: number } = {}) {
  return db
    .select()
    .from(openingStats)
    .where(and(
      filter.platform ? eq(openingStats.platform, filter.platform) : undefined,
      filter.minGames !== undefined ? gte(openingStats.totalGames, filter.minGames) : undefined
    ))
    .orderBy(desc(openingStats.totalGames), asc(openingStats.eco), asc(openingStats.platform));
}

export const WAREHOUSE_TABLES = [
  "dim_player", "dim_date", "dim_event", "dim_result", "dim_source", "dim_opening",
  "fact_games", "stg_games", "monthly_win_rate", "time_control_breakdown", "opening_performance",
  "player_stats", "opening_stats", "ingestion_runs",
] as const;

export type WarehouseTable = (typeof WAREHOUSE_TABLES)[number];

export async function getWarehouseSummary(db: DbExecutor): Promise<{ table: WarehouseTable; rows: number }[]> {
  const summary: { table: WarehouseTable; rows: number }[] = [];
  for (const table of WAREHOUSE_TABLES) {
    const result = await db.execute<{ count: number }>(sql.raw(`SELECT count(*)::int AS count FROM ${table}`));
    summary.push({ table, rows: Number(result.rows[0]?.count ?? 0) });
  }
  return summary;
}
