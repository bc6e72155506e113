/**
 * Incremental transform layer.
 *
 * stg_games is the denormalized projection of the star schema and is
 * refreshed incrementally from a watermark. The rollups read from it and are
 * cheap enough to rebuild on every run.
 */

import { eq, sql, type SQL } from "drizzle-orm";
import { factGames, stgGames, transformWatermarks } from "../../drizzle/schema";
import type { DbExecutor } from "../db";
import { TransformInconsistencyError } from "../_core/errors";
import { verifyDimensionIntegrity } from "./dimensions";

export const PROJECTION_MODEL = "stg_games";

export type RefreshMode = "incremental" | "full";

export interface RefreshResult {
  model: string;
  mode: RefreshMode;
  rowsWritten: number;
}

export interface ProjectionState {
  watermark: { highWatermark: number; refreshedAt: Date } | null;
  projectedRows: number;
  projectedMaxId: number;
  factMaxId: number;
}

const PROJECTION_COLUMNS = [
  "platform", "source_game_id", "white_player", "black_player", "iso_date", "year", "month", "day",
  "event_name", "event_site", "event_round", "result", "winner", "eco", "opening_name",
  "opening_variation", "time_control", "url", "moves", "move_count", "projected_at",
];

function projectionInsert(filter: SQL): SQL {
  return sql`
    INSERT INTO stg_games (game_id, ${sql.raw(PROJECTION_COLUMNS.join(", "))})
    SELECT
      g.id,
      s.platform,
      g.source_game_id,
      pw.username,
      pb.username,
      d.iso_date,
      d.year,
      d.month,
      d.day,
      NULLIF(e.name, ''),
      NULLIF(e.site, ''),
      NULLIF(e.round, ''),
      r.code,
      CASE r.code WHEN '1-0' THEN pw.username WHEN '0-1' THEN pb.username ELSE 'Draw' END,
      g.eco,
      o.name,
      o.variation,
      g.time_control,
      g.url,
      g.moves,
      CASE WHEN btrim(g.moves) = '' THEN 0
           ELSE array_length(regexp_split_to_array(btrim(g.moves), '[[:space:]]+'), 1) END,
      now()
    FROM fact_games g
    JOIN dim_source s ON s.id = g.source_id
    JOIN dim_player pw ON pw.id = g.white_id
    JOIN dim_player pb ON pb.id = g.black_id
    JOIN dim_result r ON r.id = g.result_id
    JOIN dim_event e ON e.id = g.event_id
    LEFT JOIN dim_date d ON d.id = g.date_id
    LEFT JOIN dim_opening o ON o.id = g.opening_id
    ${filter}
    ON CONFLICT (game_id) DO UPDATE SET
      ${sql.raw(PROJECTION_COLUMNS.map((column) => `${column} = excluded.${column}`).join(",\n      "))}
  `;
}

async function readProjectionState(db: DbExecutor): Promise<ProjectionState> {
  const [watermark] = await db
    .select({ highWatermark: transformWatermarks.highWatermark, refreshedAt: transformWatermarks.refreshedAt })
    .from(transformWatermarks)
    .where(eq(transformWatermarks.model, PROJECTION_MODEL));

  const [projected] = await db
    .select({
      rows: sql<number>`count(*)::int`,
      maxId: sql<number>`COALESCE(max(${stgGames.gameId}), 0)`,
    })
    .from(stgGames);

  const [facts] = await db
    .select({ maxId: sql<number>`COALESCE(max(${factGames.id}), 0)` })
    .from(factGames);

  return {
    watermark: watermark ?? null,
    projectedRows: Number(projected?.rows ?? 0),
    projectedMaxId: Number(projected?.maxId ?? 0),
    factMaxId: Number(facts?.maxId ?? 0),
  };
}

/**
 * Why the stored watermark cannot be trusted, or null when it can.
 */
export function watermarkInconsistency(state: ProjectionState): string | null {
  const { watermark, projectedRows, projectedMaxId, factMaxId } = state;

  if (!watermark) {
    return projectedRows > 0 ? "watermark row is missing for a non-empty projection" : null;
  }
  if (!Number.isInteger(watermark.highWatermark) || watermark.highWatermark < 0) {
    return `watermark ${watermark.highWatermark} is not a valid game id`;
  }
  if (watermark.highWatermark !== projectedMaxId) {
    return `watermark ${watermark.highWatermark} does not match projected max id ${projectedMaxId}`;
  }
  if (watermark.highWatermark > factMaxId) {
    return `watermark ${watermark.highWatermark} is ahead of fact max id ${factMaxId}`;
  }
  return null;
}

/**
 * Refresh stg_games.
 *
 * Incremental: facts with an id above the watermark are appended, and facts
 * updated since the previous refresh are re-projected in place. A missing or
 * inconsistent watermark falls back to a full rebuild instead of silently
 * skipping rows.
 */
export async function refreshGamesProjection(db: DbExecutor): Promise<RefreshResult> {
  return db.transaction(async (tx) => {
    const state = await readProjectionState(tx);
    const inconsistency = watermarkInconsistency(state);

    let mode: RefreshMode = state.watermark ? "incremental" : "full";
    if (inconsistency) {
      const error = new TransformInconsistencyError(PROJECTION_MODEL, inconsistency);
      console.warn(`[transforms] ${error.message}. Rebuilding ${PROJECTION_MODEL} from scratch.`);
      mode = "full";
    }

    let filter: SQL;
    if (mode === "full") {
      await tx.execute(sql`DELETE FROM stg_games`);
      filter = sql`WHERE true`;
    } else {
      filter = sql`
        WHERE g.id > (SELECT high_watermark FROM transform_watermarks WHERE model = ${PROJECTION_MODEL})
           OR g.updated_at >= (SELECT refreshed_at FROM transform_watermarks WHERE model = ${PROJECTION_MODEL})
      `;
    }

    const written = await tx.execute(projectionInsert(filter));

    const [after] = await tx
      .select({ maxId: sql<number>`COALESCE(max(${stgGames.gameId}), 0)` })
      .from(stgGames);

    await tx
      .insert(transformWatermarks)
      .values({ model: PROJECTION_MODEL, highWatermark: Number(after?.maxId ?? 0), refreshedAt: sql`now()` })
      .onConflictDoUpdate({
        target: transformWatermarks.model,
        set: { highWatermark: sql`excluded.high_watermark`, refreshedAt: sql`excluded.refreshed_at` },
      });

    return { model: PROJECTION_MODEL, mode, rowsWritten: written.affectedRows ?? 0 };
  });
}

async function rebuild(db: DbExecutor, model: string, insert: SQL): Promise<RefreshResult> {
  return db.transaction(async (tx) => {
    await tx.execute(sql.raw(`DELETE FROM ${model}`));
    const written = await tx.execute(insert);
    return { model, mode: "full" as const, rowsWritten: written.affectedRows ?? 0 };
  });
}

/**
 * Games and wins per player, platform and month. Each side a player took
 * counts once; games with an unresolved date are left out.
 */
export function refreshMonthlyWinRate(db: DbExecutor): Promise<RefreshResult> {
  return rebuild(db, "monthly_win_rate", sql`
    INSERT INTO monthly_win_rate (player, platform, year, month, period, games, wins, win_rate)
    SELECT
      player,
      platform,
      year,
      month,
      year::text || '-' || lpad(month::text, 2, '0'),
      sum(games),
      sum(wins),
      round(sum(wins)::numeric / nullif(sum(games), 0) * 100, 1)::float8
    FROM (
      SELECT white_player AS player, platform, year, month,
             count(*) AS games,
             count(*) FILTER (WHERE result = '1-0') AS wins
      FROM stg_games
      WHERE year IS NOT NULL AND month IS NOT NULL
      GROUP BY white_player, platform, year, month
      UNION ALL
      SELECT black_player AS player, platform, year, month,
             count(*) AS games,
             count(*) FILTER (WHERE result = '0-1') AS wins
      FROM stg_games
      WHERE year IS NOT NULL AND month IS NOT NULL
      GROUP BY black_player, platform, year, month
    ) combined
    GROUP BY player, platform, year, month
  `);
}

export function refreshTimeControlBreakdown(db: DbExecutor): Promise<RefreshResult> {
  return rebuild(db, "time_control_breakdown", sql`
    INSERT INTO time_control_breakdown (player, platform, time_control, games)
    SELECT player, platform, time_control, sum(games)
    FROM (
      SELECT white_player AS player, platform, time_control, count(*) AS games
      FROM stg_games
      WHERE time_control IS NOT NULL
      GROUP BY white_player, platform, time_control
      UNION ALL
      SELECT black_player AS player, platform, time_control, count(*) AS games
      FROM stg_games
      WHERE time_control IS NOT NULL
      GROUP BY black_player, platform, time_control
    ) combined
    GROUP BY player, platform, time_control
  `);
}

/**
 * Results per player and ECO code from the player's point of view.
 * Games without an ECO code have no row here.
 */
export function refreshOpeningPerformance(db: DbExecutor): Promise<RefreshResult> {
  return rebuild(db, "opening_performance", sql`
    INSERT INTO opening_performance (player, platform, eco, opening_name, games, wins, draws, losses)
    SELECT player, platform, eco, max(opening_name), sum(games), sum(wins), sum(draws), sum(losses)
    FROM (
      SELECT white_player AS player, platform, eco, opening_name,
             count(*) AS games,
             count(*) FILTER (WHERE result = '1-0') AS wins,
             count(*) FILTER (WHERE result = '1/2-1/2') AS draws,
             count(*) FILTER (WHERE result = '0-1') AS losses
      FROM stg_games
      WHERE eco IS NOT NULL
      GROUP BY white_player, platform, eco, opening_name
      UNION ALL
      SELECT black_player AS player, platform, eco, opening_name,
             count(*) AS games,
             count(*) FILTER (WHERE result = '0-1') AS wins,
             count(*) FILTER (WHERE result = '1/2-1/2') AS draws,
             count(*) FILTER (WHERE result = '1-0') AS losses
      FROM stg_games
      WHERE eco IS NOT NULL
      GROUP BY black_player, platform, eco, opening_name
    ) combined
    GROUP BY player, platform, eco
  `);
}

export function refreshPlayerStats(db: DbExecutor): Promise<RefreshResult> {
  return rebuild(db, "player_stats", sql`
    INSERT INTO player_stats (player, platform, games, wins, draws, losses)
    SELECT player, platform, sum(games), sum(wins), sum(draws), sum(losses)
    FROM (
      SELECT white_player AS player, platform,
             count(*) AS games,
             count(*) FILTER (WHERE result = '1-0') AS wins,
             count(*) FILTER (WHERE result = '1/2-1/2') AS draws,
             count(*) FILTER (WHERE result = '0-1') AS losses
      FROM stg_games
      GROUP BY white_player, platform
      UNION ALL
      SELECT black_player AS player, platform,
             count(*) AS games,
             count(*) FILTER (WHERE result = '0-1') AS wins,
             count(*) FILTER (WHERE result = '1/2-1/2') AS draws,
             count(*) FILTER (WHERE result = '1-0') AS losses
      FROM stg_games
      GROUP BY black_player, platform
    ) combined
    GROUP BY player, platform
  `);
}

/**
 * Results per ECO code and platform over every stored game, with white's
 * win percentage.
 */
export function refreshOpeningStats(db: DbExecutor): Promise<RefreshResult> {
  return rebuild(db, "opening_stats", sql`
    INSERT INTO opening_stats (platform, eco, opening_name, total_games, white_wins, black_wins, draws, white_win_pct)
    SELECT
      platform,
      eco,
      max(opening_name),
      count(*),
      count(*) FILTER (WHERE result = '1-0'),
      count(*) FILTER (WHERE result = '0-1'),
      count(*) FILTER (WHERE result = '1/2-1/2'),
      round((count(*) FILTER (WHERE result = '1-0'))::numeric / count(*) * 100, 1)::float8
    FROM stg_games
    WHERE eco IS NOT NULL
    GROUP BY platform, eco
  `);
}

/**
 * Post-ingestion batch: integrity check, projection, then the rollups that
 * read from it.
 * @throws DimensionConflictError when a natural key has duplicate rows
 */
export async function refreshAllModels(db: DbExecutor): Promise<RefreshResult[]> {
  await verifyDimensionIntegrity(db);

  const results: RefreshResult[] = [];
  results.push(await refreshGamesProjection(db));
  results.push(await refreshMonthlyWinRate(db));
  results.push(await refreshTimeControlBreakdown(db));
  results.push(await refreshOpeningPerformance(db));
  results.push(await refreshPlayerStats(db));
  results.push(await refreshOpeningStats(db));
  return results;
}
