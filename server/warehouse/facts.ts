import { sql } from "drizzle-orm";
import { factGames } from "../../drizzle/schema";
import type { DbExecutor } from "../db";
import type { LoadOutcome } from "../ingestion/types";

/**
 * A game whose dimensions have already been resolved to surrogate ids.
 */
export interface ResolvedGame {
  sourceId: number;
  sourceGameId: string;
  whiteId: number;
  blackId: number;
  dateId: number | null;
  eventId: number;
  resultId: number;
  openingId: number | null;
  eco: string | null;
  moves: string;
  timeControl: string | null;
  url: string | null;
}

export interface LoadResult {
  outcome: LoadOutcome;
  /** null when skipped: nothing was written */
  gameId: number | null;
}

/**
 * Space-delimited token count of a move text. Never stored: computed at read
 * time so it cannot drift from the moves themselves.
 */
export function countMoves(moves: string | null | undefined): number {
  const trimmed = moves?.trim() ?? "";
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Writes facts keyed on (source, source-native id).
 * Reads dimension ids only; never writes dimension tables.
 */
export class FactLoader {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Insert a new fact, update a changed one in place, or leave an identical
   * one alone. One statement: the update branch only fires when a mutable
   * field differs, and `xmax = 0` tells a fresh insert from an update.
   */
  async load(game: ResolvedGame): Promise<LoadResult> {
    const rows = await this.db
      .insert(factGames)
      .values({
        sourceId: game.sourceId,
        sourceGameId: game.sourceGameId,
        whiteId: game.whiteId,
        blackId: game.blackId,
        dateId: game.dateId,
        eventId: game.eventId,
        resultId: game.resultId,
        openingId: game.openingId,
        eco: game.eco,
        moves: game.moves,
        timeControl: game.timeControl,
        url: game.url,
      })
      .onConflictDoUpdate({
        target: [factGames.sourceId, factGames.sourceGameId],
        set: {
          whiteId: sql`excluded.white_id`,
          blackId: sql`excluded.black_id`,
          dateId: sql`excluded.date_id`,
          eventId: sql`excluded.event_id`,
          resultId: sql`excluded.result_id`,
          openingId: sql`excluded.opening_id`,
          eco: sql`excluded.eco`,
          moves: sql`excluded.moves`,
          timeControl: sql`excluded.time_control`,
          url: sql`excluded.url`,
          updatedAt: sql`now()`,
        },
        setWhere: sql`(
          ${factGames.whiteId}, ${factGames.blackId}, ${factGames.dateId}, ${factGames.eventId},
          ${factGames.resultId}, ${factGames.openingId}, ${factGames.eco}, ${factGames.moves},
          ${factGames.timeControl}, ${factGames.url}
        ) IS DISTINCT FROM (
          excluded.white_id, excluded.black_id, excluded.date_id, excluded.event_id,
          excluded.result_id, excluded.opening_id, excluded.eco, excluded.moves,
          excluded.time_control, excluded.url
        )`,
      })
      .returning({ id: factGames.id, inserted: sql<boolean>`(xmax = 0)` });

    if (rows.length === 0) {
      return { outcome: "skipped", gameId: null };
    }
    const [row] = rows;
    return { outcome: row.inserted ? "inserted" : "updated", gameId: row.id };
  }
}
