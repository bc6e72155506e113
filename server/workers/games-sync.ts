/**
 * Games Sync Worker
 *
 * Pulls a player's games from one platform and loads them into the
 * warehouse, one transaction per game. Malformed records are counted and
 * skipped; anything else ends the run.
 */

import type { Platform } from "../../drizzle/schema";
import type { WarehouseStore } from "../db";
import { errorMessage, isCancellation, isRecordLevelError } from "../_core/errors";
import { getSource } from "../ingestion/sources";
import type { GameSource } from "../ingestion/types";
import { syncLogger, type SyncLog } from "../ingestion/utils/sync-logger";
import { ingestGame } from "../warehouse/ingest";

export interface SyncGamesOptions {
  platform: Platform;
  username: string;
  maxGames?: number;
  signal?: AbortSignal;
  /** Defaults to the registered adapter of the platform. */
  source?: GameSource;
}

export interface SyncGamesResult {
  success: boolean;
  log: SyncLog;
}

/**
 * @throws the first non-record-level error, after the run has been logged
 */
export async function syncGames(store: WarehouseStore, options: SyncGamesOptions): Promise<SyncGamesResult> {
  const worker = `${options.platform}-sync`;
  const context = syncLogger.startSync(worker, { platform: options.platform, username: options.username });
  const source = options.source ?? getSource(options.platform);
  let fatal: unknown = null;

  console.log(`[${worker}] Fetching games of ${options.username}...`);

  try {
    const games = source.fetchGames(options.username, { maxGames: options.maxGames, signal: options.signal });

    for await (const candidate of games) {
      if (options.signal?.aborted) break;
      context.recordsProcessed++;

      try {
        const result = await ingestGame(store.db, candidate);
        if (result.outcome === "inserted") context.recordsInserted++;
        else if (result.outcome === "updated") context.recordsUpdated++;
        else context.recordsSkipped++;
      } catch (error) {
        if (!isRecordLevelError(error)) throw error;
        context.recordsRejected++;
        context.errors.push(error.message);
        console.warn(`[${worker}] Rejected record: ${error.message}`);
      }

      if (context.recordsProcessed % 100 === 0) {
        console.log(`[${worker}] ${context.recordsProcessed} games processed...`);
      }
    }
  } catch (error) {
    // A request cancelled by the abort signal ends the run like any other interruption
    if (!(options.signal?.aborted && isCancellation(error))) {
      fatal = error;
      context.fatal = true;
      context.errors.push(`Fatal error: ${errorMessage(error)}`);
    }
  }

  if (options.signal?.aborted && !context.fatal) {
    context.aborted = true;
    console.warn(`[${worker}] Interrupted after ${context.recordsProcessed} games; everything loaded so far is kept.`);
  }

  const log = syncLogger.endSync(context);
  try {
    await syncLogger.persist(store.db, log);
  } catch (error) {
    console.error(`[${worker}] Could not record the run:`, errorMessage(error));
  }

  if (context.fatal) throw fatal;
  return { success: log.status !== "failure", log };
}
