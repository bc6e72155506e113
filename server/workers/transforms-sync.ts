/**
 * Transforms Worker
 *
 * Runs the post-ingestion batch: dimension integrity check, the stg_games
 * projection and the analytical rollups.
 */

import type { WarehouseStore } from "../db";
import { errorMessage } from "../_core/errors";
import { syncLogger, type SyncLog } from "../ingestion/utils/sync-logger";
import { refreshAllModels, type RefreshResult } from "../warehouse/transforms";

export interface SyncTransformsResult {
  success: boolean;
  models: RefreshResult[];
  log: SyncLog;
}

/**
 * @throws DimensionConflictError when the integrity check fails; nothing is refreshed then
 */
export async function syncTransforms(store: WarehouseStore): Promise<SyncTransformsResult> {
  const context = syncLogger.startSync("transforms");
  console.log("[transforms] Refreshing models...");

  let models: RefreshResult[];
  try {
    models = await refreshAllModels(store.db);
  } catch (error) {
    context.fatal = true;
    context.errors.push(`Fatal error: ${errorMessage(error)}`);
    const log = syncLogger.endSync(context);
    await syncLogger.persist(store.db, log).catch((persistError: unknown) => {
      console.error("[transforms] Could not record the run:", errorMessage(persistError));
    });
    throw error;
  }

  for (const model of models) {
    context.recordsProcessed += model.rowsWritten;
    console.log(`[transforms] ${model.model} (${model.mode}): ${model.rowsWritten} rows written`);
  }

  const log = syncLogger.endSync(context);
  await syncLogger.persist(store.db, log);
  return { success: true, models, log };
}
