/**
 * Run bookkeeping for sync workers.
 *
 * A worker opens a context, bumps its counters while it runs and closes it
 * with endSync(), which logs the summary and returns it for persistence.
 */

import type { Platform } from "../../../drizzle/schema";
import type { DbExecutor } from "../../db";
import { ingestionRuns } from "../../../drizzle/schema";

export type SyncStatus = "success" | "failure" | "partial";

export interface SyncContext {
  worker: string;
  platform: Platform | null;
  username: string | null;
  startedAt: Date;
  recordsProcessed: number;
  recordsInserted: number;
  recordsUpdated: number;
  recordsSkipped: number;
  recordsRejected: number;
  errors: string[];
  aborted: boolean;
  fatal: boolean;
}

export interface SyncLog extends Omit<SyncContext, "aborted" | "fatal"> {
  status: SyncStatus;
  completedAt: Date;
  durationMs: number;
}

class SyncLogger {
  startSync(worker: string, scope: { platform?: Platform; username?: string } = {}): SyncContext {
    return {
      worker,
      platform: scope.platform ?? null,
      username: scope.username ?? null,
      startedAt: new Date(),
      recordsProcessed: 0,
      recordsInserted: 0,
      recordsUpdated: 0,
      recordsSkipped: 0,
      recordsRejected: 0,
      errors: [],
      aborted: false,
      fatal: false,
    };
  }

  endSync(context: SyncContext): SyncLog {
    const completedAt = new Date();
    const { aborted, fatal, ...counters } = context;

    let status: SyncStatus = "success";
    if (fatal) status = "failure";
    else if (aborted || context.recordsRejected > 0) status = "partial";

    const log: SyncLog = {
      ...counters,
      errors: [...context.errors],
      status,
      completedAt,
      durationMs: completedAt.getTime() - context.startedAt.getTime(),
    };

    const summary = {
      status,
      processed: log.recordsProcessed,
      inserted: log.recordsInserted,
      updated: log.recordsUpdated,
      skipped: log.recordsSkipped,
      rejected: log.recordsRejected,
      durationMs: log.durationMs,
    };
    if (status === "failure") {
      console.error(`[${context.worker}] Run failed:`, summary, log.errors);
    } else {
      console.log(`[${context.worker}] Run finished:`, summary);
    }

    return log;
  }

  /** Store the run summary in ingestion_runs. */
  async persist(db: DbExecutor, log: SyncLog): Promise<void> {
    await db.insert(ingestionRuns).values({
      worker: log.worker,
      platform: log.platform,
      username: log.username,
      status: log.status,
      recordsProcessed: log.recordsProcessed,
      recordsInserted: log.recordsInserted,
      recordsUpdated: log.recordsUpdated,
      recordsSkipped: log.recordsSkipped,
      recordsRejected: log.recordsRejected,
      errorMessage: log.errors.length > 0 ? log.errors.join("\n") : null,
      startedAt: log.startedAt,
      completedAt: log.completedAt,
    });
  }
}

export const syncLogger = new SyncLogger();
