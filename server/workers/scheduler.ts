/**
 * Scheduler for the daily pipeline
 *
 * Lichess fetch, then Chess.com fetch, then the transforms. Each tick opens
 * the store, runs the pipeline and releases the store again, so the CLI can
 * use the warehouse between runs.
 */

import cron, { type ScheduledTask } from "node-cron";
import type { Platform } from "../../drizzle/schema";
import { withStore, type WarehouseStore } from "../db";
import { ENV } from "../_core/env";
import { errorMessage } from "../_core/errors";
import { syncGames, type SyncGamesResult } from "./games-sync";
import { syncTransforms, type SyncTransformsResult } from "./transforms-sync";

export interface PipelineConfig {
  lichessUsername?: string | null;
  chesscomUsername?: string | null;
  maxGames?: number;
  signal?: AbortSignal;
}

export interface PipelineResult {
  syncs: SyncGamesResult[];
  transforms: SyncTransformsResult | null;
}

export interface SchedulerConfig extends PipelineConfig {
  /** cron expression, default PIPELINE_CRON or daily at 06:00 */
  schedule?: string;
  dataDir?: string;
}

export interface ScheduledRunResult {
  success: boolean;
  duration: number;
  result?: PipelineResult;
  error?: string;
}

/**
 * One pipeline pass. A platform without a configured username is skipped;
 * a fatal error in a fetch stops the pipeline before the transforms.
 */
export async function runPipeline(store: WarehouseStore, config: PipelineConfig): Promise<PipelineResult> {
  const steps: { platform: Platform; username: string | null | undefined }[] = [
    { platform: "lichess", username: config.lichessUsername },
    { platform: "chesscom", username: config.chesscomUsername },
  ];

  const syncs: SyncGamesResult[] = [];
  for (const step of steps) {
    if (config.signal?.aborted) break;
    if (!step.username) {
      console.warn(`[pipeline] No ${step.platform} username configured, skipping ${step.platform} fetch.`);
      continue;
    }
    syncs.push(await syncGames(store, {
      platform: step.platform,
      username: step.username,
      maxGames: config.maxGames,
      signal: config.signal,
    }));
  }

  if (config.signal?.aborted) {
    console.warn("[pipeline] Interrupted, transforms not run.");
    return { syncs, transforms: null };
  }

  return { syncs, transforms: await syncTransforms(store) };
}

/**
 * Open the store, run the pipeline, close the store. Never throws: failures
 * are logged and reported in the result.
 */
export async function executeScheduledRun(config: SchedulerConfig): Promise<ScheduledRunResult> {
  const startTime = Date.now();
  console.log("[scheduler] Executing pipeline...");

  try {
    const result = await withStore({ dataDir: config.dataDir }, (store) => runPipeline(store, config));
    const duration = Date.now() - startTime;
    console.log(`[scheduler] Pipeline completed in ${duration}ms:`, {
      fetches: result.syncs.map((sync) => `${sync.log.worker}: ${sync.log.status}`),
      transforms: result.transforms?.log.status ?? "skipped",
    });
    return { success: true, duration, result };
  } catch (error) {
    const duration = Date.now() - startTime;
    console.error(`[scheduler] Pipeline failed after ${duration}ms:`, error);
    return { success: false, duration, error: errorMessage(error) };
  }
}

/**
 * Schedule the pipeline. A tick that fires while the previous run is still
 * going is skipped.
 */
export function startScheduler(config: SchedulerConfig = {}): ScheduledTask {
  const schedule = config.schedule ?? ENV.pipelineCron;
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression: ${schedule}`);
  }

  let running = false;
  console.log(`[scheduler] Scheduling pipeline (${schedule})`);

  const task = cron.schedule(schedule, async () => {
    if (running) {
      console.warn("[scheduler] Previous run still in progress, skipping this tick.");
      return;
    }
    running = true;
    try {
      await executeScheduledRun(config);
    } finally {
      running = false;
    }
  });

  console.log("[scheduler] Scheduler started successfully.");
  return task;
}
