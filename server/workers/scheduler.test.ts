import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { get } = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock("axios", () => ({
  default: { create: () => ({ get }) },
}));

import { openStore, type WarehouseStore } from "../db";
import { openTestStore } from "../testing/fixtures";
import { executeScheduledRun, runPipeline, startScheduler } from "./scheduler";

const GAME = {
  id: "pipe0001",
  perf: "rapid",
  status: "resign",
  createdAt: Date.UTC(2024, 4, 1),
  winner: "black",
  players: { white: { user: { name: "alice" } }, black: { user: { name: "bob" } } },
  clock: { initial: 600, increment: 5 },
  moves: "e4 c5",
};

describe("runPipeline", () => {
  let store: WarehouseStore;

  beforeEach(async () => {
    store = await openTestStore();
    get.mockReset();
    get.mockImplementation(async () => ({ data: Readable.from([`${JSON.stringify(GAME)}\n`]) }));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await store.close();
  });

  it("fetches configured platforms, then transforms", async () => {
    const result = await runPipeline(store, { lichessUsername: "alice", chesscomUsername: null });

    expect(result.syncs.map((sync) => [sync.log.worker, sync.log.recordsInserted])).toEqual([["lichess-sync", 1]]);
    expect(result.transforms?.models.map((model) => [model.model, model.rowsWritten])).toEqual([
      ["stg_games", 1],
      ["monthly_win_rate", 2],
      ["time_control_breakdown", 2],
      ["opening_performance", 0],
      ["player_stats", 2],
      ["opening_stats", 0],
    ]);
    expect(console.warn).toHaveBeenCalledWith("[pipeline] No chesscom username configured, skipping chesscom fetch.");
  });

  it("skips the transforms once interrupted", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runPipeline(store, { lichessUsername: "alice", signal: controller.signal });

    expect(result).toEqual({ syncs: [], transforms: null });
  });
});

describe("executeScheduledRun", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "chess-warehouse-scheduler-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("reports a run that could not open the warehouse", async () => {
    const dataDir = path.join(root, "warehouse");
    const holder = await openStore({ dataDir });
    try {
      const run = await executeScheduledRun({ dataDir });
      expect(run.success).toBe(false);
      expect(run.error).toBe(`Warehouse at ${dataDir} is unavailable: locked by process ${process.pid}`);
    } finally {
      await holder.close();
    }
  });

  it("runs the transforms alone when no username is configured", async () => {
    const run = await executeScheduledRun({ dataDir: path.join(root, "warehouse") });

    expect(run.success).toBe(true);
    expect(run.result?.syncs).toEqual([]);
    expect(run.result?.transforms?.success).toBe(true);
  });
});

describe("startScheduler", () => {
  it("refuses an invalid cron expression", () => {
    expect(() => startScheduler({ schedule: "every morning" })).toThrow("Invalid cron expression: every morning");
  });

  it("schedules a valid expression", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const task = startScheduler({ schedule: "0 6 * * *", dataDir: "memory://" });
    task.stop();
    vi.restoreAllMocks();
  });
});
