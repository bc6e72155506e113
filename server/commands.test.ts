import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { get } = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock("axios", () => ({
  default: { create: () => ({ get }) },
}));

import { buildProgram } from "./commands";
import { openStore } from "./db";

const LICHESS_GAMES = [
  {
    id: "cli00001",
    perf: "blitz",
    status: "mate",
    createdAt: Date.UTC(2024, 2, 5),
    winner: "white",
    players: { white: { user: { name: "alice" } }, black: { user: { name: "bob" } } },
    opening: { eco: "C20", name: "King's Pawn Game" },
    clock: { initial: 300, increment: 0 },
    moves: "e4 e5 Qh5 Nc6 Bc4 Nf6 Qxf7#",
  },
  {
    id: "cli00002",
    perf: "blitz",
    status: "draw",
    createdAt: Date.UTC(2024, 2, 6),
    players: { white: { user: { name: "bob" } }, black: { user: { name: "alice" } } },
    clock: { initial: 300, increment: 0 },
    moves: "d4 d5",
  },
];

describe("chess-warehouse CLI", () => {
  let root: string;
  let dataDir: string;
  let out: string[];
  let err: string[];

  async function run(...args: string[]): Promise<void> {
    const output = { log: (line: string) => out.push(line), error: (line: string) => err.push(line) };
    await buildProgram(output).exitOverride().parseAsync(["--data-dir", dataDir, ...args], { from: "user" });
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "chess-warehouse-cli-"));
    dataDir = path.join(root, "warehouse");
    out = [];
    err = [];
    get.mockReset();
    get.mockImplementation(async () => ({
      data: Readable.from(LICHESS_GAMES.map((game) => `${JSON.stringify(game)}\n`)),
    }));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it("hints at fetch when no games are stored", async () => {
    await run("list");
    expect(out).toEqual(["No games stored. Use 'chess-warehouse fetch <username> --platform <platform>' to fetch games."]);
  });

  it("fetches, lists and transforms", async () => {
    await run("fetch", "alice", "--platform", "lichess");
    expect(out).toEqual([
      "Fetching games for alice from lichess...",
      "Done: 2 inserted, 0 updated, 0 skipped, 0 rejected.",
    ]);

    out = [];
    await run("fetch", "alice", "--platform", "lichess");
    expect(out[1]).toBe("Done: 0 inserted, 0 updated, 2 skipped, 0 rejected.");

    out = [];
    await run("list", "--platform", "lichess");
    expect(out).toHaveLength(4);
    expect(out[2]?.split(/\s+/)).toEqual(["1", "alice", "bob", "2024-03-05", "1-0", "C20", "300+0", "7", "lichess"]);
    expect(out[3]?.split(/\s+/)).toEqual(["2", "bob", "alice", "2024-03-06", "1/2-1/2", "-", "300+0", "2", "lichess"]);

    out = [];
    await run("transform");
    expect(out).toEqual([
      "stg_games: 2 rows (full)",
      "monthly_win_rate: 2 rows (full)",
      "time_control_breakdown: 2 rows (full)",
      "opening_performance: 2 rows (full)",
      "player_stats: 2 rows (full)",
      "opening_stats: 1 rows (full)",
    ]);
  });

  it("passes --max on to the source", async () => {
    await run("fetch", "alice", "--platform", "lichess", "--max", "1");

    expect(out[1]).toBe("Done: 1 inserted, 0 updated, 0 skipped, 0 rejected.");
    expect(get).toHaveBeenCalledWith("/games/user/alice", expect.objectContaining({
      params: { opening: "true", max: "1" },
    }));
  });

  it("fails with exit code 1 when the warehouse is locked", async () => {
    const holder = await openStore({ dataDir });
    try {
      await run("list");
    } finally {
      await holder.close();
    }

    expect(err).toEqual([`Error: Warehouse at ${dataDir} is unavailable: locked by process ${process.pid}`]);
    expect(process.exitCode).toBe(1);
  });
});
