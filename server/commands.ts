/**
 * Command definitions of the chess-warehouse CLI.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { PLATFORMS, type Platform } from "../drizzle/schema";
import { openStore, withStore, type OpenStoreOptions } from "./db";
import { startDashboard } from "./dashboard/app";
import { ENV } from "./_core/env";
import { errorMessage } from "./_core/errors";
import { formatGameTable } from "./_core/normalizers";
import { fetchChesscomGames } from "./ingestion/sources/chesscom";
import type { GameSource } from "./ingestion/types";
import { listGames } from "./warehouse/queries";
import { syncGames } from "./workers/games-sync";
import { runPipeline, startScheduler } from "./workers/scheduler";
import { syncTransforms } from "./workers/transforms-sync";

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

type GlobalOptions = {
  dataDir?: string;
};

interface FetchOptions {
  platform: Platform;
  max?: number;
  year?: number;
  month?: number;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

function platformOption(description: string) {
  return new Option("--platform <platform>", description).choices(PLATFORMS);
}

/**
 * Abort controller wired to Ctrl-C for the duration of `fn`.
 */
async function interruptible<T>(output: CliOutput, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = () => {
    output.error("Interrupted, stopping after the current game...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);
  try {
    return await fn(controller.signal);
  } finally {
    process.off("SIGINT", onSigint);
  }
}

export function buildProgram(output: CliOutput = consoleOutput): Command {
  const program = new Command()
    .name("chess-warehouse")
    .description("Fetch chess games from Lichess and Chess.com into a local warehouse and analyze them")
    .version("0.1.0")
    .option("--data-dir <path>", `warehouse directory (default: ${ENV.warehouseDir})`);

  const storeOptions = (): OpenStoreOptions => ({ dataDir: program.opts<GlobalOptions>().dataDir });

  // Fatal errors end the command with exit code 1
  const run = <A extends unknown[]>(action: (...args: A) => Promise<void>) => async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      output.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  };

  program
    .command("fetch")
    .description("Fetch games of USERNAME from a chess platform")
    .argument("<username>", "player username on the platform")
    .addOption(platformOption("platform to fetch games from").makeOptionMandatory())
    .option("--max <n>", "stop after this many games", positiveInt)
    .option("--year <yyyy>", "Chess.com only: archives of this year", positiveInt)
    .option("--month <m>", "Chess.com only: archives of this month", positiveInt)
    .action(run(async (username: string, opts: FetchOptions) => {
      let source: GameSource | undefined;
      if (opts.platform === "chesscom" && (opts.year || opts.month)) {
        source = {
          platform: "chesscom",
          fetchGames: (user, options) => fetchChesscomGames(user, { ...options, year: opts.year, month: opts.month }),
        };
      }

      output.log(`Fetching games for ${username} from ${opts.platform}...`);
      const { log } = await withStore(storeOptions(), (store) =>
        interruptible(output, (signal) =>
          syncGames(store, { platform: opts.platform, username, maxGames: opts.max, signal, source })
        )
      );
      output.log(
        `Done: ${log.recordsInserted} inserted, ${log.recordsUpdated} updated, ` +
        `${log.recordsSkipped} skipped, ${log.recordsRejected} rejected.`
      );
      if (log.status === "partial" && log.recordsRejected === 0) {
        output.log("Interrupted before the end; run the command again to continue.");
      }
    }));

  program
    .command("list")
    .description("List stored games")
    .addOption(platformOption("only games from this platform"))
    .action(run(async (opts: { platform?: Platform }) => {
      const games = await withStore(storeOptions(), (store) => listGames(store.db, { platform: opts.platform }));
      if (games.length === 0) {
        output.log("No games stored. Use 'chess-warehouse fetch <username> --platform <platform>' to fetch games.");
        return;
      }
      for (const line of formatGameTable(games)) {
        output.log(line);
      }
    }));

  program
    .command("transform")
    .description("Refresh the staging projection and the analytical models")
    .action(run(async () => {
      const { models } = await withStore(storeOptions(), (store) => syncTransforms(store));
      for (const model of models) {
        output.log(`${model.model}: ${model.rowsWritten} rows (${model.mode})`);
      }
    }));

  program
    .command("pipeline")
    .description("Fetch the configured players' games from both platforms, then transform")
    .option("--schedule [cron]", `keep running on a cron schedule (default: ${ENV.pipelineCron})`)
    .option("--max <n>", "stop each fetch after this many games", positiveInt)
    .action(run(async (opts: { schedule?: string | boolean; max?: number }) => {
      const config = {
        lichessUsername: ENV.lichessUsername,
        chesscomUsername: ENV.chesscomUsername,
        maxGames: opts.max,
      };

      if (opts.schedule) {
        const task = startScheduler({
          ...config,
          dataDir: storeOptions().dataDir,
          schedule: typeof opts.schedule === "string" ? opts.schedule : undefined,
        });
        process.once("SIGINT", () => {
          output.log("Stopping scheduler.");
          task.stop();
        });
        return;
      }

      const result = await withStore(storeOptions(), (store) =>
        interruptible(output, (signal) => runPipeline(store, { ...config, signal }))
      );
      for (const sync of result.syncs) {
        output.log(
          `${sync.log.worker}: ${sync.log.recordsInserted} inserted, ${sync.log.recordsUpdated} updated, ` +
          `${sync.log.recordsSkipped} skipped, ${sync.log.recordsRejected} rejected.`
        );
      }
      for (const model of result.transforms?.models ?? []) {
        output.log(`${model.model}: ${model.rowsWritten} rows (${model.mode})`);
      }
    }));

  program
    .command("dashboard")
    .description("Serve the read-only JSON API of the dashboard")
    .option("--port <n>", "port to listen on", positiveInt, ENV.dashboardPort)
    .action(run(async (opts: { port: number }) => {
      const store = await openStore(storeOptions());
      try {
        const server = await startDashboard(store, opts.port);
        process.once("SIGINT", () => {
          output.log("Shutting down dashboard.");
          server.close(() => {
            store.close().catch((error: unknown) => output.error(`Error: ${errorMessage(error)}`));
          });
        });
      } catch (error) {
        await store.close();
        throw error;
      }
    }));

  return program;
}
