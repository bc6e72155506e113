import { promises as fs } from "fs";
import path from "path";
import { PGlite } from "@electric-sql/pglite";
import { drizzle, type PgliteDatabase, type PgliteQueryResultHKT } from "drizzle-orm/pglite";
import type { PgDatabase } from "drizzle-orm/pg-core";
import * as schema from "../drizzle/schema";
import { ENV, MEMORY_STORE } from "./_core/env";
import { StorageUnavailableError, errorMessage } from "./_core/errors";
import { migrate } from "./migrate";

export type WarehouseDb = PgliteDatabase<typeof schema>;

/** Either the store's database or an open transaction on it. */
export type DbExecutor = PgDatabase<PgliteQueryResultHKT, typeof schema>;

export interface WarehouseStore {
  readonly db: WarehouseDb;
  readonly location: string;
  close(): Promise<void>;
}

export interface OpenStoreOptions {
  /** PGlite data directory, or "memory://" for a throwaway store. */
  dataDir?: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === "EPERM";
  }
}

async function readLockHolder(lockPath: string): Promise<number | null> {
  try {
    const pid = Number.parseInt((await fs.readFile(lockPath, "utf8")).trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  }
}

/**
 * Take the single-writer lock of a data directory.
 * Returns the release function.
 */
async function acquireLock(dataDir: string): Promise<() => Promise<void>> {
  const lockPath = `${dataDir}.lock`;

  try {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
  } catch (error) {
    throw new StorageUnavailableError(dataDir, `cannot create ${path.dirname(lockPath)}`, { cause: error });
  }

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const handle = await fs.open(lockPath, "wx");
      try {
        await handle.writeFile(String(process.pid));
      } finally {
        await handle.close();
      }
      return async () => {
        await fs.rm(lockPath, { force: true });
      };
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EEXIST") {
        throw new StorageUnavailableError(dataDir, "cannot create lock file", { cause: error });
      }

      const holder = await readLockHolder(lockPath);
      if (holder !== null && isProcessAlive(holder)) {
        throw new StorageUnavailableError(dataDir, `locked by process ${holder}`);
      }

      console.warn(`[db] Removing stale lock ${lockPath}`);
      await fs.rm(lockPath, { force: true });
    }
  }

  throw new StorageUnavailableError(dataDir, "lock could not be acquired");
}

/**
 * Open the embedded warehouse, take its lock and bring the schema up to date.
 * The caller owns the handle and must close it.
 */
export async function openStore(options: OpenStoreOptions = {}): Promise<WarehouseStore> {
  const location = options.dataDir ?? ENV.warehouseDir;
  const inMemory = location === MEMORY_STORE;

  const release = inMemory ? async () => {} : await acquireLock(location);

  let client: PGlite | null = null;
  try {
    client = inMemory ? new PGlite() : new PGlite(location);
    await client.waitReady;

    const db = drizzle(client, { schema });
    await migrate(db);

    const opened = client;
    let closed = false;

    return {
      db,
      location,
      async close() {
        if (closed) return;
        closed = true;
        try {
          await opened.close();
        } finally {
          await release();
        }
      },
    };
  } catch (error) {
    if (client) {
      await client.close().catch((closeError: unknown) => {
        console.error(`[db] Failed to close ${location}:`, closeError);
      });
    }
    await release();
    throw error instanceof StorageUnavailableError
      ? error
      : new StorageUnavailableError(location, errorMessage(error), { cause: error });
  }
}

/**
 * Scoped acquisition: the store is released however `fn` ends.
 */
export async function withStore<T>(options: OpenStoreOptions, fn: (store: WarehouseStore) => Promise<T>): Promise<T> {
  const store = await openStore(options);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
