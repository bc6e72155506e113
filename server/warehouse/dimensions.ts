import { getDate, getMonth, getYear, isValid, parse } from "date-fns";
import { sql } from "drizzle-orm";
import {
  dimDate,
  dimEvent,
  dimOpening,
  dimPlayer,
  dimResult,
  dimSource,
  type Platform,
  type ResultCode,
} from "../../drizzle/schema";
import type { DbExecutor } from "../db";
import { DimensionConflictError, MalformedRecordError, type DuplicateNaturalKey } from "../_core/errors";

/**
 * Natural key (plus mergeable attributes) per dimension kind.
 */
export interface DimensionKeys {
  player: { username: string; displayName?: string | null };
  date: { isoDate: string };
  event: { name?: string | null; site?: string | null; round?: string | null };
  result: { code: ResultCode };
  source: { platform: Platform };
  opening: { eco: string; name?: string | null; variation?: string | null };
}

export type DimensionKind = keyof DimensionKeys;

/** The single row every game without event metadata points at. */
export const UNKNOWN_EVENT = { name: "", site: "", round: "" } as const;

type Upsert<K extends DimensionKind> = (key: DimensionKeys[K]) => Promise<{ id: number }[]>;

const DIMENSION_TABLES: Record<DimensionKind, string> = {
  player: "dim_player",
  date: "dim_date",
  event: "dim_event",
  result: "dim_result",
  source: "dim_source",
  opening: "dim_opening",
};

function normalizePart(value: string | null | undefined): string {
  return value?.trim() ?? "";
}

const DESCRIBE: { [K in DimensionKind]: (key: DimensionKeys[K]) => string } = {
  player: (key) => key.username,
  date: (key) => key.isoDate,
  event: (key) => [normalizePart(key.name), normalizePart(key.site), normalizePart(key.round)].join("|"),
  result: (key) => key.code,
  source: (key) => key.platform,
  opening: (key) => key.eco,
};

/**
 * Parse a YYYY-MM-DD calendar date. Rejects impossible dates such as 2024-02-30.
 */
export function parseIsoDate(isoDate: string): { year: number; month: number; day: number } | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(isoDate)) return null;

  const date = parse(isoDate, "yyyy-MM-dd", new Date());
  if (!isValid(date)) return null;
  return { year: getYear(date), month: getMonth(date) + 1, day: getDate(date) };
}

/**
 * Maps natural keys to surrogate ids, creating dimension rows on first sight.
 *
 * Every resolution is one `INSERT ... ON CONFLICT ... RETURNING id`, so the
 * same key resolved twice (in sequence or concurrently) yields the same id
 * and one row. Only the opening dimension merges attributes on conflict.
 */
export class DimensionResolver {
  private readonly upserts: { [K in DimensionKind]: Upsert<K> };

  constructor(private readonly db: DbExecutor) {
    this.upserts = {
      player: (key) =>
        this.db
          .insert(dimPlayer)
          .values({ username: key.username, displayName: key.displayName ?? null })
          .onConflictDoUpdate({
            target: dimPlayer.username,
            set: { displayName: sql`COALESCE(excluded.display_name, ${dimPlayer.displayName})` },
          })
          .returning({ id: dimPlayer.id }),

      date: async (key) => {
        const parts = parseIsoDate(key.isoDate);
        if (!parts) {
          throw new MalformedRecordError([`invalid calendar date ${key.isoDate}`]);
        }
        return this.db
          .insert(dimDate)
          .values({ isoDate: key.isoDate, ...parts })
          .onConflictDoUpdate({
            target: dimDate.isoDate,
            set: { isoDate: sql`excluded.iso_date` },
          })
          .returning({ id: dimDate.id });
      },

      event: (key) =>
        this.db
          .insert(dimEvent)
          .values({ name: normalizePart(key.name), site: normalizePart(key.site), round: normalizePart(key.round) })
          .onConflictDoUpdate({
            target: [dimEvent.name, dimEvent.site, dimEvent.round],
            set: { name: sql`excluded.name` },
          })
          .returning({ id: dimEvent.id }),

      result: (key) =>
        this.db
          .insert(dimResult)
          .values({ code: key.code })
          .onConflictDoUpdate({
            target: dimResult.code,
            set: { code: sql`excluded.code` },
          })
          .returning({ id: dimResult.id }),

      source: (key) =>
        this.db
          .insert(dimSource)
          .values({ platform: key.platform })
          .onConflictDoUpdate({
            target: dimSource.platform,
            set: { platform: sql`excluded.platform` },
          })
          .returning({ id: dimSource.id }),

      // Openings get enriched after first sight: merge name/variation, keep created_at.
      opening: (key) =>
        this.db
          .insert(dimOpening)
          .values({ eco: key.eco, name: key.name ?? null, variation: key.variation ?? null })
          .onConflictDoUpdate({
            target: dimOpening.eco,
            set: {
              name: sql`COALESCE(excluded.name, ${dimOpening.name})`,
              variation: sql`COALESCE(excluded.variation, ${dimOpening.variation})`,
              updatedAt: sql`CASE WHEN excluded.name IS NULL AND excluded.variation IS NULL THEN ${dimOpening.updatedAt} ELSE now() END`,
            },
          })
          .returning({ id: dimOpening.id }),
    };
  }

  async resolve<K extends DimensionKind>(kind: K, key: DimensionKeys[K]): Promise<number> {
    const upsert: Upsert<K> = this.upserts[kind];
    const describe: (key: DimensionKeys[K]) => string = DESCRIBE[kind];
    const rows = await upsert(key);

    if (rows.length !== 1) {
      throw new DimensionConflictError([
        { table: DIMENSION_TABLES[kind], naturalKey: describe(key), rows: rows.length },
      ]);
    }
    return rows[0].id;
  }
}

const NATURAL_KEYS: { table: string; keyExpr: string; groupBy: string }[] = [
  { table: "dim_player", keyExpr: "username", groupBy: "username" },
  { table: "dim_date", keyExpr: "iso_date::text", groupBy: "iso_date" },
  { table: "dim_event", keyExpr: "concat_ws('|', name, site, round)", groupBy: "name, site, round" },
  { table: "dim_result", keyExpr: "code", groupBy: "code" },
  { table: "dim_source", keyExpr: "platform::text", groupBy: "platform" },
  { table: "dim_opening", keyExpr: "eco", groupBy: "eco" },
];

/**
 * Scan every dimension for natural keys held by more than one row.
 * Duplicates are a data-integrity fault: raise, never pick one.
 */
export async function verifyDimensionIntegrity(db: DbExecutor): Promise<void> {
  const duplicates: DuplicateNaturalKey[] = [];

  for (const { table, keyExpr, groupBy } of NATURAL_KEYS) {
    const result = await db.execute<{ natural_key: string; row_count: number }>(
      sql.raw(
        `SELECT ${keyExpr} AS natural_key, count(*)::int AS row_count FROM ${table} GROUP BY ${groupBy} HAVING count(*) > 1`
      )
    );
    for (const row of result.rows) {
      duplicates.push({ table, naturalKey: String(row.natural_key), rows: Number(row.row_count) });
    }
  }

  if (duplicates.length > 0) {
    throw new DimensionConflictError(duplicates);
  }
}
