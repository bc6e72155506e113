import type { DbExecutor } from "../db";
import type { RawGame } from "../ingestion/types";
import { parseRawGame } from "../ingestion/validate";
import { DimensionResolver, UNKNOWN_EVENT } from "./dimensions";
import { FactLoader, type LoadResult, type ResolvedGame } from "./facts";

export interface IngestResult extends LoadResult {
  sourceGameId: string;
}

/**
 * Resolve every dimension a game references. Absent event metadata maps to
 * the sentinel row; absent ECO maps to no opening at all.
 */
export async function resolveGame(resolver: DimensionResolver, game: RawGame): Promise<ResolvedGame> {
  const sourceId = await resolver.resolve("source", { platform: game.sourcePlatform });
  const whiteId = await resolver.resolve("player", { username: game.whiteUsername });
  const blackId = await resolver.resolve("player", { username: game.blackUsername });
  const dateId = game.date ? await resolver.resolve("date", { isoDate: game.date }) : null;

  const hasEvent = Boolean(game.eventName || game.eventSite || game.eventRound);
  const eventId = await resolver.resolve(
    "event",
    hasEvent ? { name: game.eventName, site: game.eventSite, round: game.eventRound } : UNKNOWN_EVENT
  );

  const resultId = await resolver.resolve("result", { code: game.resultCode });
  const openingId = game.eco
    ? await resolver.resolve("opening", { eco: game.eco, name: game.openingName, variation: game.openingVariation })
    : null;

  return {
    sourceId,
    sourceGameId: game.sourceGameId,
    whiteId,
    blackId,
    dateId,
    eventId,
    resultId,
    openingId,
    eco: game.eco,
    moves: game.moves,
    timeControl: game.timeControl,
    url: game.url,
  };
}

/**
 * Validate, resolve and load one game in a single transaction, so a failure
 * never leaves a fact pointing at a dimension row that was rolled back.
 * @throws MalformedRecordError before anything is written
 */
export async function ingestGame(db: DbExecutor, candidate: unknown): Promise<IngestResult> {
  const game = parseRawGame(candidate);

  const result = await db.transaction(async (tx) => {
    const resolved = await resolveGame(new DimensionResolver(tx), game);
    return new FactLoader(tx).load(resolved);
  });

  return { ...result, sourceGameId: game.sourceGameId };
}
