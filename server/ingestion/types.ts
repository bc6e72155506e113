/**
 * Unified ingestion interface. Any new data source must implement GameSource.
 * No source is allowed to write directly to the warehouse.
 */

import type { Platform, ResultCode } from "../../drizzle/schema";

/**
 * What an adapter yields. Field presence is not trusted until the record
 * passes parseRawGame().
 */
export interface RawGameCandidate {
  sourcePlatform: Platform;
  sourceGameId?: string | null;
  whiteUsername?: string | null;
  blackUsername?: string | null;
  /** YYYY-MM-DD */
  date?: string | null;
  eventName?: string | null;
  eventSite?: string | null;
  eventRound?: string | null;
  resultCode?: string | null;
  eco?: string | null;
  openingName?: string | null;
  openingVariation?: string | null;
  moves?: string | null;
  timeControl?: string | null;
  url?: string | null;
}

/** A validated raw game with its natural key settled. */
export interface RawGame {
  sourcePlatform: Platform;
  sourceGameId: string;
  whiteUsername: string;
  blackUsername: string;
  date: string | null;
  eventName: string | null;
  eventSite: string | null;
  eventRound: string | null;
  resultCode: ResultCode;
  eco: string | null;
  openingName: string | null;
  openingVariation: string | null;
  moves: string;
  timeControl: string | null;
  url: string | null;
}

export interface FetchGamesOptions {
  /** Stop after this many records. */
  maxGames?: number;
  signal?: AbortSignal;
}

export interface GameSource {
  platform: Platform;
  fetchGames(username: string, options?: FetchGamesOptions): AsyncIterable<RawGameCandidate>;
}

export type LoadOutcome = "inserted" | "updated" | "skipped";
