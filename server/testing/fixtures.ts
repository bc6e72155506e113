import { openStore, type WarehouseStore } from "../db";
import { MEMORY_STORE } from "../_core/env";
import type { GameSource, RawGameCandidate } from "../ingestion/types";

export function openTestStore(): Promise<WarehouseStore> {
  return openStore({ dataDir: MEMORY_STORE });
}

let sequence = 0;

/** A complete Lichess game between alice and bob; override what a test needs. */
export function gameCandidate(overrides: Partial<RawGameCandidate> = {}): RawGameCandidate {
  sequence++;
  const id = overrides.sourceGameId ?? `game${String(sequence).padStart(4, "0")}`;
  return {
    sourcePlatform: "lichess",
    sourceGameId: id,
    whiteUsername: "alice",
    blackUsername: "bob",
    date: "2024-03-05",
    eventName: "blitz",
    eventSite: "lichess.org",
    eventRound: null,
    resultCode: "1-0",
    eco: "C20",
    openingName: "King's Pawn Game",
    openingVariation: null,
    moves: "e4 e5 Nf3",
    timeControl: "300+0",
    url: `https://lichess.org/${id}`,
    ...overrides,
  };
}

/**
 * In-process source yielding `records`. `afterRecord` runs once the consumer
 * has finished with a record and asks for the next one.
 */
export function fakeSource(
  records: RawGameCandidate[],
  afterRecord: (index: number) => void = () => {}
): GameSource {
  return {
    platform: "lichess",
    async *fetchGames() {
      for (const [index, record] of records.entries()) {
        yield record;
        afterRecord(index);
      }
    },
  };
}
