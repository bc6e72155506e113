import { sql } from "drizzle-orm";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { dimEvent, dimOpening, dimPlayer, factGames } from "../../drizzle/schema";
import type { WarehouseStore } from "../db";
import { MalformedRecordError } from "../_core/errors";
import { parseChesscomGame } from "../ingestion/sources/chesscom";
import { gameCandidate, openTestStore } from "../testing/fixtures";
import { ingestGame } from "./ingest";
import { listGames } from "./queries";

describe("ingestGame", () => {
  let store: WarehouseStore;

  beforeEach(async () => {
    store = await openTestStore();
  });

  afterEach(async () => {
    await store.close();
  });

  it("loads a game into the star schema", async () => {
    const result = await ingestGame(store.db, gameCandidate({ sourceGameId: "abc123" }));

    expect(result.outcome).toBe("inserted");
    expect(result.sourceGameId).toBe("abc123");
    expect(await listGames(store.db)).toEqual([{
      gameId: result.gameId,
      platform: "lichess",
      sourceGameId: "abc123",
      white: "alice",
      black: "bob",
      isoDate: "2024-03-05",
      result: "1-0",
      eco: "C20",
      openingName: "King's Pawn Game",
      timeControl: "300+0",
      moves: "e4 e5 Nf3",
      url: "https://lichess.org/abc123",
    }]);
  });

  it("is idempotent and updates changed games in place", async () => {
    const candidate = gameCandidate({ sourceGameId: "abc123" });

    const first = await ingestGame(store.db, candidate);
    const again = await ingestGame(store.db, candidate);
    const corrected = await ingestGame(store.db, { ...candidate, resultCode: "0-1" });

    expect(again.outcome).toBe("skipped");
    expect(corrected).toEqual({ outcome: "updated", gameId: first.gameId, sourceGameId: "abc123" });
    expect(await store.db.select().from(factGames)).toHaveLength(1);
    expect((await listGames(store.db))[0]?.result).toBe("0-1");
  });

  it("keeps chess.com live and daily games that share a number apart", async () => {
    const archiveEntry = (kind: string, uuid: string) => ({
      url: `https://www.chess.com/game/${kind}/100`,
      uuid,
      time_control: "600",
      end_time: Date.UTC(2024, 0, 15) / 1000,
      white: { username: "alice", result: "win" },
      black: { username: "bob", result: "resigned" },
    });

    const live = await ingestGame(store.db, parseChesscomGame(archiveEntry("live", "0000-live")));
    const daily = await ingestGame(store.db, parseChesscomGame(archiveEntry("daily", "0000-daily")));

    expect([live.outcome, daily.outcome]).toEqual(["inserted", "inserted"]);
    expect([live.sourceGameId, daily.sourceGameId]).toEqual(["live/100", "daily/100"]);
    expect(await store.db.select().from(factGames)).toHaveLength(2);
  });

  it("shares dimension rows between games", async () => {
    await ingestGame(store.db, gameCandidate());
    await ingestGame(store.db, gameCandidate({ whiteUsername: "bob", blackUsername: "alice" }));

    expect((await store.db.select().from(dimPlayer)).map((player) => player.username).sort()).toEqual(["alice", "bob"]);
    expect(await store.db.select().from(dimOpening)).toHaveLength(1);
    const dates = await store.db.execute<{ n: number }>(sql`SELECT count(*)::int AS n FROM dim_date`);
    expect(dates.rows[0]?.n).toBe(1);
  });

  it("points games without metadata at no date, the sentinel event and no opening", async () => {
    await ingestGame(store.db, gameCandidate({
      sourceGameId: "bare0001",
      date: null,
      eventName: null,
      eventSite: null,
      eventRound: null,
      eco: null,
      openingName: null,
    }));

    const [fact] = await store.db.select().from(factGames);
    const [sentinel] = await store.db.select().from(dimEvent);
    expect(fact?.dateId).toBeNull();
    expect(fact?.openingId).toBeNull();
    expect(fact?.eventId).toBe(sentinel?.id);
    expect(sentinel).toMatchObject({ name: "", site: "", round: "" });
  });

  it("writes nothing for a malformed record", async () => {
    await expect(ingestGame(store.db, gameCandidate({ resultCode: null }))).rejects.toBeInstanceOf(MalformedRecordError);

    expect(await store.db.select().from(factGames)).toHaveLength(0);
    expect(await store.db.select().from(dimPlayer)).toHaveLength(0);
  });
});
