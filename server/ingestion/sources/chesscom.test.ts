import { beforeEach, describe, expect, it, vi } from "vitest";
import { SourceUnavailableError } from "../../_core/errors";
import type { RawGameCandidate } from "../types";

const { get } = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock("axios", () => ({
  default: { create: () => ({ get }) },
}));

import { archiveMonth, chesscomSource, fetchChesscomGames, openingFromEcoUrl, parseChesscomGame } from "./chesscom";

const ITALIAN_PGN = [
  '[Event "Live Chess"]',
  '[Site "Chess.com"]',
  '[Date "2024.03.05"]',
  '[Round "-"]',
  '[White "alice"]',
  '[Black "bob"]',
  '[Result "1-0"]',
  '[ECO "C50"]',
  '[ECOUrl "https://www.chess.com/openings/Italian-Game-Two-Knights-Defense"]',
  '[UTCDate "2024.03.05"]',
  '[TimeControl "600"]',
  '[Link "https://www.chess.com/game/live/123456789"]',
  "",
  "1. e4 e5 2. Nf3 Nc6 3. Bc4 Nf6 1-0",
  "",
].join("\n");

function archiveGame(id: string, white = "alice", black = "bob") {
  return {
    url: `https://www.chess.com/game/live/${id}`,
    pgn: "",
    time_control: "180+2",
    end_time: Date.UTC(2024, 0, 15, 20) / 1000,
    white: { username: white, result: "win" },
    black: { username: black, result: "resigned" },
  };
}

const ARCHIVES = "/player/alice/games/archives";
const FEBRUARY = "https://api.chess.com/pub/player/alice/games/2024/02";
const MARCH = "https://api.chess.com/pub/player/alice/games/2024/03";

async function collect(games: AsyncIterable<RawGameCandidate>): Promise<RawGameCandidate[]> {
  const result: RawGameCandidate[] = [];
  for await (const game of games) result.push(game);
  return result;
}

describe("parseChesscomGame", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("reads headers and moves from the PGN", () => {
    expect(parseChesscomGame({
      url: "https://www.chess.com/game/live/123456789",
      pgn: ITALIAN_PGN,
      time_control: "600",
      white: { username: "alice", result: "win" },
      black: { username: "bob", result: "checkmated" },
    })).toEqual({
      sourcePlatform: "chesscom",
      sourceGameId: null,
      whiteUsername: "alice",
      blackUsername: "bob",
      date: "2024-03-05",
      eventName: "Live Chess",
      eventSite: "Chess.com",
      eventRound: null,
      resultCode: "1-0",
      eco: "C50",
      openingName: "Italian Game Two Knights Defense",
      openingVariation: null,
      moves: "e4 e5 Nf3 Nc6 Bc4 Nf6",
      timeControl: "600",
      url: "https://www.chess.com/game/live/123456789",
    });
  });

  it("falls back to the archive fields when the PGN cannot be read", () => {
    expect(parseChesscomGame({ ...archiveGame("42"), pgn: "1. e4 e9" })).toEqual({
      sourcePlatform: "chesscom",
      sourceGameId: null,
      whiteUsername: "alice",
      blackUsername: "bob",
      date: "2024-01-15",
      eventName: null,
      eventSite: null,
      eventRound: null,
      resultCode: "1-0",
      eco: null,
      openingName: null,
      openingVariation: null,
      moves: "",
      timeControl: "180+2",
      url: "https://www.chess.com/game/live/42",
    });
  });

  it("scores games from the player results", () => {
    const blackWins = { ...archiveGame("43"), white: { username: "alice", result: "timeout" }, black: { username: "bob", result: "win" } };
    const drawn = { ...archiveGame("44"), white: { username: "alice", result: "repetition" }, black: { username: "bob", result: "repetition" } };

    expect(parseChesscomGame(blackWins).resultCode).toBe("0-1");
    expect(parseChesscomGame(drawn).resultCode).toBe("1/2-1/2");
  });

  it("treats partial PGN dates as absent", () => {
    const pgn = ITALIAN_PGN.replace('[UTCDate "2024.03.05"]', '[UTCDate "????.??.??"]').replace('[Date "2024.03.05"]', '[Date "2024.??.??"]');
    expect(parseChesscomGame({ pgn }).date).toBeNull();
  });
});

describe("openingFromEcoUrl", () => {
  it("turns the slug into a name", () => {
    expect(openingFromEcoUrl("https://www.chess.com/openings/Sicilian-Defense-Najdorf-Variation")).toBe("Sicilian Defense Najdorf Variation");
  });

  it("returns null without a usable url", () => {
    expect(openingFromEcoUrl(undefined)).toBeNull();
    expect(openingFromEcoUrl("not a url")).toBeNull();
    expect(openingFromEcoUrl("https://www.chess.com/")).toBeNull();
  });
});

describe("archiveMonth", () => {
  it("reads year and month from an archive url", () => {
    expect(archiveMonth(MARCH)).toEqual({ year: 2024, month: 3 });
    expect(archiveMonth("https://api.chess.com/pub/player/alice")).toBeNull();
  });
});

describe("chesscomSource.fetchGames", () => {
  beforeEach(() => {
    get.mockReset();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    get.mockImplementation(async (url: string) => {
      if (url === ARCHIVES) return { data: { archives: [FEBRUARY, MARCH] } };
      if (url === FEBRUARY) return { data: { games: [archiveGame("1001")] } };
      if (url === MARCH) return { data: { games: [archiveGame("2001"), archiveGame("2002")] } };
      throw new Error(`unexpected url ${url}`);
    });
  });

  it("reads archives newest first", async () => {
    const games = await collect(chesscomSource.fetchGames("Alice"));

    expect(games.map((game) => game.url)).toEqual([
      "https://www.chess.com/game/live/2001",
      "https://www.chess.com/game/live/2002",
      "https://www.chess.com/game/live/1001",
    ]);
    expect(get).toHaveBeenNthCalledWith(1, ARCHIVES, expect.anything());
  });

  it("stops requesting archives once enough games were read", async () => {
    const games = await collect(chesscomSource.fetchGames("alice", { maxGames: 1 }));

    expect(games).toHaveLength(1);
    expect(get).not.toHaveBeenCalledWith(FEBRUARY, expect.anything());
  });

  it("filters archives by month", async () => {
    const games = await collect(fetchChesscomGames("alice", { year: 2024, month: 2 }));

    expect(games.map((game) => game.url)).toEqual(["https://www.chess.com/game/live/1001"]);
    expect(get).not.toHaveBeenCalledWith(MARCH, expect.anything());
  });

  it("reports a failed request as an unavailable source", async () => {
    get.mockRejectedValue(new Error("Request failed with status code 410"));

    await expect(collect(chesscomSource.fetchGames("alice"))).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
