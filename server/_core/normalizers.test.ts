import { describe, expect, it } from "vitest";
import type { GameListRow } from "../warehouse/queries";
import { createApiResponse, formatGameTable, normalizeGame, winnerOf } from "./normalizers";

const ROW: GameListRow = {
  gameId: 1,
  platform: "lichess",
  sourceGameId: "abc123",
  white: "alice",
  black: "a_very_long_username_x",
  isoDate: "2024-03-05",
  result: "1-0",
  eco: "C20",
  openingName: "King's Pawn Game",
  timeControl: "300+0",
  moves: "e4 e5 Nf3",
  url: "https://lichess.org/abc123",
};

describe("winnerOf", () => {
  it("names the winner from the result code", () => {
    expect(winnerOf("1-0", "alice", "bob")).toBe("alice");
    expect(winnerOf("0-1", "alice", "bob")).toBe("bob");
    expect(winnerOf("1/2-1/2", "alice", "bob")).toBe("Draw");
  });

  it("reports an unfinished game as Draw, like the projection", () => {
    expect(winnerOf("*", "alice", "bob")).toBe("Draw");
    expect(normalizeGame({ ...ROW, result: "*" }).winner).toBe("Draw");
  });
});

describe("normalizeGame", () => {
  it("shapes a game for the API", () => {
    expect(normalizeGame(ROW)).toEqual({
      id: 1,
      source: { platform: "lichess", id: "abc123", url: "https://lichess.org/abc123" },
      players: { white: "alice", black: "a_very_long_username_x" },
      date: "2024-03-05",
      result: "1-0",
      winner: "alice",
      opening: { eco: "C20", name: "King's Pawn Game" },
      timeControl: "300+0",
      moveCount: 3,
    });
  });

  it("leaves out the opening of a game without ECO", () => {
    expect(normalizeGame({ ...ROW, eco: null, openingName: null }).opening).toBeNull();
  });
});

describe("createApiResponse", () => {
  it("wraps data with its request parameters", () => {
    expect(createApiResponse("/api/games", { platform: "lichess" }, [{ id: 1 }])).toEqual({
      get: "/api/games",
      parameters: { platform: "lichess" },
      errors: [],
      results: 1,
      response: [{ id: 1 }],
    });
  });
});

describe("formatGameTable", () => {
  it("prints a header, a rule and one line per game", () => {
    const lines = formatGameTable([ROW, { ...ROW, gameId: 2, isoDate: null, eco: null, timeControl: null, moves: "" }]);

    expect(lines).toHaveLength(4);
    expect(lines[0]?.split(/\s+/)).toEqual(["ID", "White", "Black", "Date", "Result", "ECO", "TC", "Moves", "Source"]);
    expect(lines[1]).toBe("-".repeat(lines[0]?.length ?? 0));
    expect(lines[2]?.split(/\s+/)).toEqual([
      "1", "alice", "a_very_long_usern...", "2024-03-05", "1-0", "C20", "300+0", "3", "lichess",
    ]);
    expect(lines[3]?.split(/\s+/)).toEqual([
      "2", "alice", "a_very_long_usern...", "-", "1-0", "-", "-", "0", "lichess",
    ]);
  });
});
