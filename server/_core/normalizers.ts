/**
 * Presentation layer for warehouse rows: the JSON shape served by the
 * dashboard API and the text table printed by the CLI.
 */

import type { GameListRow } from "../warehouse/queries";
import { countMoves } from "../warehouse/facts";

const NAME_WIDTH = 20;

/**
 * Winner of a game from its result code: a username, or "Draw" for every
 * non-decisive result, unfinished games included (as in stg_games.winner).
 */
export function winnerOf(result: string, white: string, black: string): string {
  if (result === "1-0") return white;
  if (result === "0-1") return black;
  return "Draw";
}

/**
 * Normalize a game row to the API format
 */
export function normalizeGame(row: GameListRow) {
  return {
    id: row.gameId,
    source: {
      platform: row.platform,
      id: row.sourceGameId,
      url: row.url,
    },
    players: {
      white: row.white,
      black: row.black,
    },
    date: row.isoDate,
    result: row.result,
    winner: winnerOf(row.result, row.white, row.black),
    opening: row.eco ? { eco: row.eco, name: row.openingName } : null,
    timeControl: row.timeControl,
    moveCount: countMoves(row.moves),
  };
}

/**
 * Standard response wrapper of the dashboard API
 */
export function createApiResponse<T>(endpoint: string, parameters: Record<string, string>, data: T[], errors: string[] = []) {
  return {
    get: endpoint,
    parameters,
    errors,
    results: data.length,
    response: data,
  };
}

function truncate(value: string, width: number): string {
  return value.length > width ? `${value.slice(0, width - 3)}...` : value;
}

/** Fixed-width table of games for the terminal, header and rule included. */
export function formatGameTable(rows: GameListRow[]): string[] {
  const header = [
    "ID".padEnd(6),
    "White".padEnd(NAME_WIDTH),
    "Black".padEnd(NAME_WIDTH),
    "Date".padEnd(12),
    "Result".padEnd(10),
    "ECO".padEnd(6),
    "TC".padEnd(10),
    "Moves".padEnd(6),
    "Source",
  ].join(" ");

  const lines = [header, "-".repeat(header.length)];
  for (const row of rows) {
    lines.push([
      String(row.gameId).padEnd(6),
      truncate(row.white, NAME_WIDTH).padEnd(NAME_WIDTH),
      truncate(row.black, NAME_WIDTH).padEnd(NAME_WIDTH),
      (row.isoDate ?? "-").padEnd(12),
      row.result.padEnd(10),
      (row.eco ?? "-").padEnd(6),
      (row.timeControl ?? "-").padEnd(10),
      String(countMoves(row.moves)).padEnd(6),
      row.platform,
    ].join(" "));
  }
  return lines;
}
