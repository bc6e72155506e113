import axios, { type AxiosInstance } from "axios";
import { Chess } from "chess.js";
import { z } from "zod";
import { ENV } from "../../_core/env";
import { errorMessage, SourceUnavailableError } from "../../_core/errors";
import { epochToIsoDate, pgnDateToIso } from "../utils/dates";
import type { FetchGamesOptions, GameSource, RawGameCandidate } from "../types";

const CHESSCOM_API_BASE = "https://api.chess.com/pub";

const DRAW_RESULTS = new Set([
  "agreed", "repetition", "stalemate", "insufficient", "50move", "timevsinsufficient",
]);

const text = z.string().optional().catch(undefined);

const chesscomPlayerSchema = z
  .object({ username: text, result: text })
  .optional()
  .catch(undefined);

const chesscomGameSchema = z
  .object({
    url: text,
    pgn: text,
    uuid: text,
    time_control: text,
    end_time: z.number().optional().catch(undefined),
    eco: text,
    white: chesscomPlayerSchema,
    black: chesscomPlayerSchema,
  })
  .catch({});

const archivesSchema = z.object({ archives: z.array(z.string()).catch([]) }).catch({ archives: [] });
const archiveGamesSchema = z.object({ games: z.array(z.unknown()).catch([]) }).catch({ games: [] });

type ChesscomGame = z.infer<typeof chesscomGameSchema>;

export interface ArchiveFilter {
  year?: number;
  month?: number;
}

interface ParsedPgn {
  headers: Record<string, string>;
  moves: string[];
}

/** Headers and SAN moves of a PGN, or null when chess.js rejects it. */
export function readPgn(pgn: string): ParsedPgn | null {
  const chess = new Chess();
  try {
    chess.loadPgn(pgn, { strict: false });
  } catch (error) {
    console.warn(`[chesscom] Unparseable PGN: ${errorMessage(error)}`);
    return null;
  }

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(chess.header())) {
    if (typeof value === "string") headers[key] = value;
  }
  return { headers, moves: chess.history() };
}

/**
 * "https://www.chess.com/openings/Sicilian-Defense-Najdorf-Variation"
 * -> "Sicilian Defense Najdorf Variation"
 */
export function openingFromEcoUrl(ecoUrl: string | undefined): string | null {
  if (!ecoUrl) return null;
  let slug: string | undefined;
  try {
    slug = new URL(ecoUrl).pathname.split("/").filter(Boolean).pop();
  } catch {
    return null;
  }
  if (!slug) return null;
  const name = decodeURIComponent(slug).replace(/-/g, " ").trim();
  return name || null;
}

function resultFromPlayers(game: ChesscomGame): string | null {
  if (game.white?.result === "win") return "1-0";
  if (game.black?.result === "win") return "0-1";
  if (game.white?.result && DRAW_RESULTS.has(game.white.result)) return "1/2-1/2";
  return null;
}

// PGN placeholder values that mean "unknown"
function known(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === "" || trimmed === "?" || trimmed === "-" ? null : trimmed;
}

/**
 * Map one entry of a monthly archive to a raw game. PGN headers win; the
 * archive's JSON fields fill in what the PGN lacks.
 */
export function parseChesscomGame(data: unknown): RawGameCandidate {
  const game = chesscomGameSchema.parse(data);
  const pgn = game.pgn ? readPgn(game.pgn) : null;
  const headers = pgn?.headers ?? {};
  const ecoUrl = known(headers.ECOUrl) ?? game.eco;
  // "*" is also what a PGN without a Result tag reports
  const pgnResult = known(headers.Result);

  return {
    sourcePlatform: "chesscom",
    sourceGameId: null,
    whiteUsername: known(headers.White) ?? game.white?.username ?? null,
    blackUsername: known(headers.Black) ?? game.black?.username ?? null,
    date: pgnDateToIso(headers.UTCDate) ?? pgnDateToIso(headers.Date)
      ?? (game.end_time !== undefined ? epochToIsoDate(game.end_time * 1000) : null),
    eventName: known(headers.Event),
    eventSite: known(headers.Site),
    eventRound: known(headers.Round),
    resultCode: pgnResult && pgnResult !== "*" ? pgnResult : resultFromPlayers(game) ?? pgnResult,
    eco: known(headers.ECO),
    openingName: known(headers.Opening) ?? openingFromEcoUrl(ecoUrl ?? undefined),
    openingVariation: known(headers.Variation),
    moves: pgn ? pgn.moves.join(" ") : "",
    timeControl: known(headers.TimeControl) ?? game.time_control ?? null,
    url: known(headers.Link) ?? game.url ?? null,
  };
}

/** Archive URLs end with /YYYY/MM. */
export function archiveMonth(archiveUrl: string): { year: number; month: number } | null {
  const match = archiveUrl.match(/\/(\d{4})\/(\d{2})\/?$/);
  return match ? { year: Number(match[1]), month: Number(match[2]) } : null;
}

export class ChesscomClient {
  private client: AxiosInstance;

  constructor(userAgent: string = ENV.userAgent) {
    this.client = axios.create({
      baseURL: CHESSCOM_API_BASE,
      timeout: 60_000,
      headers: {
        "User-Agent": userAgent,
      },
    });
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>(url, { signal });
      return response.data;
    } catch (error) {
      throw new SourceUnavailableError("chesscom", `GET ${url} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Monthly archive URLs, newest first. */
  async getArchives(username: string, signal?: AbortSignal): Promise<string[]> {
    const data = await this.getJson(`/player/${encodeURIComponent(username.toLowerCase())}/games/archives`, signal);
    return [...archivesSchema.parse(data).archives].reverse();
  }

  async getArchiveGames(archiveUrl: string, signal?: AbortSignal): Promise<unknown[]> {
    const data = await this.getJson(archiveUrl, signal);
    return archiveGamesSchema.parse(data).games;
  }
}

export const chesscomClient = new ChesscomClient();

/**
 * Games of a player, newest archive first. Within an archive games keep the
 * order the API returns them in.
 */
export async function* fetchChesscomGames(
  username: string,
  options: FetchGamesOptions & ArchiveFilter = {}
): AsyncGenerator<RawGameCandidate> {
  const archives = await chesscomClient.getArchives(username, options.signal);
  let yielded = 0;

  for (const archiveUrl of archives) {
    if (options.signal?.aborted) return;

    const period = archiveMonth(archiveUrl);
    if (options.year && period?.year !== options.year) continue;
    if (options.month && period?.month !== options.month) continue;

    const games = await chesscomClient.getArchiveGames(archiveUrl, options.signal);
    console.log(`[chesscom] ${archiveUrl}: ${games.length} games`);

    for (const data of games) {
      if (options.signal?.aborted) return;
      yield parseChesscomGame(data);
      yielded++;
      if (options.maxGames && yielded >= options.maxGames) return;
    }
  }
}

export const chesscomSource: GameSource = {
  platform: "chesscom",
  fetchGames: (username, options) => fetchChesscomGames(username, options),
};
