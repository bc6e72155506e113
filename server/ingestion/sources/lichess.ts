import axios, { type AxiosInstance } from "axios";
import { createInterface } from "readline";
import type { Readable } from "stream";
import { z } from "zod";
import { ENV } from "../../_core/env";
import { errorMessage, SourceUnavailableError } from "../../_core/errors";
import { epochToIsoDate } from "../utils/dates";
import type { FetchGamesOptions, GameSource, RawGameCandidate } from "../types";

const LICHESS_API_BASE = "https://lichess.org/api";

// Statuses of games that have no result yet
const UNFINISHED_STATUSES = new Set(["created", "started"]);

// Off-shape fields become absent; parseRawGame() decides whether the record is usable
const text = z.string().optional().catch(undefined);
const num = z.number().optional().catch(undefined);

const lichessPlayerSchema = z
  .object({
    user: z.object({ name: text }).optional().catch(undefined),
    aiLevel: num,
  })
  .optional()
  .catch(undefined);

const lichessGameSchema = z
  .object({
    id: text,
    perf: text,
    status: text,
    createdAt: num,
    winner: text,
    players: z.object({ white: lichessPlayerSchema, black: lichessPlayerSchema }).optional().catch(undefined),
    opening: z.object({ eco: text, name: text }).optional().catch(undefined),
    clock: z.object({ initial: num, increment: num }).optional().catch(undefined),
    moves: text,
  })
  .catch({});

type LichessPlayer = z.infer<typeof lichessPlayerSchema>;

function playerName(player: LichessPlayer): string {
  if (player?.user?.name) return player.user.name;
  if (player?.aiLevel !== undefined) return `Stockfish level ${player.aiLevel}`;
  return "Anonymous";
}

function resultCode(winner: string | undefined, status: string | undefined): string {
  if (winner === "white") return "1-0";
  if (winner === "black") return "0-1";
  if (status && UNFINISHED_STATUSES.has(status)) return "*";
  return "1/2-1/2";
}

/** "Sicilian Defense: Najdorf Variation" -> name and variation */
export function splitOpeningName(full: string | undefined): { name: string | null; variation: string | null } {
  if (!full) return { name: null, variation: null };
  const separator = full.indexOf(": ");
  if (separator === -1) return { name: full, variation: null };
  return { name: full.slice(0, separator), variation: full.slice(separator + 2) };
}

/**
 * Map one game of the Lichess export API to a raw game.
 */
export function parseLichessGame(data: unknown): RawGameCandidate {
  const game = lichessGameSchema.parse(data);
  const opening = splitOpeningName(game.opening?.name);
  const clock = game.clock;

  return {
    sourcePlatform: "lichess",
    sourceGameId: game.id ?? null,
    whiteUsername: playerName(game.players?.white),
    blackUsername: playerName(game.players?.black),
    date: epochToIsoDate(game.createdAt),
    eventName: game.perf ?? null,
    eventSite: "lichess.org",
    eventRound: null,
    resultCode: resultCode(game.winner, game.status),
    eco: game.opening?.eco ?? null,
    openingName: opening.name,
    openingVariation: opening.variation,
    moves: game.moves ?? "",
    timeControl: clock?.initial !== undefined && clock.increment !== undefined
      ? `${clock.initial}+${clock.increment}`
      : null,
    url: game.id ? `https://lichess.org/${game.id}` : null,
  };
}

/**
 * Parsed objects of a newline-delimited JSON stream. Blank lines are ignored
 * and a line that is not JSON is logged and skipped.
 */
export async function* readNdjson(stream: Readable, signal?: AbortSignal): AsyncGenerator<unknown> {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      if (signal?.aborted) return;
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        console.warn(`[lichess] Skipping unparseable line: ${errorMessage(error)}`);
        continue;
      }
      yield parsed;
    }
  } finally {
    lines.close();
    stream.destroy();
  }
}

export class LichessClient {
  private client: AxiosInstance;

  constructor(userAgent: string = ENV.userAgent) {
    this.client = axios.create({
      baseURL: LICHESS_API_BASE,
      timeout: 60_000,
      headers: {
        "User-Agent": userAgent,
      },
    });
  }

  async *exportUserGames(username: string, options: FetchGamesOptions = {}): AsyncGenerator<unknown> {
    const params: Record<string, string> = { opening: "true" };
    if (options.maxGames) params.max = String(options.maxGames);

    let stream: Readable;
    try {
      const response = await this.client.get<Readable>(`/games/user/${encodeURIComponent(username)}`, {
        params,
        headers: { Accept: "application/x-ndjson" },
        responseType: "stream",
        signal: options.signal,
      });
      stream = response.data;
    } catch (error) {
      throw new SourceUnavailableError("lichess", `cannot export games of ${username}: ${errorMessage(error)}`, { cause: error });
    }

    yield* readNdjson(stream, options.signal);
  }
}

export const lichessClient = new LichessClient();

export const lichessSource: GameSource = {
  platform: "lichess",
  async *fetchGames(username, options = {}) {
    let yielded = 0;
    for await (const data of lichessClient.exportUserGames(username, options)) {
      if (options.signal?.aborted) return;
      yield parseLichessGame(data);
      yielded++;
      if (options.maxGames && yielded >= options.maxGames) return;
    }
  },
};
