import { z } from "zod";
import { PLATFORMS, RESULT_CODES, type Platform } from "../../drizzle/schema";
import { MalformedRecordError } from "../_core/errors";
import { parseIsoDate } from "../warehouse/dimensions";
import type { RawGame } from "./types";

// Blank strings count as absent
const optionalText = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? null : value),
  z.string().trim().nullish().transform((value) => value ?? null)
);

const requiredText = z.string({ required_error: "is required" }).trim().min(1, "is required");

const rawGameSchema = z.object({
  sourcePlatform: z.enum(PLATFORMS),
  sourceGameId: optionalText,
  whiteUsername: requiredText,
  blackUsername: requiredText,
  date: optionalText.refine((value) => value === null || parseIsoDate(value) !== null, "is not a YYYY-MM-DD calendar date"),
  eventName: optionalText,
  eventSite: optionalText,
  eventRound: optionalText,
  resultCode: z.enum(RESULT_CODES, {
    required_error: "is required",
    invalid_type_error: "is required",
  }),
  eco: optionalText.transform((value) => value?.toUpperCase() ?? null),
  openingName: optionalText,
  openingVariation: optionalText,
  moves: z.string().nullish().transform((value) => value?.trim().replace(/\s+/g, " ") ?? ""),
  timeControl: optionalText,
  url: optionalText,
});

/**
 * Source-native game id from a game URL.
 * lichess.org/{id}[/white|/black] gives "{id}"; chess.com/game/{live|daily}/{id}
 * gives "{live|daily}/{id}", since live and daily games are numbered apart.
 */
export function extractSourceGameId(platform: Platform, url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  const segments = parsed.pathname.split("/").filter(Boolean);
  if (segments.length === 0) return null;

  if (platform === "lichess") {
    return segments[0];
  }
  return segments.slice(-2).join("/");
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "record"} ${issue.message}`);
}

/**
 * Validate an adapter record and settle its natural key.
 * @throws MalformedRecordError when a required field is missing or invalid
 */
export function parseRawGame(candidate: unknown): RawGame {
  const parsed = rawGameSchema.safeParse(candidate);
  if (!parsed.success) {
    const ref = typeof candidate === "object" && candidate !== null && "url" in candidate && typeof candidate.url === "string"
      ? candidate.url
      : null;
    throw new MalformedRecordError(describeIssues(parsed.error), ref);
  }

  const game = parsed.data;
  const sourceGameId = game.sourceGameId ?? (game.url ? extractSourceGameId(game.sourcePlatform, game.url) : null);
  if (!sourceGameId) {
    throw new MalformedRecordError(["sourceGameId is required (no id and no usable url)"], game.url);
  }

  return { ...game, sourceGameId };
}
