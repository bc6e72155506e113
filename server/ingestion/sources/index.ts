import type { Platform } from "../../../drizzle/schema";
import type { GameSource } from "../types";
import { chesscomSource } from "./chesscom";
import { lichessSource } from "./lichess";

export const SOURCES: Record<Platform, GameSource> = {
  lichess: lichessSource,
  chesscom: chesscomSource,
};

export function getSource(platform: Platform): GameSource {
  return SOURCES[platform];
}
