/**
 * Read-only JSON API over the warehouse: the dashboard's data source.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { PLATFORMS } from "../../drizzle/schema";
import type { WarehouseStore } from "../db";
import { createApiResponse, normalizeGame } from "../_core/normalizers";
import { errorMessage } from "../_core/errors";
import {
  getMonthlyWinRate,
  getOpeningPerformance,
  getOpeningStats,
  getPlayerStats,
  getTimeControlBreakdown,
  getWarehouseSummary,
  listGames,
} from "../warehouse/queries";

const RECENT_GAMES = 50;

function countParam(name: string, max: number) {
  const message = `${name} must be an integer between 1 and ${max}`;
  return z.coerce.number({ invalid_type_error: message }).int(message).min(1, message).max(max, message).optional();
}

const filterSchema = z.object({
  player: z.string().trim().min(1).optional(),
  platform: z.enum(PLATFORMS, {
    errorMap: () => ({ message: `platform must be one of ${PLATFORMS.join(", ")}` }),
  }).optional(),
  limit: countParam("limit", 500),
  minGames: countParam("minGames", 100_000),
});

function queryText(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}

type Filter = z.infer<typeof filterSchema>;

function parseFilter(req: Request, res: Response): Filter | null {
  const parsed = filterSchema.safeParse({
    player: queryText(req, "player"),
    platform: queryText(req, "platform"),
    limit: queryText(req, "limit"),
    minGames: queryText(req, "minGames"),
  });
  if (!parsed.success) {
    res.status(400).json(createApiResponse(req.path, {}, [], parsed.error.issues.map((issue) => issue.message)));
    return null;
  }
  return parsed.data;
}

function parameters(filter: Filter): Record<string, string> {
  const result: Record<string, string> = {};
  if (filter.player) result.player = filter.player;
  if (filter.platform) result.platform = filter.platform;
  if (filter.limit !== undefined) result.limit = String(filter.limit);
  if (filter.minGames !== undefined) result.minGames = String(filter.minGames);
  return result;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createDashboardApp(store: WarehouseStore) {
  const app = express();
  app.disable("x-powered-by");

  app.get("/api/summary", route(async (req, res) => {
    res.json(createApiResponse(req.path, {}, await getWarehouseSummary(store.db)));
  }));

  // Most recent games first
  app.get("/api/games", route(async (req, res) => {
    const filter = parseFilter(req, res);
    if (!filter) return;
    const games = await listGames(store.db, {
      platform: filter.platform,
      newestFirst: true,
      limit: filter.limit ?? RECENT_GAMES,
    });
    res.json(createApiResponse(req.path, parameters(filter), games.map(normalizeGame)));
  }));

  app.get("/api/monthly", route(async (req, res) => {
    const filter = parseFilter(req, res);
    if (!filter) return;
    res.json(createApiResponse(req.path, parameters(filter), await getMonthlyWinRate(store.db, filter)));
  }));

  app.get("/api/time-controls", route(async (req, res) => {
    const filter = parseFilter(req, res);
    if (!filter) return;
    res.json(createApiResponse(req.path, parameters(filter), await getTimeControlBreakdown(store.db, filter)));
  }));

  app.get("/api/openings", route(async (req, res) => {
    const filter = parseFilter(req, res);
    if (!filter) return;
    res.json(createApiResponse(req.path, parameters(filter), await getOpeningPerformance(store.db, filter)));
  }));

  app.get("/api/players", route(async (req, res) => {
    const filter = parseFilter(req, res);
    if (!filter) return;
    res.json(createApiResponse(req.path, parameters(filter), await getPlayerStats(store.db, filter)));
  }));

  app.get("/api/opening-stats", route(async (req, res) => {
    const filter = parseFilter(req, res);
    if (!filter) return;
    res.json(createApiResponse(req.path, parameters(filter), await getOpeningStats(store.db, filter)));
  }));

  app.use((req: Request, res: Response) => {
    res.status(404).json(createApiResponse(req.path, {}, [], [`No route for ${req.method} ${req.path}`]));
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`[dashboard] ${req.method} ${req.path} failed:`, error);
    res.status(500).json(createApiResponse(req.path, {}, [], [errorMessage(error)]));
  });

  return app;
}

export function startDashboard(store: WarehouseStore, port: number): Promise<Server> {
  const app = createDashboardApp(store);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`[dashboard] Listening on http://localhost:${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
