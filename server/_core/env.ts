import "dotenv/config";
import os from "os";
import path from "path";

export const MEMORY_STORE = "memory://";

function readInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export const ENV = {
  warehouseDir: readText(process.env.WAREHOUSE_DIR) ?? path.join(os.homedir(), ".chess-warehouse", "warehouse"),
  lichessUsername: readText(process.env.LICHESS_USERNAME),
  chesscomUsername: readText(process.env.CHESSCOM_USERNAME),
  pipelineCron: readText(process.env.PIPELINE_CRON) ?? "0 6 * * *",
  dashboardPort: readInt(process.env.DASHBOARD_PORT, 8050),
  userAgent: readText(process.env.HTTP_USER_AGENT) ?? "chess-warehouse/0.1.0",
};
