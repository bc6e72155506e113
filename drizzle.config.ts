import "dotenv/config";
import os from "os";
import path from "path";
import { defineConfig } from "drizzle-kit";

const warehouseDir = process.env.WAREHOUSE_DIR?.trim() || path.join(os.homedir(), ".chess-warehouse", "warehouse");

console.log(`[Drizzle Config] Using warehouse: ${warehouseDir}`);

export default defineConfig({
  schema: "./drizzle/schema.ts",
  dialect: "postgresql",
  driver: "pglite",
  dbCredentials: {
    url: warehouseDir,
  },
});
