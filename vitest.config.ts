import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/**/*.test.ts"],
    // PGlite boots a WASM Postgres per store
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
