#!/usr/bin/env node

/**
 * chess-warehouse CLI: fetch, list, transform, pipeline and dashboard.
 */

import { buildProgram } from "./commands";

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
