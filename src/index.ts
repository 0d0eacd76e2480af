#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { logError } from "./utils/logger.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logError(`Failed to run: ${String(error)}`);
    process.exit(1);
  });
