#!/usr/bin/env node
import { createProgram } from "./src/cli/program.js";
import { getLogger } from "./src/logging/index.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    getLogger("cli").fatal(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
