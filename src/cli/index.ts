#!/usr/bin/env node
/**
 * commitfs CLI entry point. See main.ts for the command table.
 */

import { runCli } from "./main.js";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`Fatal: ${(e as Error).message}\n`);
    process.exit(2);
  },
);
