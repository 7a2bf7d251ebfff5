#!/usr/bin/env node
import { FileConfigLoader } from "@gatewise/config";

import { parseArgs } from "./args.js";
import { run } from "./cli.js";
import { logger } from "./logger.js";
import { printErrorLine, processOutput } from "./output.js";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  process.exitCode = await run(args, new FileConfigLoader(), processOutput);
}

main().catch(error => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error({ err }, "Command failed");
  printErrorLine("Error:", err.message);
  process.exit(1);
});
