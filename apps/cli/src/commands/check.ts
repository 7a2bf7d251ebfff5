import type { ConfigLoader } from "@gatewise/config";

import { logger } from "../logger.js";
import type { Output } from "../output.js";

/**
 * Loads every source on its own and reports each one. Returns the exit code:
 * 1 when any source fails.
 */
export async function runCheck(loader: ConfigLoader, sources: readonly string[], output: Output): Promise<number> {
  let failures = 0;
  for (const source of sources) {
    const loaded = await loader.load(source);
    if (loaded.ok) {
      output.line("ok", source);
    } else {
      failures += 1;
      output.errorLine(`error ${source}:`, loaded.error.message);
    }
  }
  logger.debug({ sources: sources.length, failures }, "Checked config files");
  return failures > 0 ? 1 : 0;
}
