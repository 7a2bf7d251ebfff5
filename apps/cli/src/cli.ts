import type { ConfigLoader } from "@gatewise/config";

import type { ParsedArgs } from "./args.js";
import { runCheck } from "./commands/check.js";
import { runCompress } from "./commands/compress.js";
import { runMerge } from "./commands/merge.js";
import { defaultConfigSources } from "./env.js";
import type { Output } from "./output.js";

/** Runs a parsed command and returns its exit code. */
export async function run(
  args: ParsedArgs,
  loader: ConfigLoader,
  output: Output,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const files = args.files.length > 0 ? args.files : defaultConfigSources(env);
  if (files.length === 0) {
    throw new Error("No config files given and GATEWISE_CONFIG is not set");
  }
  switch (args.command) {
    case "check":
      return runCheck(loader, files, output);
    case "merge":
      return runMerge(loader, files, args.options, output);
    case "compress":
      if (files.length > 1) {
        throw new Error("compress takes a single file, use merge --compress for several");
      }
      return runCompress(loader, files[0], args.options, output);
  }
}
