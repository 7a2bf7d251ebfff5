import type { ConfigLoader } from "@gatewise/config";

import type { CommandOptions } from "../args.js";
import type { Output } from "../output.js";
import { runMerge } from "./merge.js";

export async function runCompress(
  loader: ConfigLoader,
  source: string,
  options: CommandOptions,
  output: Output
): Promise<number> {
  return runMerge(loader, [source], { ...options, compress: true }, output);
}
