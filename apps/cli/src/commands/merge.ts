import {
  loadAndMerge,
  serializeConfig,
  writeConfigFile,
  type ConfigLoader
} from "@gatewise/config";

import type { CommandOptions } from "../args.js";
import { logger } from "../logger.js";
import type { Output } from "../output.js";

/**
 * Overlays `sources` in order and prints the result, or writes it to
 * `options.out`. Load and write failures are thrown.
 */
export async function runMerge(
  loader: ConfigLoader,
  sources: readonly string[],
  options: CommandOptions,
  output: Output
): Promise<number> {
  const merged = await loadAndMerge(loader, sources);
  if (!merged.ok) {
    throw merged.error;
  }
  const serializeOptions = { compress: options.compress, sortKeys: options.sortKeys };

  if (options.out !== undefined) {
    const written = await writeConfigFile(options.out, merged.value, {
      ...serializeOptions,
      ...(options.format !== undefined && { format: options.format })
    });
    if (!written.ok) {
      throw written.error;
    }
    logger.info({ sources, target: written.value, compress: options.compress }, "Wrote merged config");
    output.line("Wrote", written.value);
    return 0;
  }

  output.raw(serializeConfig(merged.value, options.format ?? "json", serializeOptions));
  return 0;
}
