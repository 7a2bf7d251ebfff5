import path from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { decodeConfig, encodeConfig, stringifyConfig, type EncodeOptions } from "../codec/codec.js";
import { DecodeError } from "../codec/DecodeError.js";
import { compressConfig } from "../engine/compress.js";
import type { Config } from "../model/Config.js";
import { err, type Result } from "../utils/result.js";

export type ConfigFormat = "json" | "yaml";

export type SerializeOptions = EncodeOptions & {
  /** Run the compression pass before encoding. */
  compress?: boolean;
};

const FORMAT_BY_EXTENSION: Record<string, ConfigFormat> = {
  ".json": "json",
  ".yml": "yaml",
  ".yaml": "yaml",
};

export function detectFormat(filePath: string): ConfigFormat | undefined {
  return FORMAT_BY_EXTENSION[path.extname(filePath).toLowerCase()];
}

export function asConfigFormat(value: string): ConfigFormat | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "json") {
    return "json";
  }
  if (normalized === "yaml" || normalized === "yml") {
    return "yaml";
  }
  return undefined;
}

/** Parses raw text in the given format and decodes it as a Config. */
export function parseConfigDocument(text: string, format: ConfigFormat): Result<Config, DecodeError> {
  let document: unknown;
  try {
    document = format === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(DecodeError.at("", `Invalid ${format === "json" ? "JSON" : "YAML"}: ${reason}`));
  }
  return decodeConfig(document);
}

export function serializeConfig(config: Config, format: ConfigFormat, options: SerializeOptions = {}): string {
  const effective = options.compress ? compressConfig(config) : config;
  if (format === "yaml") {
    return stringifyYaml(encodeConfig(effective, { sortKeys: options.sortKeys }));
  }
  return stringifyConfig(effective, { sortKeys: options.sortKeys });
}
