import fsPromises from "node:fs/promises";
import path from "node:path";
import { decodeConfig } from "../codec/codec.js";
import { mergeRight } from "../engine/merge.js";
import { emptyConfig, type Config } from "../model/Config.js";
import { appLogger, normalizeError } from "../observability/logger.js";
import { toError } from "../utils/errorUtils.js";
import { err, ok, type Result } from "../utils/result.js";
import { detectFormat, parseConfigDocument, serializeConfig, type ConfigFormat, type SerializeOptions } from "./documents.js";
import { ConfigLoadError, ConfigWriteError } from "./errors.js";

/**
 * Source of configuration documents. Implementations can read from files,
 * memory, a remote store, etc. A failed load is returned, never thrown.
 */
export interface ConfigLoader {
  load(source: string): Promise<Result<Config, ConfigLoadError>>;
}

/**
 * Loads sources in order and overlays each one on the previous result.
 * Stops at the first source that fails to load.
 */
export async function loadAndMerge(
  loader: ConfigLoader,
  sources: readonly string[],
): Promise<Result<Config, ConfigLoadError>> {
  let merged = emptyConfig();
  for (const source of sources) {
    const loaded = await loader.load(source);
    if (!loaded.ok) {
      return loaded;
    }
    merged = mergeRight(merged, loaded.value);
  }
  return ok(merged);
}

export interface FileConfigLoaderOptions {
  /** Directory relative sources are resolved against (default: process.cwd()). */
  baseDirectory?: string;
}

/**
 * Reads `.json`, `.yml` and `.yaml` configuration files.
 */
export class FileConfigLoader implements ConfigLoader {
  private readonly baseDirectory: string;

  constructor(options: FileConfigLoaderOptions = {}) {
    this.baseDirectory = path.resolve(options.baseDirectory ?? process.cwd());
  }

  resolve(source: string): string {
    return path.resolve(this.baseDirectory, source);
  }

  async load(source: string): Promise<Result<Config, ConfigLoadError>> {
    const filePath = this.resolve(source);
    const format = detectFormat(filePath);
    if (!format) {
      const error = new ConfigLoadError(
        source,
        "Unsupported config file",
        new Error(`expected a .json, .yml or .yaml extension, got "${path.extname(filePath) || filePath}"`),
      );
      appLogger.warn({ source, err: normalizeError(error) }, "Rejected config file");
      return err(error);
    }

    let text: string;
    try {
      text = await fsPromises.readFile(filePath, "utf-8");
    } catch (error) {
      const loadError = new ConfigLoadError(source, "Failed to read config file", toError(error));
      appLogger.warn({ source, err: normalizeError(loadError) }, "Failed to read config file");
      return err(loadError);
    }

    const parsed = parseConfigDocument(text, format);
    if (!parsed.ok) {
      const loadError = new ConfigLoadError(source, `Failed to decode config file ${source}`, parsed.error);
      appLogger.warn({ source, issues: parsed.error.issues }, "Invalid config file");
      return err(loadError);
    }

    appLogger.debug({ source, format, types: Object.keys(parsed.value.graphQL.types).length }, "Loaded config file");
    return ok(parsed.value);
  }
}

/**
 * Loader over documents kept in memory, keyed by source name. Documents are
 * the parsed JSON form and are decoded on every load.
 */
export class InMemoryConfigLoader implements ConfigLoader {
  private readonly documents = new Map<string, unknown>();

  constructor(documents: Readonly<Record<string, unknown>> = {}) {
    for (const [source, document] of Object.entries(documents)) {
      this.documents.set(source, document);
    }
  }

  set(source: string, document: unknown): void {
    this.documents.set(source, document);
  }

  remove(source: string): boolean {
    return this.documents.delete(source);
  }

  async load(source: string): Promise<Result<Config, ConfigLoadError>> {
    if (!this.documents.has(source)) {
      return err(new ConfigLoadError(source, "Config source not found", new Error(`no document named "${source}"`)));
    }
    const decoded = decodeConfig(this.documents.get(source));
    if (!decoded.ok) {
      return err(new ConfigLoadError(source, `Failed to decode config ${source}`, decoded.error));
    }
    return ok(decoded.value);
  }
}

export type WriteConfigOptions = SerializeOptions & {
  /** Overrides the format implied by the file extension. */
  format?: ConfigFormat;
};

export async function writeConfigFile(
  filePath: string,
  config: Config,
  options: WriteConfigOptions = {},
): Promise<Result<string, ConfigWriteError>> {
  const target = path.resolve(filePath);
  const format = options.format ?? detectFormat(target);
  if (!format) {
    return err(
      new ConfigWriteError(filePath, "Unsupported config file", new Error("cannot infer format from file extension")),
    );
  }
  try {
    await fsPromises.mkdir(path.dirname(target), { recursive: true });
    await fsPromises.writeFile(target, serializeConfig(config, format, options), "utf-8");
  } catch (error) {
    const writeError = new ConfigWriteError(filePath, "Failed to write config file", toError(error));
    appLogger.error({ target, err: normalizeError(writeError) }, "Failed to write config file");
    return err(writeError);
  }
  appLogger.debug({ target, format }, "Wrote config file");
  return ok(target);
}
