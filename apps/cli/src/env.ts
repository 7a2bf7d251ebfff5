import { readFileSync } from "node:fs";

function readFileValue(path: string): string | undefined {
  try {
    const content = readFileSync(path, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads `name` from the environment. `<name>_FILE`, when set to a readable
 * non-empty file, takes precedence over the variable itself.
 */
export function resolveEnv(
  name: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const filePath = env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = env[name];
  if (direct !== undefined && direct !== "") {
    return direct;
  }
  return fallback;
}

/** Config paths from `GATEWISE_CONFIG`, comma separated, in merge order. */
export function defaultConfigSources(env: NodeJS.ProcessEnv = process.env): string[] {
  const value = resolveEnv("GATEWISE_CONFIG", undefined, env);
  if (value === undefined) {
    return [];
  }
  return value
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}
