import { createLogger, logLevelFromEnv, type ConfigLogger } from "@gatewise/config";

export type CliLogger = ConfigLogger;

// stdout carries the merged document, keep routine log lines off by default
export const logger: CliLogger = createLogger({
  level: logLevelFromEnv() ?? "warn",
  serviceName: "gatewise-cli",
  bindings: { subsystem: "cli" }
});
