export class ConfigLoadError extends Error {
  readonly source: string;
  declare readonly cause: Error;

  constructor(source: string, message: string, cause: Error) {
    super(`${message}: ${cause.message}`, { cause });
    this.name = "ConfigLoadError";
    this.source = source;
  }
}

export class ConfigWriteError extends Error {
  readonly target: string;
  declare readonly cause: Error;

  constructor(target: string, message: string, cause: Error) {
    super(`${message}: ${cause.message}`, { cause });
    this.name = "ConfigWriteError";
    this.target = target;
  }
}
