import type { Config } from "../model/Config.js";
import { appLogger, normalizeError } from "../observability/logger.js";
import { toError } from "../utils/errorUtils.js";
import { err, type Result } from "../utils/result.js";

export type TranscodeOptions = {
  /** Ask the transcoder to embed the step pipelines in the blueprint. */
  encodeSteps?: boolean;
};

export class TranscodeError extends Error {
  declare readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(cause ? `${message}: ${cause.message}` : message, cause ? { cause } : undefined);
    this.name = "TranscodeError";
  }
}

/**
 * Turns a Config into an executable blueprint. Implemented by the runtime
 * that executes steps; `B` is its blueprint type.
 */
export interface Transcoder<B> {
  toBlueprint(config: Config, options: Required<TranscodeOptions>): Result<B, TranscodeError>;
}

/**
 * Hands `config` to `transcoder`. A transcoder that throws is reported as a
 * failed result like any other transcoding failure.
 */
export function toBlueprint<B>(
  config: Config,
  transcoder: Transcoder<B>,
  options: TranscodeOptions = {},
): Result<B, TranscodeError> {
  const encodeSteps = options.encodeSteps ?? false;
  let result: Result<B, TranscodeError>;
  try {
    result = transcoder.toBlueprint(config, { encodeSteps });
  } catch (error) {
    result = err(new TranscodeError("Transcoder failed", toError(error)));
  }
  if (!result.ok) {
    appLogger.error(
      { version: config.version, encodeSteps, err: normalizeError(result.error) },
      "Failed to build blueprint from config",
    );
  }
  return result;
}
