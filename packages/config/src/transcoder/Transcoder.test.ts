import { describe, expect, it, vi } from "vitest";
import { createConfig, type Config } from "../model/Config.js";
import { err, ok } from "../utils/result.js";
import { toBlueprint, TranscodeError, type Transcoder, type TranscodeOptions } from "./Transcoder.js";

vi.mock("../observability/logger.js", () => ({
  appLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
  normalizeError: (e: Error) => ({ message: e.message }),
}));

type Blueprint = { typeCount: number; steps: boolean };

class CountingTranscoder implements Transcoder<Blueprint> {
  readonly calls: Array<Required<TranscodeOptions>> = [];

  toBlueprint(config: Config, options: Required<TranscodeOptions>) {
    this.calls.push(options);
    return ok({ typeCount: Object.keys(config.graphQL.types).length, steps: options.encodeSteps });
  }
}

describe("toBlueprint", () => {
  const config = createConfig({ version: 1 });

  it("returns the transcoder's blueprint", () => {
    const transcoder = new CountingTranscoder();
    expect(toBlueprint(config, transcoder, { encodeSteps: true })).toEqual({
      ok: true,
      value: { typeCount: 0, steps: true },
    });
  });

  it("does not encode steps unless asked to", () => {
    const transcoder = new CountingTranscoder();
    toBlueprint(config, transcoder);
    expect(transcoder.calls).toEqual([{ encodeSteps: false }]);
  });

  it("passes failed results through", () => {
    const failure = new TranscodeError("Unknown root type Query");
    const transcoder: Transcoder<Blueprint> = { toBlueprint: () => err(failure) };

    const result = toBlueprint(config, transcoder);

    expect(result).toEqual({ ok: false, error: failure });
  });

  it("reports a throwing transcoder as a failed result", () => {
    const transcoder: Transcoder<Blueprint> = {
      toBlueprint: () => {
        throw new Error("step table overflow");
      },
    };

    const result = toBlueprint(config, transcoder);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TranscodeError);
      expect(result.error.message).toBe("Transcoder failed: step table overflow");
      expect(result.error.cause?.message).toBe("step table overflow");
    }
  });

  it("wraps thrown non-errors", () => {
    const transcoder: Transcoder<Blueprint> = {
      toBlueprint: () => {
        throw "boom";
      },
    };
    const result = toBlueprint(config, transcoder);
    expect(!result.ok && result.error.message).toBe("Transcoder failed: boom");
  });
});
