import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { defaultConfigSources, resolveEnv } from "./env.js";

describe("resolveEnv", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "gatewise-env-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("prefers the _FILE indirection", async () => {
    const file = path.join(tempDir, "config-list");
    await fs.writeFile(file, "from-file.json\n", "utf-8");
    expect(resolveEnv("GATEWISE_CONFIG", undefined, { GATEWISE_CONFIG: "direct.json", GATEWISE_CONFIG_FILE: file })).toBe(
      "from-file.json"
    );
  });

  it("falls back to the variable when the file is missing", () => {
    const env = { GATEWISE_CONFIG: "direct.json", GATEWISE_CONFIG_FILE: path.join(tempDir, "absent") };
    expect(resolveEnv("GATEWISE_CONFIG", undefined, env)).toBe("direct.json");
  });

  it("treats an empty variable as unset", () => {
    expect(resolveEnv("GATEWISE_CONFIG", "fallback.json", { GATEWISE_CONFIG: "" })).toBe("fallback.json");
  });
});

describe("defaultConfigSources", () => {
  it("splits GATEWISE_CONFIG on commas", () => {
    expect(defaultConfigSources({ GATEWISE_CONFIG: " base.json, ,local.yaml " })).toEqual(["base.json", "local.yaml"]);
  });

  it("is empty when nothing is configured", () => {
    expect(defaultConfigSources({})).toEqual([]);
  });
});
