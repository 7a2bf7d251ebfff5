import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { InMemoryConfigLoader } from "@gatewise/config";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { parseArgs, type ParsedArgs } from "./args.js";
import { run } from "./cli.js";
import { formatLine, type Output } from "./output.js";

vi.mock("./logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

class BufferedOutput implements Output {
  readonly lines: string[] = [];
  readonly errors: string[] = [];
  text = "";

  line(...parts: unknown[]): void {
    this.lines.push(formatLine(parts));
  }

  errorLine(...parts: unknown[]): void {
    this.errors.push(formatLine(parts));
  }

  raw(text: string): void {
    this.text += text;
  }
}

function args(argv: string[]): ParsedArgs {
  return parseArgs(argv);
}

const documents = {
  base: {
    version: 1,
    graphQL: {
      schema: { query: "Query" },
      types: {
        Query: { a: { type: "String", isList: false, steps: [{ http: { path: "/a", method: "GET" } }] } }
      }
    }
  },
  overlay: { version: 2 },
  bad: { version: "x" }
};

describe("check", () => {
  it("reports each source and fails when any is invalid", async () => {
    const output = new BufferedOutput();

    const code = await run(args(["check", "base", "bad"]), new InMemoryConfigLoader(documents), output);

    expect(code).toBe(1);
    expect(output.lines).toEqual(["ok base"]);
    expect(output.errors).toEqual([
      "error bad: Failed to decode config bad: Invalid configuration: version: Expected number, received string"
    ]);
  });

  it("reads sources from GATEWISE_CONFIG when none are given", async () => {
    const output = new BufferedOutput();

    const code = await run(args(["check"]), new InMemoryConfigLoader(documents), output, {
      GATEWISE_CONFIG: "base,overlay"
    });

    expect(code).toBe(0);
    expect(output.lines).toEqual(["ok base", "ok overlay"]);
  });

  it("fails without any source", async () => {
    await expect(run(args(["check"]), new InMemoryConfigLoader(), new BufferedOutput(), {})).rejects.toThrow(
      "No config files given and GATEWISE_CONFIG is not set"
    );
  });
});

describe("merge", () => {
  it("prints the merged config as JSON", async () => {
    const output = new BufferedOutput();

    const code = await run(args(["merge", "base", "overlay"]), new InMemoryConfigLoader(documents), output);

    expect(code).toBe(0);
    expect(output.text.endsWith("}\n")).toBe(true);
    expect(JSON.parse(output.text)).toEqual({
      version: 2,
      server: {},
      graphQL: {
        schema: { query: "Query" },
        types: { Query: { a: { type: "String", steps: [{ http: { path: "/a", method: "GET" } }] } } }
      }
    });
  });

  it("prints YAML when asked to", async () => {
    const output = new BufferedOutput();

    await run(args(["merge", "overlay", "--format", "yaml"]), new InMemoryConfigLoader(documents), output);

    expect(output.text).toBe("version: 2\nserver: {}\ngraphQL:\n  schema: {}\n  types: {}\n");
  });

  it("throws the first load failure", async () => {
    await expect(
      run(args(["merge", "base", "missing"]), new InMemoryConfigLoader(documents), new BufferedOutput())
    ).rejects.toThrow('Config source not found: no document named "missing"');
  });

  describe("with --out", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "gatewise-cli-"));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("writes the result to the file and names it", async () => {
      const target = path.join(tempDir, "merged.json");
      const output = new BufferedOutput();

      await run(args(["merge", "base", "overlay", "--compress", "--out", target]), new InMemoryConfigLoader(documents), output);

      expect(output.lines).toEqual([`Wrote ${target}`]);
      expect(output.text).toBe("");
      expect(JSON.parse(await fs.readFile(target, "utf-8"))).toEqual({
        version: 2,
        server: {},
        graphQL: { schema: { query: "Query" }, types: { Query: { a: { type: "String", steps: [{ http: { path: "/a" } }] } } } }
      });
    });
  });
});

describe("compress", () => {
  it("prints the compressed config", async () => {
    const output = new BufferedOutput();

    await run(args(["compress", "base"]), new InMemoryConfigLoader(documents), output);

    expect(JSON.parse(output.text).graphQL.types.Query.a).toEqual({ type: "String", steps: [{ http: { path: "/a" } }] });
  });

  it("refuses several sources from GATEWISE_CONFIG", async () => {
    await expect(
      run(args(["compress"]), new InMemoryConfigLoader(documents), new BufferedOutput(), {
        GATEWISE_CONFIG: "base,overlay"
      })
    ).rejects.toThrow("compress takes a single file, use merge --compress for several");
  });
});
