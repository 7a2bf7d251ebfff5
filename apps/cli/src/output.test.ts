import { describe, expect, it } from "vitest";

import { formatLine } from "./output.js";

describe("formatLine", () => {
  it("joins non-empty parts with spaces", () => {
    expect(formatLine(["ok", undefined, "a.json", null, ""])).toBe("ok a.json");
  });

  it("prints errors by their message", () => {
    expect(formatLine(["Error:", new Error("boom"), 3, false])).toBe("Error: boom 3 false");
  });
});
