import { describe, expect, it } from "vitest";
import { AbsoluteUrl } from "./AbsoluteUrl.js";

describe("AbsoluteUrl", () => {
  it("parses an absolute URL", () => {
    const parsed = AbsoluteUrl.parse("https://api.example.com:8443/v1?debug=1");
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.value.href).toBe("https://api.example.com:8443/v1?debug=1");
      expect(parsed.value.host).toBe("api.example.com:8443");
      expect(parsed.value.protocol).toBe("https:");
    }
  });

  it("rejects relative and malformed input with the raw string in the message", () => {
    expect(AbsoluteUrl.parse("/relative/path")).toEqual({ ok: false, error: "Malformed url: /relative/path" });
    expect(AbsoluteUrl.parse("not a url")).toEqual({ ok: false, error: "Malformed url: not a url" });
  });

  it("formats to a string that parses back to an equal value", () => {
    const first = AbsoluteUrl.parse("HTTP://Example.COM");
    expect(first.ok).toBe(true);
    if (first.ok) {
      expect(first.value.toString()).toBe("http://example.com/");
      const second = AbsoluteUrl.parse(first.value.toString());
      expect(second.ok && second.value.equals(first.value)).toBe(true);
    }
  });

  it("serializes to its href", () => {
    const parsed = AbsoluteUrl.parse("http://localhost:4000/graphql");
    expect(parsed.ok && JSON.stringify({ url: parsed.value })).toBe('{"url":"http://localhost:4000/graphql"}');
  });
});
