import { err, ok, type Result } from "../utils/result.js";

/**
 * An absolute URL held in its normalized `href` form.
 *
 * Parsing goes through the WHATWG `URL` parser, so `parse(url.toString())`
 * always yields an equal value.
 */
export class AbsoluteUrl {
  private constructor(readonly href: string) {}

  static parse(raw: string): Result<AbsoluteUrl, string> {
    let parsed: URL;
    try {
      parsed = new URL(raw);
    } catch {
      return err(`Malformed url: ${raw}`);
    }
    return ok(new AbsoluteUrl(parsed.href));
  }

  get protocol(): string {
    return new URL(this.href).protocol;
  }

  get host(): string {
    return new URL(this.href).host;
  }

  equals(other: AbsoluteUrl): boolean {
    return this.href === other.href;
  }

  toString(): string {
    return this.href;
  }

  toJSON(): string {
    return this.href;
  }
}
