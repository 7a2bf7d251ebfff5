function coercePart(part: unknown): string {
  if (part === undefined || part === null) {
    return "";
  }
  if (typeof part === "string") {
    return part;
  }
  if (typeof part === "number" || typeof part === "boolean" || typeof part === "bigint") {
    return String(part);
  }
  if (part instanceof Error) {
    return part.message;
  }
  return String(part);
}

export function formatLine(parts: unknown[]): string {
  return parts
    .map(coercePart)
    .filter(segment => segment.length > 0)
    .join(" ");
}

/** Where commands write. The process streams in production, a buffer in tests. */
export interface Output {
  line(...parts: unknown[]): void;
  errorLine(...parts: unknown[]): void;
  /** Writes text as is, without a trailing newline. */
  raw(text: string): void;
}

export function printLine(...parts: unknown[]): void {
  const line = formatLine(parts);
  process.stdout.write(line.length > 0 ? `${line}\n` : "\n");
}

export function printErrorLine(...parts: unknown[]): void {
  const line = formatLine(parts);
  process.stderr.write(line.length > 0 ? `${line}\n` : "\n");
}

export const processOutput: Output = {
  line: printLine,
  errorLine: printErrorLine,
  raw: text => {
    process.stdout.write(text);
  }
};
