import type { ZodError } from "zod";

export type DecodeIssue = {
  /** Dotted location of the offending value, e.g. `graphQL.types.Query.user.steps[0].http.method`. */
  readonly path: string;
  readonly message: string;
};

export function formatPath(segments: ReadonlyArray<string | number>): string {
  let path = "";
  for (const segment of segments) {
    if (typeof segment === "number") {
      path += `[${segment}]`;
    } else {
      path += path.length > 0 ? `.${segment}` : segment;
    }
  }
  return path;
}

function describeIssue(issue: DecodeIssue): string {
  return issue.path.length > 0 ? `${issue.path}: ${issue.message}` : issue.message;
}

/** Raised (as a value) when a document does not match the configuration wire format. */
export class DecodeError extends Error {
  readonly issues: readonly DecodeIssue[];

  constructor(issues: readonly DecodeIssue[]) {
    const first = issues[0];
    const summary = issues.map(describeIssue).join("; ");
    super(first ? `Invalid configuration: ${summary}` : "Invalid configuration");
    this.name = "DecodeError";
    this.issues = issues;
  }

  /** Location of the first issue; empty for the document root. */
  get path(): string {
    return this.issues[0]?.path ?? "";
  }

  static fromZodError(error: ZodError, prefix: ReadonlyArray<string | number> = []): DecodeError {
    return new DecodeError(
      error.issues.map(issue => ({
        path: formatPath([...prefix, ...issue.path]),
        message: issue.message,
      })),
    );
  }

  static at(path: string, message: string): DecodeError {
    return new DecodeError([{ path, message }]);
  }
}
