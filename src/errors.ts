import type { ExecutionSummary } from "./types.js";

export type ErrorCode =
  | "MALFORMED_STREAM"
  | "MISSING_QUERY"
  | "CONFIGURATION"
  | "QUERY_EXECUTION";

/**
 * Base class for every error raised by the harness. `code` is stable and can be
 * matched on by callers.
 */
export class PowerRunError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PowerRunError";
    this.code = code;
  }
}

/** The query stream does not follow the marker/template layout */
export class MalformedStreamError extends PowerRunError {
  constructor(message: string) {
    super("MALFORMED_STREAM", message);
    this.name = "MalformedStreamError";
  }
}

export class MissingQueryError extends PowerRunError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(
      "MISSING_QUERY",
      `Queries not found in the query stream: ${missing.join(", ")}. ` +
        `Use the "_part1" and "_part2" suffixes for split queries, e.g. query14_part1.`
    );
    this.name = "MissingQueryError";
    this.missing = missing;
  }
}

export class ConfigurationError extends PowerRunError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

export class QueryExecutionError extends PowerRunError {
  readonly query: string;
  readonly summary: ExecutionSummary;

  constructor(query: string, summary: ExecutionSummary, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("QUERY_EXECUTION", `Query ${query} failed: ${reason}`, { cause });
    this.name = "QueryExecutionError";
    this.query = query;
    this.summary = summary;
  }
}

export function isPowerRunError(error: unknown): error is PowerRunError {
  return error instanceof PowerRunError;
}
