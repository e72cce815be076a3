import type { EnvironmentInfo } from "./utils.js";

export interface QueryUnit {
  name: string;
  /** Query block text, starting with the `-- start` marker line */
  body: string;
}

export interface TimingRecord {
  runId: string;
  label: string;
  millis: number;
}

export interface ResultSet {
  columns: string[];
  rows: unknown[][];
  /** Column types as the engine names them (`bigint`, `Nullable(Decimal(7, 2))`) */
  types?: string[];
}

export type InputFormat = "parquet" | "orc" | "avro" | "csv" | "json" | "iceberg" | "delta";

export type OutputFormat = "parquet" | "csv" | "json";

export type EngineName = "postgres" | "clickhouse" | "trino";

export type QueryStatus = "Completed" | "Failed";

/**
 * Structured report of one query execution, persisted as JSON when a summary
 * folder is configured.
 */
export interface ExecutionSummary {
  query: string;
  engine: EngineName;
  applicationId: string;
  /** Epoch millis at which the query was started */
  startTime: number;
  queryStatus: QueryStatus[];
  /** Wall-clock millis per attempt; the power run records the first entry */
  queryTimes: number[];
  exceptions: string[];
  env: EnvironmentInfo;
  properties: Record<string, string>;
}
