export { parseQueryStream, readQueryStream, templateName, SPLIT_TEMPLATES, START_MARKER } from "./stream.js";
export { QueryCollection, selectQueries } from "./collection.js";
export { sanitizeColumnNames } from "./columns.js";
export { executableStatement, splitStatements } from "./statements.js";
export { runPowerRun, appNameFor, type PowerRunOptions, type PowerRunResult } from "./power-run.js";
export {
  ClickHouseSession,
  createEngineSession,
  PostgresSession,
  TrinoSession,
  type EngineConnection,
  type EngineSession,
} from "./runners.js";
export { TimingLog, formatTimingCsv, writeTimingCsv } from "./timing.js";
export { BenchReport, writeSummary, prepareSummaryFolder } from "./report.js";
export { writeResult } from "./output.js";
export { setupTables, TPCDS_TABLES, type TableSource } from "./tables.js";
export { loadProperties, parseProperties, resolveConnection } from "./config.js";
export * from "./errors.js";
export type {
  ExecutionSummary,
  InputFormat,
  OutputFormat,
  QueryUnit,
  ResultSet,
  TimingRecord,
} from "./types.js";
export { formatDuration, calculateStats } from "./utils.js";
