import type { EngineSession } from "./runners.js";
import type { TimingLog } from "./timing.js";
import type { InputFormat } from "./types.js";
import { formatDuration, systemClock, type Clock, type Logger } from "./utils.js";

/** TPC-DS tables, each stored under `<inputPrefix>/<table>` */
export const TPCDS_TABLES: readonly string[] = [
  "call_center",
  "catalog_page",
  "catalog_returns",
  "catalog_sales",
  "customer",
  "customer_address",
  "customer_demographics",
  "date_dim",
  "household_demographics",
  "income_band",
  "inventory",
  "item",
  "promotion",
  "reason",
  "ship_mode",
  "store",
  "store_returns",
  "store_sales",
  "time_dim",
  "warehouse",
  "web_page",
  "web_returns",
  "web_sales",
  "web_site",
];

export interface TableSource {
  inputPrefix: string;
  inputFormat: InputFormat;
  /** Tables already live in a metastore schema named by `inputPrefix` */
  hive: boolean;
  /** Delta tables are registered by location instead of read from a warehouse */
  deltaUnmanaged: boolean;
}

/**
 * How tables become queryable:
 * - `files`: a view per table over the files at its location
 * - `delta`: unmanaged Delta tables registered by location
 * - `catalog`: tables are already known to the engine under `inputPrefix`
 */
export type SetupMode = "files" | "delta" | "catalog";

export function setupModeOf(source: TableSource): SetupMode {
  if (source.hive || source.inputFormat === "iceberg") return "catalog";
  if (source.inputFormat === "delta") return source.deltaUnmanaged ? "delta" : "catalog";
  return "files";
}

export interface SetupOptions {
  tables?: readonly string[];
  clock?: Clock;
  logger?: Logger;
}

/**
 * Make the benchmark tables queryable in the session. Registration records one
 * timing entry per table; catalog mode only switches the namespace.
 */
export async function setupTables(
  session: EngineSession,
  source: TableSource,
  timings: TimingLog,
  options: SetupOptions = {}
): Promise<void> {
  const { tables = TPCDS_TABLES, clock = systemClock, logger = console } = options;
  const mode = setupModeOf(source);

  if (mode === "catalog") {
    logger.log(`Using tables from namespace ${source.inputPrefix}`);
    await session.useNamespace(source.inputPrefix);
    return;
  }

  const labelPrefix = mode === "delta" ? "Register" : "CreateTempView";
  for (const table of tables) {
    const start = clock();
    await session.registerTable(table, `${source.inputPrefix}/${table}`, source.inputFormat);
    const elapsed = clock() - start;

    logger.log(`[${table}] ${labelPrefix} took ${formatDuration(elapsed)}`);
    timings.record(`${labelPrefix} ${table}`, elapsed);
  }
}
