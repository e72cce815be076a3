import { join } from "node:path";
import { selectQueries, type QueryCollection } from "./collection.js";
import { sanitizeColumnNames } from "./columns.js";
import { ConfigurationError, QueryExecutionError } from "./errors.js";
import { writeResult } from "./output.js";
import { BenchReport, prepareSummaryFolder, summaryPrefix, writeSummary } from "./report.js";
import type { EngineSession } from "./runners.js";
import { executableStatement } from "./statements.js";
import { setupModeOf, setupTables, type TableSource } from "./tables.js";
import {
  POWER_ELAPSED_LABEL,
  POWER_END_LABEL,
  POWER_START_LABEL,
  TimingLog,
  TOTAL_ELAPSED_LABEL,
  writeTimingCsv,
} from "./timing.js";
import type { ExecutionSummary, OutputFormat, TimingRecord } from "./types.js";
import { calculateStats, formatDuration, systemClock, type Clock, type Logger } from "./utils.js";

export interface QueryOutput {
  /** Results of query `<name>` go to `<prefix>/<name>` */
  prefix: string;
  format: OutputFormat;
  /** Parquet decimal columns as exact strings (default) or as doubles */
  useDecimal?: boolean;
}

export interface PowerRunOptions {
  /** Builds the (unconnected) engine session, given the application name */
  createSession: (appName: string) => EngineSession;
  source: TableSource;
  timeLogPath: string;
  /** Second copy of the timing log, written by the engine itself */
  extraTimeLogPath?: string;
  /** Run only these queries, in stream order */
  subQueries?: readonly string[];
  /** Persist results; without it results are read and dropped */
  output?: QueryOutput;
  jsonSummaryFolder?: string;
  /** Names the summary files; its properties are recorded in every summary */
  propertyFile?: string;
  properties?: Record<string, string>;
  /** Leave the session open and hand it back */
  keepSession?: boolean;
  tables?: readonly string[];
  clock?: Clock;
  logger?: Logger;
}

export interface PowerRunResult {
  applicationId: string;
  records: TimingRecord[];
  summaries: ExecutionSummary[];
  /** The open session, when `keepSession` was set */
  session?: EngineSession;
}

export function appNameFor(queries: QueryCollection): string {
  const [only] = queries.names();
  return queries.size === 1 && only !== undefined ? `Query ${only}` : "Power Run";
}

/**
 * Run a query stream in order against one engine session and record how long
 * each step took. The timing log is written once, after the last query; a
 * failing query aborts the run without writing it.
 */
export async function runPowerRun(
  collection: QueryCollection,
  options: PowerRunOptions
): Promise<PowerRunResult> {
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? console;
  const totalStart = clock();

  const queries = selectQueries(collection, options.subQueries ?? []);
  const session = options.createSession(appNameFor(queries));
  validateSession(session, options);
  if (options.jsonSummaryFolder) {
    await prepareSummaryFolder(options.jsonSummaryFolder);
  }

  await session.connect();
  logger.log(`Connected to ${session.name} (${session.applicationId})`);

  try {
    const timings = new TimingLog(session.applicationId);
    await setupTables(session, options.source, timings, {
      tables: options.tables,
      clock,
      logger,
    });

    const summaries: ExecutionSummary[] = [];
    const queryTimes: number[] = [];
    const prefix = summaryPrefix(options.propertyFile);

    const powerStart = clock();
    for (const unit of queries) {
      logger.log(`\n[${unit.name}] Running`);
      const statement = executableStatement(unit.body);
      const report = new BenchReport({
        engine: session.name,
        applicationId: session.applicationId,
        properties: options.properties,
        clock,
      });
      const outcome = await report.reportOn(unit.name, () =>
        runOneQuery(session, statement, unit.name, options.output)
      );

      summaries.push(outcome.summary);
      if (options.jsonSummaryFolder) {
        await writeSummary(options.jsonSummaryFolder, outcome.summary, prefix);
      }
      if (outcome.status === "Failed") {
        logger.error(`  Failed after ${formatDuration(outcome.summary.queryTimes[0] ?? 0)}`);
        throw new QueryExecutionError(unit.name, outcome.summary, outcome.error);
      }

      const millis = outcome.summary.queryTimes[0] ?? 0;
      queryTimes.push(millis);
      timings.record(unit.name, millis);
      logger.log(`  Time taken: ${formatDuration(millis)}`);
    }
    const powerEnd = clock();

    timings.record(POWER_START_LABEL, powerStart);
    timings.record(POWER_END_LABEL, powerEnd);
    timings.record(POWER_ELAPSED_LABEL, powerEnd - powerStart);
    timings.record(TOTAL_ELAPSED_LABEL, clock() - totalStart);

    const stats = calculateStats(queryTimes);
    logger.log(`\n=== Power Test Time: ${formatDuration(powerEnd - powerStart)} ===`);
    logger.log(
      `Query times: min=${formatDuration(stats.min)}, avg=${formatDuration(stats.avg)}, ` +
        `p95=${formatDuration(stats.p95)}, max=${formatDuration(stats.max)}`
    );

    const records = timings.toArray();
    await writeTimingCsv(options.timeLogPath, records);
    logger.log(`Wrote time log: ${options.timeLogPath}`);

    if (options.extraTimeLogPath && session.writeTimingLog) {
      await session.writeTimingLog(records, options.extraTimeLogPath);
      logger.log(`Wrote time log through ${session.name}: ${options.extraTimeLogPath}`);
    }

    if (!options.keepSession) {
      await session.disconnect();
      return { applicationId: session.applicationId, records, summaries };
    }
    return { applicationId: session.applicationId, records, summaries, session };
  } catch (error) {
    if (!options.keepSession) {
      await session.disconnect().catch((closeError: unknown) => {
        logger.error(`Failed to disconnect from ${session.name}: ${String(closeError)}`);
      });
    }
    throw error;
  }
}

async function runOneQuery(
  session: EngineSession,
  sql: string,
  name: string,
  output: QueryOutput | undefined
): Promise<void> {
  if (!output) {
    await session.materialize(sql);
    return;
  }
  const result = await session.execute(sql);
  await writeResult(
    { ...result, columns: sanitizeColumnNames(result.columns) },
    join(output.prefix, name),
    output.format,
    { useDecimal: output.useDecimal }
  );
}

/**
 * Reject runs the engine cannot carry out before any work is done.
 */
function validateSession(session: EngineSession, options: PowerRunOptions): void {
  const { source } = options;
  if (setupModeOf(source) !== "catalog" && !session.supportsFormat(source.inputFormat)) {
    throw new ConfigurationError(
      `${session.name} cannot register ${source.inputFormat} tables; use --hive to read an existing schema`
    );
  }
  if (options.extraTimeLogPath && !session.writeTimingLog) {
    throw new ConfigurationError(`${session.name} cannot write the extra time log`);
  }
}
