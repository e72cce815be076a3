import { mkdir, readdir, stat, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { ConfigurationError } from "./errors.js";
import type { EngineName, ExecutionSummary } from "./types.js";
import { getEnvironmentInfo, systemClock, type Clock } from "./utils.js";

export interface BenchReportOptions {
  engine: EngineName;
  applicationId: string;
  properties?: Record<string, string>;
  clock?: Clock;
}

export type ReportOutcome<T> =
  | { status: "Completed"; summary: ExecutionSummary; value: T }
  | { status: "Failed"; summary: ExecutionSummary; error: unknown };

/**
 * Times a single query execution and keeps a structured summary of it.
 */
export class BenchReport {
  private readonly clock: Clock;

  constructor(private readonly options: BenchReportOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Run `fn`, measuring wall-clock millis. A failure is recorded in the summary
   * and handed back for the caller to raise.
   */
  async reportOn<T>(query: string, fn: () => Promise<T>): Promise<ReportOutcome<T>> {
    const summary: ExecutionSummary = {
      query,
      engine: this.options.engine,
      applicationId: this.options.applicationId,
      startTime: this.clock(),
      queryStatus: [],
      queryTimes: [],
      exceptions: [],
      env: getEnvironmentInfo(),
      properties: { ...this.options.properties },
    };

    try {
      const value = await fn();
      summary.queryTimes.push(this.clock() - summary.startTime);
      summary.queryStatus.push("Completed");
      return { status: "Completed", summary, value };
    } catch (error) {
      summary.queryTimes.push(this.clock() - summary.startTime);
      summary.queryStatus.push("Failed");
      summary.exceptions.push(error instanceof Error ? (error.stack ?? error.message) : String(error));
      return { status: "Failed", summary, error };
    }
  }
}

/**
 * File name prefix for summaries: the property file's stem, so runs with
 * different engine settings can share one folder.
 */
export function summaryPrefix(propertyFile?: string): string {
  if (!propertyFile) return "";
  const stem = basename(propertyFile).split(".")[0] ?? "";
  return stem ? `${stem}-` : "";
}

export async function writeSummary(
  folder: string,
  summary: ExecutionSummary,
  prefix = ""
): Promise<string> {
  const path = join(folder, `${prefix}${summary.query}-${String(summary.startTime)}.json`);
  await writeFile(path, JSON.stringify(summary, null, 2));
  return path;
}

/**
 * Make sure the summary folder exists and holds no earlier summaries.
 */
export async function prepareSummaryFolder(folder: string): Promise<void> {
  const existing = await stat(folder).catch((error: unknown) => {
    if (isNotFound(error)) return undefined;
    throw error;
  });

  if (!existing) {
    await mkdir(folder, { recursive: true });
    return;
  }
  if (!existing.isDirectory()) {
    throw new ConfigurationError(`JSON summary folder ${folder} is not a directory.`);
  }
  if ((await readdir(folder)).length > 0) {
    throw new ConfigurationError(
      `JSON summary folder ${folder} is not empty. There may be summaries from an earlier run; ` +
        "clean the folder or choose another one."
    );
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
