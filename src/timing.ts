import { writeFile } from "node:fs/promises";
import type { TimingRecord } from "./types.js";

export const TIMING_HEADER = ["application_id", "query", "time/milliseconds"] as const;

export const POWER_START_LABEL = "Power Start Time";
export const POWER_END_LABEL = "Power End Time";
export const POWER_ELAPSED_LABEL = "Power Test Time";
export const TOTAL_ELAPSED_LABEL = "Total Time";

/**
 * Timing records of one run, in the order they were taken. Owned by the run and
 * flushed once when it completes.
 */
export class TimingLog {
  private readonly records: TimingRecord[] = [];

  constructor(readonly runId: string) {}

  record(label: string, millis: number): TimingRecord {
    const entry = { runId: this.runId, label, millis: Math.round(millis) };
    this.records.push(entry);
    return entry;
  }

  get size(): number {
    return this.records.length;
  }

  toArray(): TimingRecord[] {
    return [...this.records];
  }
}

/**
 * Escape a CSV value, quoting when it holds a delimiter, a quote or a line break
 */
export function escapeCsvValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  const strValue = value instanceof Date ? value.toISOString() : String(value);
  const needsQuoting = /[",\n\r]/.test(strValue);
  return needsQuoting ? `"${strValue.replace(/"/g, '""')}"` : strValue;
}

export function formatCsvRow(values: readonly unknown[]): string {
  return values.map(escapeCsvValue).join(",");
}

export function formatTimingCsv(records: readonly TimingRecord[]): string {
  const lines = [formatCsvRow(TIMING_HEADER)];
  for (const r of records) {
    lines.push(formatCsvRow([r.runId, r.label, r.millis]));
  }
  return lines.join("\r\n") + "\r\n";
}

export async function writeTimingCsv(path: string, records: readonly TimingRecord[]): Promise<void> {
  await writeFile(path, formatTimingCsv(records), "utf8");
}
