import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parquetWriteBuffer } from "hyparquet-writer";
import { formatCsvRow } from "./timing.js";
import type { OutputFormat, ResultSet } from "./types.js";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["parquet", "csv", "json"];

/**
 * Values as the writers accept them. Engines hand back bigints, buffers and
 * nested structures that none of the formats take as-is.
 */
export function normalizeValue(value: unknown): string | number | boolean | Date | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) return value;
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString("base64");
  return JSON.stringify(value);
}

export function toCsv(result: ResultSet): string {
  const lines = [formatCsvRow(result.columns)];
  for (const row of result.rows) {
    lines.push(formatCsvRow(row.map(normalizeValue)));
  }
  return lines.join("\n") + "\n";
}

/** One JSON object per line */
export function toJsonLines(result: ResultSet): string {
  return result.rows
    .map((row) => {
      const record: Record<string, unknown> = {};
      result.columns.forEach((column, i) => {
        record[column] = normalizeValue(row[i]);
      });
      return JSON.stringify(record) + "\n";
    })
    .join("");
}

/** Parquet types query results are written as */
export type ParquetColumnType = "BOOLEAN" | "INT32" | "INT64" | "DOUBLE" | "STRING";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

const PARQUET_TYPES: Record<string, ParquetColumnType> = {
  bool: "BOOLEAN",
  boolean: "BOOLEAN",
  tinyint: "INT32",
  smallint: "INT32",
  integer: "INT32",
  int: "INT32",
  int8: "INT32",
  int16: "INT32",
  int32: "INT32",
  uint8: "INT32",
  uint16: "INT32",
  bigint: "INT64",
  int64: "INT64",
  uint32: "INT64",
  uint64: "INT64",
  real: "DOUBLE",
  float: "DOUBLE",
  double: "DOUBLE",
  "double precision": "DOUBLE",
  float32: "DOUBLE",
  float64: "DOUBLE",
};

const WRAPPED_TYPE = /^(?:Nullable|LowCardinality)\((.*)\)$/i;

/**
 * Parquet type of an engine column type. Decimals keep their exact digits
 * as strings unless `useDecimal` is off; unknown types are written as strings.
 */
export function parquetTypeOf(sqlType: string, useDecimal = true): ParquetColumnType {
  let type = sqlType.trim();
  let wrapped = WRAPPED_TYPE.exec(type);
  while (wrapped?.[1] !== undefined) {
    type = wrapped[1].trim();
    wrapped = WRAPPED_TYPE.exec(type);
  }
  const base = type.replace(/\(.*$/, "").trim().toLowerCase();
  if (base === "decimal" || base === "numeric" || /^decimal(32|64|128|256)$/.test(base)) {
    return useDecimal ? "STRING" : "DOUBLE";
  }
  return PARQUET_TYPES[base] ?? "STRING";
}

/** Parquet type for a column the engine reported no type for */
export function inferParquetType(values: readonly unknown[]): ParquetColumnType {
  const present = values.filter((value) => value !== null && value !== undefined);
  if (present.length === 0) return "STRING";
  if (present.every((value) => typeof value === "boolean")) return "BOOLEAN";
  if (present.every((value) => typeof value === "bigint")) return "INT64";
  if (present.every((value) => typeof value === "number")) {
    const int32 = (value: unknown): boolean =>
      Number.isInteger(value) && Number(value) >= INT32_MIN && Number(value) <= INT32_MAX;
    if (present.every(int32)) return "INT32";
    return present.every((value) => Number.isSafeInteger(value)) ? "INT64" : "DOUBLE";
  }
  return "STRING";
}

function parquetValue(value: unknown, type: ParquetColumnType): string | number | bigint | boolean | null {
  if (value === null || value === undefined) return null;
  switch (type) {
    case "BOOLEAN":
      return typeof value === "boolean" ? value : ["true", "t", "1"].includes(String(value).toLowerCase());
    case "INT32":
    case "DOUBLE":
      return Number(value);
    case "INT64":
      if (typeof value === "bigint") return value;
      return typeof value === "string" && /^-?\d+$/.test(value)
        ? BigInt(value)
        : BigInt(Math.trunc(Number(value)));
    case "STRING": {
      const normalized = normalizeValue(value);
      return normalized instanceof Date ? normalized.toISOString() : String(normalized);
    }
  }
}

export interface ParquetOptions {
  /** Write decimal columns as exact strings instead of doubles */
  useDecimal?: boolean;
}

export function toParquet(result: ResultSet, options: ParquetOptions = {}): ArrayBuffer {
  const columnData = result.columns.map((name, i) => {
    const values = result.rows.map((row) => row[i]);
    const sqlType = result.types?.[i];
    const type =
      sqlType === undefined ? inferParquetType(values) : parquetTypeOf(sqlType, options.useDecimal);
    return { name, type, data: values.map((value) => parquetValue(value, type)) };
  });
  return parquetWriteBuffer({ columnData });
}

/**
 * Write a result set under `directory`, replacing whatever an earlier run left
 * there. Column names must already be sanitized.
 */
export async function writeResult(
  result: ResultSet,
  directory: string,
  format: OutputFormat,
  options: ParquetOptions = {}
): Promise<string> {
  await rm(directory, { recursive: true, force: true });
  await mkdir(directory, { recursive: true });

  const path = join(directory, `part-00000.${format}`);
  switch (format) {
    case "csv":
      await writeFile(path, toCsv(result), "utf8");
      break;
    case "json":
      await writeFile(path, toJsonLines(result), "utf8");
      break;
    case "parquet":
      await writeFile(path, new Uint8Array(toParquet(result, options)));
      break;
  }
  return path;
}
