import { readFile } from "node:fs/promises";
import { ConfigurationError } from "./errors.js";
import type { EngineConnection } from "./runners.js";
import type { EngineName, InputFormat } from "./types.js";

export const ENGINES: readonly EngineName[] = ["postgres", "clickhouse", "trino"];

export const INPUT_FORMATS: readonly InputFormat[] = [
  "parquet",
  "orc",
  "avro",
  "csv",
  "json",
  "iceberg",
  "delta",
];

interface EngineDefaults {
  url: string;
  database: string;
  username: string;
  password: string;
}

const ENGINE_DEFAULTS: Record<EngineName, EngineDefaults> = {
  postgres: {
    url: "postgres://localhost:5432",
    database: "benchmarks",
    username: "postgres",
    password: "postgres",
  },
  clickhouse: {
    url: "http://localhost:8123",
    database: "benchmarks",
    username: "default",
    password: "clickhouse",
  },
  trino: {
    url: "http://localhost:8080",
    database: "iceberg.benchmarks",
    username: "trino",
    password: "",
  },
};

/**
 * Parse `key=value` lines. Blank lines and lines starting with `#` or `!` are
 * skipped; keys and values are trimmed, and only the first `=` splits.
 */
export function parseProperties(text: string): Record<string, string> {
  const properties: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#") || line.startsWith("!")) continue;

    const eq = line.indexOf("=");
    const key = (eq === -1 ? line : line.slice(0, eq)).trim();
    const value = eq === -1 ? "" : line.slice(eq + 1).trim();
    if (key) properties[key] = value;
  }
  return properties;
}

export async function loadProperties(path: string): Promise<Record<string, string>> {
  return parseProperties(await readFile(path, "utf8"));
}

/**
 * Connection settings for an engine: explicit values first, then the
 * POWER_RUN_* environment variables, then local defaults.
 */
export function resolveConnection(
  engine: EngineName,
  overrides: { url?: string; appName: string; properties?: Record<string, string> },
  env: NodeJS.ProcessEnv = process.env
): EngineConnection {
  const defaults = ENGINE_DEFAULTS[engine];
  return {
    url: overrides.url ?? env.POWER_RUN_URL ?? defaults.url,
    database: env.POWER_RUN_DATABASE ?? defaults.database,
    username: env.POWER_RUN_USER ?? defaults.username,
    password: env.POWER_RUN_PASSWORD ?? defaults.password,
    appName: overrides.appName,
    properties: overrides.properties ?? {},
  };
}

export function parseChoice<T extends string>(
  option: string,
  value: string,
  choices: readonly T[]
): T {
  const choice = choices.find((c) => c === value);
  if (choice === undefined) {
    throw new ConfigurationError(
      `Invalid --${option} "${value}". Expected one of: ${choices.join(", ")}`
    );
  }
  return choice;
}

/** Comma separated query names, e.g. "query1,query14_part1" */
export function parseQueryList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}
