#!/usr/bin/env node
import { parseArgs } from "node:util";
import {
  ENGINES,
  INPUT_FORMATS,
  loadProperties,
  parseChoice,
  parseQueryList,
  resolveConnection,
} from "./config.js";
import { isPowerRunError } from "./errors.js";
import { OUTPUT_FORMATS } from "./output.js";
import { runPowerRun } from "./power-run.js";
import { createEngineSession } from "./runners.js";
import { readQueryStream } from "./stream.js";

const USAGE = `
Usage: power-run <input_prefix> <query_stream_file> <time_log> [options]

Arguments:
  input_prefix         Location of the table data (<input_prefix>/<table>), or the
                       schema to read from with --hive, iceberg and managed delta
  query_stream_file    Query stream generated by the TPC-DS query generator
  time_log             CSV file to write query execution times to

Options:
  --engine <name>            postgres, clickhouse or trino (default: clickhouse)
  --url <url>                Engine URL (default: the engine's local address)
  --input-format <format>    parquet, orc, avro, csv, json, iceberg or delta (default: parquet)
  --output-prefix <dir>      Write each query result to <dir>/<query>
  --output-format <format>   parquet, csv or json (default: parquet)
  --floats                   Write decimal result columns to parquet as doubles
                             instead of exact decimal strings
  --property-file <file>     key=value engine settings, passed through to the session
  --json-summary-folder <dir>  Empty folder (created when missing) for per-query JSON summaries
  --sub-queries <list>       Comma separated queries to run, e.g. "query1,query14_part1".
                             query14, query23, query24 and query39 run as _part1 and _part2
  --keep-session             Leave the engine session open after the run
  --hive                     Use tables from the schema named by input_prefix
  --delta-unmanaged          Register Delta tables by location
  --extra-time-log <path>    Also write the time log through the engine's own writer
  -h, --help                 Show this help message

Credentials and database come from POWER_RUN_USER, POWER_RUN_PASSWORD and
POWER_RUN_DATABASE when set.

Examples:
  power-run /data/sf100 streams/query_0.sql time.csv
  power-run /data/sf100 streams/query_0.sql time.csv --sub-queries query1,query14_part1
  power-run tpcds streams/query_0.sql time.csv --engine trino --hive
`;

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    engine: { type: "string", default: "clickhouse" },
    url: { type: "string" },
    "input-format": { type: "string", default: "parquet" },
    "output-prefix": { type: "string" },
    "output-format": { type: "string", default: "parquet" },
    floats: { type: "boolean", default: false },
    "property-file": { type: "string" },
    "json-summary-folder": { type: "string" },
    "sub-queries": { type: "string" },
    "keep-session": { type: "boolean", default: false },
    hive: { type: "boolean", default: false },
    "delta-unmanaged": { type: "boolean", default: false },
    "extra-time-log": { type: "string" },
    help: { type: "boolean", short: "h", default: false },
  },
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const [inputPrefix, queryStreamFile, timeLog] = positionals;
if (inputPrefix === undefined || queryStreamFile === undefined || timeLog === undefined) {
  console.error("Expected <input_prefix> <query_stream_file> <time_log>");
  console.error(USAGE);
  process.exit(1);
}

async function main(streamPath: string, timeLogPath: string, prefix: string): Promise<void> {
  const engine = parseChoice("engine", values.engine, ENGINES);
  const inputFormat = parseChoice("input-format", values["input-format"], INPUT_FORMATS);
  const outputFormat = parseChoice("output-format", values["output-format"], OUTPUT_FORMATS);
  const propertyFile = values["property-file"];
  const properties = propertyFile ? await loadProperties(propertyFile) : {};
  const outputPrefix = values["output-prefix"];

  const queries = await readQueryStream(streamPath);
  console.log(`=== Power Run: ${String(queries.size)} queries from ${streamPath} ===`);

  await runPowerRun(queries, {
    createSession: (appName) =>
      createEngineSession(engine, resolveConnection(engine, { url: values.url, appName, properties })),
    source: {
      inputPrefix: prefix,
      inputFormat,
      hive: values.hive,
      deltaUnmanaged: values["delta-unmanaged"],
    },
    timeLogPath,
    extraTimeLogPath: values["extra-time-log"],
    subQueries: parseQueryList(values["sub-queries"]),
    output: outputPrefix
      ? { prefix: outputPrefix, format: outputFormat, useDecimal: !values.floats }
      : undefined,
    jsonSummaryFolder: values["json-summary-folder"],
    propertyFile,
    properties,
    keepSession: values["keep-session"],
  });

  console.log("\n=== Done ===");
}

main(queryStreamFile, timeLog, inputPrefix).catch((error: unknown) => {
  if (isPowerRunError(error)) {
    console.error(`Fatal error: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
