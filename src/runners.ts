import { createClient } from "@clickhouse/client";
import postgres from "postgres";
import { Trino, BasicAuth } from "trino-client";
import { ConfigurationError } from "./errors.js";
import { TIMING_HEADER } from "./timing.js";
import type { EngineName, InputFormat, ResultSet, TimingRecord } from "./types.js";

export interface EngineConnection {
  url: string;
  /** Database, schema or `catalog.schema`, depending on the engine */
  database: string;
  username: string;
  password: string;
  /** Shown by the engine next to the session, e.g. in pg_stat_activity */
  appName: string;
  /** Passed through verbatim as session settings */
  properties: Record<string, string>;
}

/**
 * One session against a SQL engine, used for the whole run.
 */
export interface EngineSession {
  readonly name: EngineName;
  readonly applicationId: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Run a statement and return every row */
  execute(sql: string): Promise<ResultSet>;
  /** Run a statement and read every row without keeping them */
  materialize(sql: string): Promise<{ rowCount: number }>;
  /** Whether `registerTable` can expose tables stored in `format` */
  supportsFormat(format: InputFormat): boolean;
  registerTable(table: string, location: string, format: InputFormat): Promise<void>;
  /** Resolve unqualified table names against `namespace` from now on */
  useNamespace(namespace: string): Promise<void>;
  /** Write timing rows through the engine's own writer, as a single file */
  writeTimingLog?(records: readonly TimingRecord[], path: string): Promise<void>;
}

function newApplicationId(engine: EngineName): string {
  return `${engine}-${String(Date.now())}`;
}

/** SQL string literal, quotes doubled */
export function sqlString(value: string, backslashEscapes = false): string {
  const escaped = backslashEscapes ? value.replace(/\\/g, "\\\\") : value;
  return `'${escaped.replace(/'/g, "''")}'`;
}

function quoteIdent(name: string, quote: '"' | "`"): string {
  return `${quote}${name.split(quote).join(quote + quote)}${quote}`;
}

/** Names of the built-in type OIDs query results carry */
const POSTGRES_TYPE_NAMES: Record<number, string> = {
  16: "boolean",
  20: "bigint",
  21: "smallint",
  23: "integer",
  700: "real",
  701: "double precision",
  1700: "numeric",
};

export class PostgresSession implements EngineSession {
  readonly name = "postgres";
  readonly applicationId = newApplicationId("postgres");
  private sql: postgres.Sql | null = null;

  constructor(private readonly connection: EngineConnection) {}

  connect(): Promise<void> {
    // a single connection, so session state such as search_path holds for every query
    this.sql = postgres(this.connection.url, {
      max: 1,
      database: this.connection.database,
      username: this.connection.username,
      password: this.connection.password,
      connection: {
        ...this.connection.properties,
        application_name: this.connection.appName,
      },
    });
    return Promise.resolve();
  }

  async disconnect(): Promise<void> {
    if (this.sql) {
      await this.sql.end();
      this.sql = null;
    }
  }

  async execute(query: string): Promise<ResultSet> {
    const rows = await this.client().unsafe(query).values();
    return {
      columns: rows.columns.map((c) => c.name),
      rows: rows.map((row): unknown[] => [...row]),
      types: rows.columns.map((c) => POSTGRES_TYPE_NAMES[c.type] ?? "text"),
    };
  }

  async materialize(query: string): Promise<{ rowCount: number }> {
    // Use cursor to stream results without loading all into memory
    let rowCount = 0;
    const cursor = this.client().unsafe(query).cursor(1000);
    for await (const rows of cursor) {
      rowCount += rows.length;
    }
    return { rowCount };
  }

  supportsFormat(): boolean {
    return false;
  }

  registerTable(table: string): Promise<void> {
    return Promise.reject(
      new ConfigurationError(
        `PostgreSQL cannot read table files for ${table}; load the data into a schema and run with --hive`
      )
    );
  }

  async useNamespace(namespace: string): Promise<void> {
    await this.client().unsafe(`SET search_path TO ${quoteIdent(namespace, '"')}`);
  }

  async writeTimingLog(records: readonly TimingRecord[], path: string): Promise<void> {
    const values = records
      .map((r) => `(${sqlString(r.runId)}, ${sqlString(r.label)}, ${String(r.millis)})`)
      .join(", ");
    const columns = TIMING_HEADER.map((c) => quoteIdent(c, '"')).join(", ");
    await this.client().unsafe(
      `COPY (SELECT * FROM (VALUES ${values}) AS t(${columns})) TO ${sqlString(path)} WITH (FORMAT csv, HEADER)`
    );
  }

  private client(): postgres.Sql {
    if (!this.sql) throw new Error("Not connected");
    return this.sql;
  }
}

const CLICKHOUSE_FORMATS: Partial<Record<InputFormat, string>> = {
  parquet: "Parquet",
  orc: "ORC",
  avro: "Avro",
  csv: "CSVWithNames",
  json: "JSONEachRow",
};

export class ClickHouseSession implements EngineSession {
  readonly name = "clickhouse";
  readonly applicationId = newApplicationId("clickhouse");
  private client: ReturnType<typeof createClient> | null = null;

  constructor(private readonly connection: EngineConnection) {}

  async connect(): Promise<void> {
    // session_id keeps USE and SET statements in effect across queries
    this.client = createClient({
      url: this.connection.url,
      username: this.connection.username,
      password: this.connection.password,
      database: this.connection.database,
      application: this.connection.appName,
      session_id: this.applicationId,
      request_timeout: 3_600_000,
    });
    for (const [key, value] of Object.entries(this.connection.properties)) {
      await this.command(`SET ${key} = ${settingValue(value)}`);
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
    }
  }

  async execute(query: string): Promise<ResultSet> {
    const result = await this.connected().query({ query, format: "JSONCompact" });
    const body = await result.json<unknown[]>();
    return {
      columns: (body.meta ?? []).map((m) => m.name),
      rows: body.data,
      types: (body.meta ?? []).map((m) => m.type),
    };
  }

  async materialize(query: string): Promise<{ rowCount: number }> {
    const result = await this.connected().query({ query, format: "JSONCompactEachRow" });
    // Stream rows to count without loading all into memory
    let rowCount = 0;
    const stream = result.stream();
    for await (const rows of stream) {
      rowCount += rows.length;
    }
    return { rowCount };
  }

  supportsFormat(format: InputFormat): boolean {
    return format === "delta" || CLICKHOUSE_FORMATS[format] !== undefined;
  }

  async registerTable(table: string, location: string, format: InputFormat): Promise<void> {
    const fileFormat = CLICKHOUSE_FORMATS[format];
    let source: string;
    if (format === "delta") {
      source = `deltaLake(${sqlString(location, true)})`;
    } else if (fileFormat) {
      source = `file(${sqlString(`${location}/*`, true)}, ${sqlString(fileFormat)})`;
    } else {
      throw new ConfigurationError(`ClickHouse cannot register ${format} tables`);
    }
    await this.command(`CREATE OR REPLACE VIEW ${quoteIdent(table, "`")} AS SELECT * FROM ${source}`);
  }

  async useNamespace(namespace: string): Promise<void> {
    await this.command(`USE ${quoteIdent(namespace, "`")}`);
  }

  async writeTimingLog(records: readonly TimingRecord[], path: string): Promise<void> {
    const [runId, label, millis] = TIMING_HEADER;
    const structure = `${quoteIdent(runId, "`")} String, ${quoteIdent(label, "`")} String, ${quoteIdent(millis, "`")} Int64`;
    const values = records
      .map((r) => `(${sqlString(r.runId, true)}, ${sqlString(r.label, true)}, ${String(r.millis)})`)
      .join(", ");

    await this.command("SET engine_file_truncate_on_insert = 1");
    await this.command(
      `INSERT INTO FUNCTION file(${sqlString(path, true)}, 'CSVWithNames', ${sqlString(structure, true)}) VALUES ${values}`
    );
  }

  private async command(query: string): Promise<void> {
    await this.connected().command({ query });
  }

  private connected(): ReturnType<typeof createClient> {
    if (!this.client) throw new Error("Not connected");
    return this.client;
  }
}

function settingValue(value: string): string {
  return /^-?\d+(\.\d+)?$/.test(value) ? value : sqlString(value, true);
}

interface TrinoPage {
  error?: { message: string };
  columns?: { name: string; type: string }[];
  data?: unknown[][];
}

export class TrinoSession implements EngineSession {
  readonly name = "trino";
  readonly applicationId = newApplicationId("trino");
  private trino: Trino | null = null;
  private catalog = "iceberg";
  private schema = "default";

  constructor(private readonly connection: EngineConnection) {}

  /** `database` is `catalog.schema`, or a schema of the iceberg catalog */
  connect(): Promise<void> {
    return this.useNamespace(this.connection.database);
  }

  disconnect(): Promise<void> {
    this.trino = null;
    return Promise.resolve();
  }

  async execute(query: string): Promise<ResultSet> {
    const result: ResultSet = { columns: [], rows: [], types: [] };
    for await (const page of this.pages(query)) {
      if (page.columns && result.columns.length === 0) {
        result.columns = page.columns.map((c) => c.name);
        result.types = page.columns.map((c) => c.type);
      }
      if (page.data) {
        result.rows.push(...page.data);
      }
    }
    return result;
  }

  async materialize(query: string): Promise<{ rowCount: number }> {
    let rowCount = 0;
    for await (const page of this.pages(query)) {
      if (page.data) {
        rowCount += page.data.length;
      }
    }
    return { rowCount };
  }

  supportsFormat(format: InputFormat): boolean {
    return format === "delta";
  }

  async registerTable(table: string, location: string, format: InputFormat): Promise<void> {
    if (format !== "delta") {
      throw new ConfigurationError(
        `Trino cannot read ${format} files without a table definition; use --hive or --input-format delta`
      );
    }
    await this.materialize(
      `CALL ${this.catalog}.system.register_table(schema_name => ${sqlString(this.schema)}, ` +
        `table_name => ${sqlString(table)}, table_location => ${sqlString(location)})`
    );
  }

  useNamespace(namespace: string): Promise<void> {
    const [first, second] = splitNamespace(namespace);
    if (second === undefined) {
      this.open(this.catalog, first);
    } else {
      this.open(first, second);
    }
    return Promise.resolve();
  }

  private open(catalog: string, schema: string): void {
    this.catalog = catalog;
    this.schema = schema;
    this.trino = Trino.create({
      server: this.connection.url,
      catalog,
      schema,
      source: this.connection.appName,
      session: this.connection.properties,
      auth: new BasicAuth(this.connection.username, this.connection.password || undefined),
    });
  }

  private async *pages(query: string): AsyncGenerator<TrinoPage> {
    if (!this.trino) throw new Error("Not connected");
    const queryResult = await this.trino.query(query);
    for await (const result of queryResult) {
      const trinoResult = result as TrinoPage;
      if (trinoResult.error) {
        throw new Error(`Trino query failed: ${trinoResult.error.message}`);
      }
      yield trinoResult;
    }
  }
}

function splitNamespace(namespace: string): [string, string | undefined] {
  const dot = namespace.indexOf(".");
  return dot === -1 ? [namespace, undefined] : [namespace.slice(0, dot), namespace.slice(dot + 1)];
}

export function createEngineSession(engine: EngineName, connection: EngineConnection): EngineSession {
  switch (engine) {
    case "postgres":
      return new PostgresSession(connection);
    case "clickhouse":
      return new ClickHouseSession(connection);
    case "trino":
      return new TrinoSession(connection);
  }
}
