import type { EngineSession } from "../../src/runners.js";
import type { InputFormat, ResultSet, TimingRecord } from "../../src/types.js";

/**
 * In-process stand-in for an engine session. Records every call it receives.
 */
export class FakeSession implements EngineSession {
  readonly name = "clickhouse";
  readonly applicationId = "fake-app";

  connected = false;
  connectCalls = 0;
  disconnectCalls = 0;
  executed: string[] = [];
  materialized: string[] = [];
  registered: { table: string; location: string; format: InputFormat }[] = [];
  namespaces: string[] = [];
  timingLogs: { path: string; records: TimingRecord[] }[] = [];

  /** Statements containing this text fail */
  failOn?: string;
  /** Rejects `disconnect` with this error */
  disconnectError?: Error;
  formats: readonly InputFormat[] = ["parquet", "csv", "json", "delta"];
  result: ResultSet = { columns: ["cnt", "cnt", "1x"], rows: [[1, 2, 3]] };

  connect(): Promise<void> {
    this.connected = true;
    this.connectCalls++;
    return Promise.resolve();
  }

  disconnect(): Promise<void> {
    this.connected = false;
    this.disconnectCalls++;
    return this.disconnectError ? Promise.reject(this.disconnectError) : Promise.resolve();
  }

  execute(sql: string): Promise<ResultSet> {
    this.check(sql);
    this.executed.push(sql);
    return Promise.resolve(this.result);
  }

  materialize(sql: string): Promise<{ rowCount: number }> {
    this.check(sql);
    this.materialized.push(sql);
    return Promise.resolve({ rowCount: this.result.rows.length });
  }

  supportsFormat(format: InputFormat): boolean {
    return this.formats.includes(format);
  }

  registerTable(table: string, location: string, format: InputFormat): Promise<void> {
    this.registered.push({ table, location, format });
    return Promise.resolve();
  }

  useNamespace(namespace: string): Promise<void> {
    this.namespaces.push(namespace);
    return Promise.resolve();
  }

  /** Set to undefined to model an engine without its own writer */
  writeTimingLog?: (records: readonly TimingRecord[], path: string) => Promise<void> = (
    records,
    path
  ) => {
    this.timingLogs.push({ path, records: [...records] });
    return Promise.resolve();
  };

  private check(sql: string): void {
    if (!this.connected) throw new Error("Not connected");
    if (this.failOn !== undefined && sql.includes(this.failOn)) {
      throw new Error(`engine failure in ${this.failOn}`);
    }
  }
}

/** Clock that advances by `step` millis on every reading, starting at `step` */
export function steppingClock(step = 5): () => number {
  let now = 0;
  return () => (now += step);
}
