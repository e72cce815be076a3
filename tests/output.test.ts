import { mkdir, mkdtemp, readdir, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parquetMetadata, parquetReadObjects } from "hyparquet";
import { describe, it, expect } from "vitest";
import {
  inferParquetType,
  normalizeValue,
  parquetTypeOf,
  toCsv,
  toJsonLines,
  toParquet,
  writeResult,
} from "../src/output.js";
import type { ResultSet } from "../src/types.js";

const RESULT: ResultSet = {
  columns: ["id", "name"],
  rows: [
    [1, "a,b"],
    [2, null],
  ],
};

describe("normalizeValue", () => {
  it("keeps plain values", () => {
    expect(normalizeValue("x")).toBe("x");
    expect(normalizeValue(1.5)).toBe(1.5);
    expect(normalizeValue(true)).toBe(true);
    expect(normalizeValue(undefined)).toBeNull();
  });

  it("turns bigints, bytes and objects into strings", () => {
    expect(normalizeValue(10n)).toBe("10");
    expect(normalizeValue(new Uint8Array([104, 105]))).toBe("aGk=");
    expect(normalizeValue({ a: [1] })).toBe('{"a":[1]}');
  });
});

describe("toCsv", () => {
  it("writes a header and escaped rows", () => {
    expect(toCsv(RESULT)).toBe('id,name\n1,"a,b"\n2,\n');
  });
});

describe("toJsonLines", () => {
  it("writes one object per row", () => {
    expect(toJsonLines(RESULT)).toBe('{"id":1,"name":"a,b"}\n{"id":2,"name":null}\n');
  });
});

describe("parquetTypeOf", () => {
  it("maps engine integer types by width", () => {
    expect(parquetTypeOf("integer")).toBe("INT32");
    expect(parquetTypeOf("Nullable(Int8)")).toBe("INT32");
    expect(parquetTypeOf("bigint")).toBe("INT64");
    expect(parquetTypeOf("UInt64")).toBe("INT64");
  });

  it("unwraps nullable and low cardinality types", () => {
    expect(parquetTypeOf("LowCardinality(Nullable(String))")).toBe("STRING");
    expect(parquetTypeOf("Nullable(Float64)")).toBe("DOUBLE");
  });

  it("keeps decimals exact unless told otherwise", () => {
    expect(parquetTypeOf("decimal(7,2)")).toBe("STRING");
    expect(parquetTypeOf("Decimal(38, 2)", false)).toBe("DOUBLE");
    expect(parquetTypeOf("numeric", false)).toBe("DOUBLE");
  });

  it("writes unknown types as strings", () => {
    expect(parquetTypeOf("date")).toBe("STRING");
    expect(parquetTypeOf("varchar(50)")).toBe("STRING");
  });
});

describe("inferParquetType", () => {
  it("falls back to strings without a value to go by", () => {
    expect(inferParquetType([])).toBe("STRING");
    expect(inferParquetType([null, undefined])).toBe("STRING");
  });

  it("widens numbers as far as the values need", () => {
    expect(inferParquetType([1, null, -2])).toBe("INT32");
    expect(inferParquetType([1, 3_000_000_000])).toBe("INT64");
    expect(inferParquetType([1, 2.5])).toBe("DOUBLE");
    expect(inferParquetType([10n])).toBe("INT64");
  });

  it("writes mixed values as strings", () => {
    expect(inferParquetType([true, false])).toBe("BOOLEAN");
    expect(inferParquetType([1, "a"])).toBe("STRING");
  });
});

describe("toParquet", () => {
  it("writes a parquet file", () => {
    const bytes = new Uint8Array(toParquet({ columns: ["id", "name"], rows: [[1, "a"], [2, "b"]] }));
    const magic = (offset: number): string =>
      String.fromCharCode(...bytes.subarray(offset, offset + 4));
    expect(magic(0)).toBe("PAR1");
    expect(magic(bytes.length - 4)).toBe("PAR1");
  });

  it("writes a result without rows", async () => {
    const buffer = toParquet({ columns: ["cnt"], rows: [] });

    const metadata = parquetMetadata(buffer);
    expect(metadata.num_rows).toBe(0n);
    expect(metadata.schema[1]?.name).toBe("cnt");
    expect(await parquetReadObjects({ file: buffer })).toEqual([]);
  });

  it("writes a column that only holds nulls", async () => {
    const rows = await parquetReadObjects({
      file: toParquet({ columns: ["x"], rows: [[null], [null]] }),
    });
    expect(rows.map((row) => row.x ?? null)).toEqual([null, null]);
  });

  it("writes integers and fractions in one column as doubles", async () => {
    const rows = await parquetReadObjects({
      file: toParquet({ columns: ["v"], rows: [[1], [2.5]] }),
    });
    expect(rows).toEqual([{ v: 1 }, { v: 2.5 }]);
  });

  it("keeps whole numbers beyond 32 bits", async () => {
    const rows = await parquetReadObjects({
      file: toParquet({ columns: ["total"], rows: [[3_000_000_000], [1]] }),
    });
    expect(rows).toEqual([{ total: 3_000_000_000n }, { total: 1n }]);
  });

  it("converts values to the types the engine reported", async () => {
    const result: ResultSet = {
      columns: ["id", "amount", "price", "name", "flag"],
      types: ["bigint", "Nullable(Decimal(7, 2))", "double", "varchar(10)", "boolean"],
      rows: [["3000000000", "12.50", 1.5, "a", true]],
    };

    expect(await parquetReadObjects({ file: toParquet(result) })).toEqual([
      { id: 3_000_000_000n, amount: "12.50", price: 1.5, name: "a", flag: true },
    ]);
    expect(await parquetReadObjects({ file: toParquet(result, { useDecimal: false }) })).toEqual([
      { id: 3_000_000_000n, amount: 12.5, price: 1.5, name: "a", flag: true },
    ]);
  });
});

describe("writeResult", () => {
  it("replaces the previous contents of the destination", async () => {
    const dir = join(await mkdtemp(join(tmpdir(), "output-")), "query1");
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "stale.csv"), "old");

    const path = await writeResult(RESULT, dir, "csv");

    expect(path).toBe(join(dir, "part-00000.csv"));
    expect(await readdir(dir)).toEqual(["part-00000.csv"]);
    expect(await readFile(path, "utf8")).toBe('id,name\n1,"a,b"\n2,\n');
  });

  it("writes json lines", async () => {
    const dir = join(await mkdtemp(join(tmpdir(), "output-")), "query2");
    const path = await writeResult(RESULT, dir, "json");
    expect(path).toBe(join(dir, "part-00000.json"));
    expect(await readFile(path, "utf8")).toBe(toJsonLines(RESULT));
  });

  it("writes an empty parquet result", async () => {
    const dir = join(await mkdtemp(join(tmpdir(), "output-")), "query3");
    const path = await writeResult({ columns: ["cnt"], rows: [] }, dir, "parquet");
    expect(path).toBe(join(dir, "part-00000.parquet"));

    const data = await readFile(path);
    const file = new ArrayBuffer(data.byteLength);
    new Uint8Array(file).set(data);
    expect(await parquetReadObjects({ file })).toEqual([]);
  });
});
