import { mkdtemp, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { escapeCsvValue, formatTimingCsv, TimingLog, writeTimingCsv } from "../src/timing.js";

describe("TimingLog", () => {
  it("keeps records in order, tagged with the run id", () => {
    const log = new TimingLog("app-1");
    log.record("CreateTempView item", 12);
    log.record("query1", 40.6);

    expect(log.toArray()).toEqual([
      { runId: "app-1", label: "CreateTempView item", millis: 12 },
      { runId: "app-1", label: "query1", millis: 41 },
    ]);
    expect(log.size).toBe(2);
  });
});

describe("escapeCsvValue", () => {
  it("quotes values with delimiters, quotes or line breaks", () => {
    expect(escapeCsvValue("plain")).toBe("plain");
    expect(escapeCsvValue("a,b")).toBe('"a,b"');
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvValue("two\nlines")).toBe('"two\nlines"');
  });

  it("writes nothing for absent values", () => {
    expect(escapeCsvValue(null)).toBe("");
    expect(escapeCsvValue(undefined)).toBe("");
  });

  it("writes dates as ISO strings", () => {
    expect(escapeCsvValue(new Date(Date.UTC(2024, 0, 2)))).toBe("2024-01-02T00:00:00.000Z");
  });
});

describe("formatTimingCsv", () => {
  it("writes the header and one row per record", () => {
    const csv = formatTimingCsv([
      { runId: "app-1", label: "query1", millis: 12 },
      { runId: "app-1", label: "Power Test Time", millis: 3400 },
    ]);
    expect(csv).toBe(
      "application_id,query,time/milliseconds\r\napp-1,query1,12\r\napp-1,Power Test Time,3400\r\n"
    );
  });

  it("writes only the header for an empty run", () => {
    expect(formatTimingCsv([])).toBe("application_id,query,time/milliseconds\r\n");
  });
});

describe("writeTimingCsv", () => {
  it("writes the log to a file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "timing-"));
    const path = join(dir, "time.csv");
    await writeTimingCsv(path, [{ runId: "app-1", label: "query1", millis: 7 }]);

    expect(await readFile(path, "utf8")).toBe(
      "application_id,query,time/milliseconds\r\napp-1,query1,7\r\n"
    );
  });
});
