import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { escapeCsvValue, exportErrors, flattenErrorRecord, toCsv } from "./export";
import type { ErrorRecord } from "./types";

const AT = new Date("2024-05-01T12:00:00.000Z");

const record: ErrorRecord = {
  id: 3,
  timestamp: AT,
  severity: "HIGH",
  category: "DATABASE",
  component: "storage",
  function: "saveGameState",
  message: 'bad, "quoted" value',
  exceptionType: "SqliteError",
  stackTrace: "",
  context: {
    threadName: "main",
    pid: 100,
    memoryUsageMb: 12.5,
    heapUsedMb: 4,
    cpuUsagePercent: 0,
    sessionId: 2,
    additionalData: { k: 1 },
  },
  occurrenceCount: 2,
  firstSeen: AT,
  lastSeen: AT,
  resolutionStatus: "OPEN",
  resolutionNotes: "",
};

describe("escapeCsvValue", () => {
  it("quotes values containing separators and doubles embedded quotes", () => {
    expect(escapeCsvValue('bad, "quoted" value')).toBe('"bad, ""quoted"" value"');
    expect(escapeCsvValue("line\nbreak")).toBe('"line\nbreak"');
    expect(escapeCsvValue("plain")).toBe("plain");
    expect(escapeCsvValue(null)).toBe("");
  });
});

describe("flattenErrorRecord", () => {
  it("prefixes context entries and serializes nested data", () => {
    const row = flattenErrorRecord(record);
    expect(row.context_thread_name).toBe("main");
    expect(row.context_session_id).toBe(2);
    expect(row.context_additional_data).toBe('{"k":1}');
    expect(row.exception_type).toBe("SqliteError");
    expect(row).not.toHaveProperty("context");
  });
});

describe("toCsv", () => {
  it("writes a header with flattened context columns and one escaped row per record", () => {
    const [header, row, trailing] = toCsv([record]).split("\n");

    expect(header).toBe(
      "id,timestamp,severity,category,component,function,message,exception_type,stack_trace," +
        "occurrence_count,first_seen,last_seen,resolution_status,resolution_notes," +
        "context_thread_name,context_pid,context_memory_usage_mb,context_heap_used_mb," +
        "context_cpu_usage_percent,context_session_id,context_additional_data",
    );
    expect(row).toBe(
      '3,2024-05-01T12:00:00.000Z,HIGH,DATABASE,storage,saveGameState,"bad, ""quoted"" value",SqliteError,,' +
        "2,2024-05-01T12:00:00.000Z,2024-05-01T12:00:00.000Z,OPEN,," +
        'main,100,12.5,4,0,2,"{""k"":1}"',
    );
    expect(trailing).toBe("");
  });

  it("appends context columns in the order records first use them", () => {
    const base = { threadName: "main", pid: 100, memoryUsageMb: 12.5, heapUsedMb: 4, cpuUsagePercent: 0 };
    const first: ErrorRecord = { ...record, id: 4, context: { ...base, additionalData: {} } };
    const second: ErrorRecord = { ...record, id: 5, context: { ...base, frameNumber: 7, additionalData: {} } };

    const [header, firstRow] = toCsv([first, second]).split("\n");

    expect(header.split(",").slice(14)).toEqual([
      "context_thread_name",
      "context_pid",
      "context_memory_usage_mb",
      "context_heap_used_mb",
      "context_cpu_usage_percent",
      "context_additional_data",
      "context_frame_number",
    ]);
    expect(firstRow.endsWith(",{},")).toBe(true);
  });
});

describe("exportErrors", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "error-export-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes a JSON document with export info", () => {
    const filePath = exportErrors(
      { getErrors: () => [record] },
      "json",
      { severity: "HIGH" },
      { dir, now: () => AT.getTime() },
    );

    expect(filePath).toBe(join(dir, "error_export_2024-05-01_12-00-00-000Z.json"));
    const doc = JSON.parse(readFileSync(filePath, "utf-8"));
    expect(doc.export_info).toEqual({
      timestamp: "2024-05-01T12:00:00.000Z",
      total_errors: 1,
      filters_applied: { severity: "HIGH" },
    });
    expect(doc.errors[0].context.thread_name).toBe("main");
    expect(doc.errors[0].occurrence_count).toBe(2);
  });

  it("writes only a header when nothing matches", () => {
    const filePath = exportErrors({ getErrors: () => [] }, "csv", {}, { dir, now: () => AT.getTime() });
    expect(readFileSync(filePath, "utf-8").split("\n")[0].startsWith("id,timestamp,severity")).toBe(true);
  });
});
