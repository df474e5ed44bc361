import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { ErrorFilters, ErrorRecord } from "./types";

export const EXPORT_FORMATS = ["json", "csv"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

type ExportSource = { getErrors(filters?: ErrorFilters): ErrorRecord[] };

type ExportOptions = {
  dir?: string;
  now?: () => number;
};

type FlatValue = string | number | boolean | null;

const BASE_COLUMNS = [
  "id",
  "timestamp",
  "severity",
  "category",
  "component",
  "function",
  "message",
  "exception_type",
  "stack_trace",
  "occurrence_count",
  "first_seen",
  "last_seen",
  "resolution_status",
  "resolution_notes",
] as const;

const toSnakeCase = (value: string) => value.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export function serializeErrorRecord(record: ErrorRecord) {
  return {
    id: record.id,
    timestamp: record.timestamp.toISOString(),
    severity: record.severity,
    category: record.category,
    component: record.component,
    function: record.function,
    message: record.message,
    exception_type: record.exceptionType,
    stack_trace: record.stackTrace,
    occurrence_count: record.occurrenceCount,
    first_seen: record.firstSeen.toISOString(),
    last_seen: record.lastSeen.toISOString(),
    resolution_status: record.resolutionStatus,
    resolution_notes: record.resolutionNotes,
    context: Object.fromEntries(
      Object.entries(record.context).map(([key, value]) => [toSnakeCase(key), value]),
    ),
  };
}

/** One flat row per record; context entries become `context_<key>` columns. */
export function flattenErrorRecord(record: ErrorRecord): Record<string, FlatValue> {
  const { context, ...base } = serializeErrorRecord(record);
  const row: Record<string, FlatValue> = { ...base };

  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    row[`context_${key}`] =
      typeof value === "string" || typeof value === "number" || typeof value === "boolean"
        ? value
        : JSON.stringify(value);
  }
  return row;
}

export function escapeCsvValue(value: FlatValue): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(records: ErrorRecord[]): string {
  const rows = records.map(flattenErrorRecord);
  const columns: string[] = [...BASE_COLUMNS];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }

  const lines = [columns.join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvValue(row[column] ?? null)).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function toJsonExport(records: ErrorRecord[], filters: ErrorFilters, exportedAt: Date): string {
  return JSON.stringify(
    {
      export_info: {
        timestamp: exportedAt.toISOString(),
        total_errors: records.length,
        filters_applied: filters,
      },
      errors: records.map(serializeErrorRecord),
    },
    null,
    2,
  );
}

/** Write the filtered records to `<dir>/error_export_<time>.<format>` and return the path. */
export function exportErrors(
  source: ExportSource,
  format: ExportFormat,
  filters: ErrorFilters = {},
  options: ExportOptions = {},
): string {
  const exportedAt = new Date((options.now ?? Date.now)());
  const records = source.getErrors(filters);
  const stamp = exportedAt.toISOString().replace(/[:.]/g, "-").replace("T", "_");
  const dir = options.dir ?? "logs";

  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, `error_export_${stamp}.${format}`);
  const body = format === "json" ? toJsonExport(records, filters, exportedAt) : toCsv(records);
  writeFileSync(filePath, body, "utf-8");
  return filePath;
}
