/**
 * Inspect and maintain the error log.
 *
 * Usage:
 *   tsx scripts/analyze-errors.ts summary [--hours 24]
 *   tsx scripts/analyze-errors.ts list [--severity HIGH] [--category VISION] [--component capture] [--hours 24] [--limit 50]
 *   tsx scripts/analyze-errors.ts export [--format json|csv] [filters...]
 *   tsx scripts/analyze-errors.ts cleanup [--days 30] [--dry-run]
 *   tsx scripts/analyze-errors.ts resolve <id> [notes...]
 */

import { loadSettings } from "../lib/config/settings";
import { ErrorStore } from "../lib/errors/error-store";
import { EXPORT_FORMATS, exportErrors, isExportFormat } from "../lib/errors/export";
import {
  ERROR_CATEGORIES,
  ERROR_SEVERITIES,
  type ErrorCategory,
  type ErrorFilters,
  type ErrorSeverity,
} from "../lib/errors/types";
import { formatDistribution, formatRelativeTime, truncate } from "../lib/utils/format";

const COMMANDS = ["summary", "list", "export", "cleanup", "resolve"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isSeverity(value: string): value is ErrorSeverity {
  return ERROR_SEVERITIES.some((severity) => severity === value);
}

function isCategory(value: string): value is ErrorCategory {
  return ERROR_CATEGORIES.some((category) => category === value);
}

function flag(args: string[], name: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  return i >= 0 ? args[i + 1] : undefined;
}

function numberFlag(args: string[], name: string, fallback: number): number {
  const raw = flag(args, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`--${name} expects a non-negative number, got "${raw}"`);
  }
  return value;
}

function parseFilters(args: string[]): ErrorFilters {
  const filters: ErrorFilters = {};

  const severity = flag(args, "severity")?.toUpperCase();
  if (severity !== undefined) {
    if (!isSeverity(severity)) throw new Error(`Unknown severity "${severity}" (${ERROR_SEVERITIES.join(", ")})`);
    filters.severity = severity;
  }

  const category = flag(args, "category")?.toUpperCase();
  if (category !== undefined) {
    if (!isCategory(category)) throw new Error(`Unknown category "${category}" (${ERROR_CATEGORIES.join(", ")})`);
    filters.category = category;
  }

  const component = flag(args, "component");
  if (component) filters.component = component;

  if (flag(args, "hours") !== undefined) filters.hours = numberFlag(args, "hours", 24);
  if (flag(args, "limit") !== undefined) filters.limit = numberFlag(args, "limit", 100);
  return filters;
}

function printSummary(store: ErrorStore, hours: number) {
  const summary = store.getSummary(hours);

  console.log(`Error Summary (last ${summary.timeRangeHours}h)`);
  console.log("─".repeat(40));
  console.log(`Unique errors:     ${summary.totalUniqueErrors}`);
  console.log(`Total occurrences: ${summary.totalErrorOccurrences}`);

  if (summary.totalUniqueErrors === 0) {
    console.log("\nNo errors recorded in this window.");
    return;
  }

  const bySeverity: Record<string, number> = {};
  for (const [severity, entry] of Object.entries(summary.severityBreakdown)) {
    bySeverity[severity] = entry.total;
  }
  console.log("\nBy severity:");
  console.log(formatDistribution(bySeverity, summary.totalErrorOccurrences));

  console.log("\nBy category:");
  for (const [category, entry] of Object.entries(summary.categoryBreakdown)) {
    console.log(`  ${category}: ${entry.total} (${entry.unique} unique, ${entry.perHour.toFixed(2)}/h)`);
  }

  console.log("\nTop sources:");
  for (const source of summary.topErrorSources) {
    console.log(`  ${source.component}.${source.function}: ${source.total} (${source.unique} unique)`);
  }

  if (summary.recentCriticalErrors.length > 0) {
    console.log("\nRecent critical errors:");
    for (const entry of summary.recentCriticalErrors) {
      console.log(
        `  #${entry.id} ${formatRelativeTime(entry.timestamp.getTime())} ${entry.component}.${entry.function}: ${truncate(entry.message, 80)} (x${entry.count})`,
      );
    }
  }
}

function printList(store: ErrorStore, filters: ErrorFilters) {
  const records = store.getErrors(filters);
  if (records.length === 0) {
    console.log("No matching errors.");
    return;
  }

  for (const record of records) {
    console.log(
      `#${record.id} ${record.timestamp.toISOString()} ${record.severity.padEnd(8)} ${record.category.padEnd(13)} ` +
        `${record.component}.${record.function} x${record.occurrenceCount} [${record.resolutionStatus}]`,
    );
    console.log(`    ${truncate(record.message, 100)}`);
  }
  console.log(`\n${records.length} record(s)`);
}

function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!isCommand(command)) {
    console.log(`Usage: analyze-errors <${COMMANDS.join("|")}> [options]`);
    process.exitCode = 1;
    return;
  }

  const settings = loadSettings();
  const store = new ErrorStore({ dbPath: settings.database.errorLogPath });

  switch (command) {
    case "summary":
      printSummary(store, numberFlag(args, "hours", 24));
      break;
    case "list":
      printList(store, parseFilters(args));
      break;
    case "export": {
      const format = flag(args, "format") ?? "json";
      if (!isExportFormat(format)) {
        throw new Error(`Unknown format "${format}" (${EXPORT_FORMATS.join(", ")})`);
      }
      const path = exportErrors(store, format, parseFilters(args));
      console.log(`Exported to ${path}`);
      break;
    }
    case "cleanup": {
      const days = numberFlag(args, "days", settings.database.retentionDays);
      const dryRun = args.includes("--dry-run");
      const removed = store.cleanup(days, { dryRun });
      console.log(
        dryRun
          ? `Would remove ${removed} resolved record(s) older than ${days} days`
          : `Removed ${removed} resolved record(s) older than ${days} days`,
      );
      break;
    }
    case "resolve": {
      const id = Number(args[1]);
      if (!Number.isInteger(id) || id <= 0) {
        throw new Error("resolve expects a record id");
      }
      const notes = args.slice(2).join(" ");
      console.log(store.markResolved(id, notes) ? `Marked #${id} resolved` : `No record #${id}`);
      break;
    }
  }
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
