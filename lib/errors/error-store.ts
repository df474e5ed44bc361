import { createHash } from "crypto";
import { and, count, desc, eq, gte, like, lt, sql } from "drizzle-orm";
import { z } from "zod";
import { createLogger, type Logger } from "@/lib/logging/logger";
import { withDatabase } from "@/lib/storage/client";
import { type ErrorLogRow, errorLogs } from "@/lib/storage/schema";
import { captureSystemContext, CpuMonitor } from "./system-context";
import type {
  CategoryBreakdownEntry,
  ErrorContext,
  ErrorFilters,
  ErrorRecord,
  ErrorReporter,
  ErrorSeverity,
  ErrorSummary,
  LogErrorInput,
  PerformanceEventInput,
  BreakdownEntry,
  ErrorCategory,
} from "./types";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const DEDUP_MESSAGE_LENGTH = 100;
const RECENT_CRITICAL_LIMIT = 5;

export const DEFAULT_QUERY_LIMIT = 100;

const storedContextSchema = z.object({
  threadName: z.string().catch("unknown"),
  pid: z.number().catch(0),
  memoryUsageMb: z.number().catch(0),
  heapUsedMb: z.number().catch(0),
  cpuUsagePercent: z.number().catch(0),
  sessionId: z.number().optional().catch(undefined),
  frameNumber: z.number().optional().catch(undefined),
  processingTimeMs: z.number().optional().catch(undefined),
  additionalData: z.record(z.string(), z.unknown()).catch({}),
});

const EMPTY_CONTEXT: ErrorContext = {
  threadName: "unknown",
  pid: 0,
  memoryUsageMb: 0,
  heapUsedMb: 0,
  cpuUsagePercent: 0,
  additionalData: {},
};

export type ErrorStoreOptions = {
  dbPath: string;
  logger?: Logger;
  cpu?: CpuMonitor;
  now?: () => number;
};

/** Stable key for "the same error": component, function, exception type and message prefix. */
export function dedupKey(
  component: string,
  fn: string,
  exceptionType: string,
  message: string,
): string {
  return createHash("sha1")
    .update(`${component}:${fn}:${exceptionType}:${message.slice(0, DEDUP_MESSAGE_LENGTH)}`)
    .digest("hex");
}

function describeException(error: unknown): { exceptionType: string; stackTrace: string } {
  if (error instanceof Error) {
    return { exceptionType: error.name || error.constructor.name, stackTrace: error.stack ?? "" };
  }
  if (error !== undefined && error !== null) {
    return { exceptionType: typeof error, stackTrace: String(error) };
  }
  return { exceptionType: "", stackTrace: new Error().stack ?? "" };
}

function parseContext(json: string): ErrorContext {
  try {
    const parsed = storedContextSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : EMPTY_CONTEXT;
  } catch {
    return EMPTY_CONTEXT;
  }
}

function toRecord(row: ErrorLogRow): ErrorRecord {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    severity: row.severity,
    category: row.category,
    component: row.component,
    function: row.function,
    message: row.message,
    exceptionType: row.exceptionType,
    stackTrace: row.stackTrace,
    context: parseContext(row.contextJson),
    occurrenceCount: row.occurrenceCount,
    firstSeen: new Date(row.firstSeen),
    lastSeen: new Date(row.lastSeen),
    resolutionStatus: row.resolutionStatus,
    resolutionNotes: row.resolutionNotes,
  };
}

const totalOccurrences = sql<number>`coalesce(sum(${errorLogs.occurrenceCount}), 0)`.mapWith(Number);

/**
 * Durable, deduplicated error log backed by SQLite.
 *
 * Every call opens its own connection. better-sqlite3 runs synchronously, so
 * the dedup lookup and the write that follows it cannot interleave with
 * another `logError` call.
 */
export class ErrorStore implements ErrorReporter {
  private readonly dbPath: string;
  private readonly logger: Logger;
  private readonly cpu: CpuMonitor;
  private readonly now: () => number;
  private readonly cache = new Map<string, number>();

  constructor(options: ErrorStoreOptions) {
    this.dbPath = options.dbPath;
    this.logger = options.logger ?? createLogger({ module: "error-store" });
    this.cpu = options.cpu ?? new CpuMonitor();
    this.now = options.now ?? Date.now;
  }

  /** Record an error. Returns the row id, or -1 if the store itself failed. */
  logError(input: LogErrorInput): number {
    const { exceptionType, stackTrace } = describeException(input.error);
    const key = dedupKey(input.component, input.function, exceptionType, input.message);
    const context = captureSystemContext(this.cpu, {
      sessionId: input.sessionId,
      frameNumber: input.frameNumber,
      processingTimeMs: input.processingTimeMs,
      additionalData: input.data,
    });
    const timestamp = this.now();

    let id: number;
    try {
      id = withDatabase(this.dbPath, (db) => {
        const cachedId = this.cache.get(key);
        const existing =
          (cachedId !== undefined
            ? db.select().from(errorLogs).where(eq(errorLogs.id, cachedId)).get()
            : undefined) ??
          db
            .select()
            .from(errorLogs)
            .where(eq(errorLogs.dedupKey, key))
            .orderBy(desc(errorLogs.lastSeen))
            .get();

        if (existing) {
          db.update(errorLogs)
            .set({
              occurrenceCount: existing.occurrenceCount + 1,
              lastSeen: timestamp,
              contextJson: JSON.stringify(context),
            })
            .where(eq(errorLogs.id, existing.id))
            .run();
          return existing.id;
        }

        const inserted = db
          .insert(errorLogs)
          .values({
            dedupKey: key,
            timestamp,
            severity: input.severity,
            category: input.category,
            component: input.component,
            function: input.function,
            message: input.message,
            exceptionType,
            stackTrace,
            contextJson: JSON.stringify(context),
            occurrenceCount: 1,
            firstSeen: timestamp,
            lastSeen: timestamp,
          })
          .returning({ id: errorLogs.id })
          .get();
        return inserted.id;
      });
      this.cache.set(key, id);
    } catch (err) {
      this.logger.error("Failed to persist error record", {
        cause: err instanceof Error ? err.message : String(err),
        component: input.component,
        function: input.function,
      });
      id = -1;
    }

    this.mirror(input.severity, `[${input.category}] ${input.component}.${input.function}: ${input.message}`);
    return id;
  }

  logPerformance(message: string, input: PerformanceEventInput): number {
    const data: Record<string, unknown> = { ...input.data };
    if (input.processingTimeMs !== undefined) {
      data.processing_time_ms = input.processingTimeMs;
    }
    return this.logError({
      severity: input.severity ?? "LOW",
      category: "PERFORMANCE",
      message,
      component: input.component,
      function: input.function,
      processingTimeMs: input.processingTimeMs,
      data,
    });
  }

  /** Filtered records, newest first. */
  getErrors(filters: ErrorFilters = {}): ErrorRecord[] {
    const conditions = [
      filters.severity ? eq(errorLogs.severity, filters.severity) : undefined,
      filters.category ? eq(errorLogs.category, filters.category) : undefined,
      filters.component ? like(errorLogs.component, `%${filters.component}%`) : undefined,
      filters.hours !== undefined ? gte(errorLogs.timestamp, this.now() - filters.hours * HOUR_MS) : undefined,
    ];

    return withDatabase(this.dbPath, (db) =>
      db
        .select()
        .from(errorLogs)
        .where(and(...conditions))
        .orderBy(desc(errorLogs.timestamp), desc(errorLogs.id))
        .limit(filters.limit ?? DEFAULT_QUERY_LIMIT)
        .all()
        .map(toRecord),
    );
  }

  getSummary(hours = 24, topN = 10): ErrorSummary {
    const generatedAt = this.now();
    const since = gte(errorLogs.timestamp, generatedAt - hours * HOUR_MS);

    return withDatabase(this.dbPath, (db) => {
      const bySeverity = db
        .select({ severity: errorLogs.severity, unique: count(), total: totalOccurrences })
        .from(errorLogs)
        .where(since)
        .groupBy(errorLogs.severity)
        .all();

      const byCategory = db
        .select({ category: errorLogs.category, unique: count(), total: totalOccurrences })
        .from(errorLogs)
        .where(since)
        .groupBy(errorLogs.category)
        .all();

      const topErrorSources = db
        .select({
          component: errorLogs.component,
          function: errorLogs.function,
          unique: count(),
          total: totalOccurrences,
        })
        .from(errorLogs)
        .where(since)
        .groupBy(errorLogs.component, errorLogs.function)
        .orderBy(desc(totalOccurrences))
        .limit(topN)
        .all();

      const critical = db
        .select()
        .from(errorLogs)
        .where(and(since, eq(errorLogs.severity, "CRITICAL")))
        .orderBy(desc(errorLogs.timestamp), desc(errorLogs.id))
        .limit(RECENT_CRITICAL_LIMIT)
        .all();

      const severityBreakdown: Partial<Record<ErrorSeverity, BreakdownEntry>> = {};
      for (const row of bySeverity) {
        severityBreakdown[row.severity] = { unique: row.unique, total: row.total };
      }

      const categoryBreakdown: Partial<Record<ErrorCategory, CategoryBreakdownEntry>> = {};
      for (const row of byCategory) {
        categoryBreakdown[row.category] = {
          unique: row.unique,
          total: row.total,
          perHour: hours > 0 ? row.total / hours : row.total,
        };
      }

      return {
        timeRangeHours: hours,
        generatedAt: new Date(generatedAt),
        severityBreakdown,
        categoryBreakdown,
        topErrorSources,
        recentCriticalErrors: critical.map((row) => ({
          id: row.id,
          timestamp: new Date(row.timestamp),
          component: row.component,
          function: row.function,
          message: row.message,
          count: row.occurrenceCount,
        })),
        totalUniqueErrors: bySeverity.reduce((sum, row) => sum + row.unique, 0),
        totalErrorOccurrences: bySeverity.reduce((sum, row) => sum + row.total, 0),
      };
    });
  }

  markResolved(id: number, notes = ""): boolean {
    const result = withDatabase(this.dbPath, (db) =>
      db
        .update(errorLogs)
        .set({ resolutionStatus: "RESOLVED", resolutionNotes: notes })
        .where(eq(errorLogs.id, id))
        .run(),
    );
    return result.changes > 0;
  }

  /** Delete resolved records older than `days`. Open records are never removed. */
  cleanup(days = 30, options: { dryRun?: boolean } = {}): number {
    const cutoff = this.now() - days * DAY_MS;
    const stale = and(lt(errorLogs.timestamp, cutoff), eq(errorLogs.resolutionStatus, "RESOLVED"));

    const removed = withDatabase(this.dbPath, (db) => {
      const rows = db.select({ id: errorLogs.id, dedupKey: errorLogs.dedupKey }).from(errorLogs).where(stale).all();
      if (!options.dryRun && rows.length > 0) {
        db.delete(errorLogs).where(stale).run();
      }
      return rows;
    });

    if (!options.dryRun) {
      for (const row of removed) {
        if (this.cache.get(row.dedupKey) === row.id) this.cache.delete(row.dedupKey);
      }
      this.logger.info(`Cleaned up ${removed.length} old error records`);
    }
    return removed.length;
  }

  private mirror(severity: ErrorSeverity, line: string): void {
    switch (severity) {
      case "CRITICAL":
        this.logger.fatal(line);
        break;
      case "HIGH":
        this.logger.error(line);
        break;
      case "MEDIUM":
        this.logger.warn(line);
        break;
      default:
        this.logger.info(line);
    }
  }
}
