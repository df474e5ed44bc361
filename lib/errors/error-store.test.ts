import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger, type Logger } from "@/lib/logging/logger";
import { dedupKey, ErrorStore } from "./error-store";

const HOUR_MS = 60 * 60 * 1000;
const START = Date.UTC(2024, 4, 1, 12, 0, 0);

describe("ErrorStore", () => {
  let dir: string;
  let dbPath: string;
  let clock: number;

  const createStore = (logger: Logger = silentLogger) =>
    new ErrorStore({ dbPath, logger, now: () => clock });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "error-store-"));
    dbPath = join(dir, "errors.db");
    clock = START;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("dedupKey", () => {
    it("only considers the first 100 characters of the message", () => {
      const base = "x".repeat(100);
      expect(dedupKey("c", "f", "Error", `${base}tail-a`)).toBe(
        dedupKey("c", "f", "Error", `${base}tail-b`),
      );
    });

    it("differs when the exception type differs", () => {
      expect(dedupKey("c", "f", "TypeError", "m")).not.toBe(dedupKey("c", "f", "RangeError", "m"));
    });
  });

  describe("logError", () => {
    it("stores a repeat as one record with an incremented count", () => {
      const store = createStore();
      const input = {
        severity: "MEDIUM" as const,
        category: "VISION" as const,
        message: "template match failed",
        component: "card-detection",
        function: "detect",
      };

      const firstId = store.logError({ ...input, error: new Error("boom") });
      clock = START + 4000;
      const secondId = store.logError({ ...input, error: new Error("boom") });

      expect(secondId).toBe(firstId);
      const records = store.getErrors();
      expect(records).toHaveLength(1);
      expect(records[0].occurrenceCount).toBe(2);
      expect(records[0].firstSeen.getTime()).toBe(START);
      expect(records[0].lastSeen.getTime()).toBe(START + 4000);
      expect(records[0].exceptionType).toBe("Error");
    });

    it("keeps deduplicating across store instances on the same database", () => {
      const input = {
        severity: "HIGH" as const,
        category: "DATABASE" as const,
        message: "disk full",
        component: "storage",
        function: "saveGameState",
      };

      const id = createStore().logError(input);
      const again = createStore().logError(input);

      expect(again).toBe(id);
      expect(createStore().getErrors()[0].occurrenceCount).toBe(2);
    });

    it("creates separate records for different messages", () => {
      const store = createStore();
      store.logError({ severity: "LOW", category: "UNKNOWN", message: "a", component: "c", function: "f" });
      store.logError({ severity: "LOW", category: "UNKNOWN", message: "b", component: "c", function: "f" });

      expect(store.getErrors()).toHaveLength(2);
    });

    it("attaches a process snapshot and caller data to the context", () => {
      const store = createStore();
      store.logError({
        severity: "INFO",
        category: "CAPTURE",
        message: "frame skipped",
        component: "capture",
        function: "produce",
        sessionId: 7,
        frameNumber: 42,
        data: { reason: "test" },
      });

      const [record] = store.getErrors();
      expect(record.context.pid).toBe(process.pid);
      expect(record.context.threadName).toBe("main");
      expect(record.context.sessionId).toBe(7);
      expect(record.context.frameNumber).toBe(42);
      expect(record.context.additionalData).toEqual({ reason: "test" });
      expect(record.context.memoryUsageMb).toBeGreaterThan(0);
    });

    it("mirrors each error to the logger at a level matching its severity", () => {
      const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        fatal: vi.fn(),
      };
      const store = createStore(logger);

      store.logError({ severity: "CRITICAL", category: "CAPTURE", message: "gone", component: "capture", function: "open" });
      store.logError({ severity: "MEDIUM", category: "VISION", message: "slow", component: "ocr", function: "read" });

      expect(logger.fatal).toHaveBeenCalledWith("[CAPTURE] capture.open: gone");
      expect(logger.warn).toHaveBeenCalledWith("[VISION] ocr.read: slow");
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe("logPerformance", () => {
    it("records a PERFORMANCE event with the processing time in its data", () => {
      const store = createStore();
      store.logPerformance("slow frame handler", {
        component: "capture",
        function: "consume",
        processingTimeMs: 120,
        severity: "MEDIUM",
        data: { callback_time_ms: 120 },
      });

      const [record] = store.getErrors();
      expect(record.category).toBe("PERFORMANCE");
      expect(record.severity).toBe("MEDIUM");
      expect(record.context.processingTimeMs).toBe(120);
      expect(record.context.additionalData).toEqual({ callback_time_ms: 120, processing_time_ms: 120 });
    });
  });

  describe("getErrors", () => {
    beforeEach(() => {
      const store = createStore();
      clock = START - 3 * HOUR_MS;
      store.logError({ severity: "HIGH", category: "CAPTURE", message: "old", component: "capture.scheduler", function: "produce" });
      clock = START - HOUR_MS / 2;
      store.logError({ severity: "MEDIUM", category: "VISION", message: "mid", component: "card-detection", function: "detect" });
      clock = START;
      store.logError({ severity: "HIGH", category: "VISION", message: "new", component: "text-recognition", function: "read" });
    });

    it("returns newest first", () => {
      expect(createStore().getErrors().map((r) => r.message)).toEqual(["new", "mid", "old"]);
    });

    it("filters by severity, category and component substring", () => {
      const store = createStore();
      expect(store.getErrors({ severity: "HIGH" }).map((r) => r.message)).toEqual(["new", "old"]);
      expect(store.getErrors({ category: "VISION" }).map((r) => r.message)).toEqual(["new", "mid"]);
      expect(store.getErrors({ component: "detection" }).map((r) => r.message)).toEqual(["mid"]);
    });

    it("filters by a trailing time window and caps the result count", () => {
      const store = createStore();
      expect(store.getErrors({ hours: 1 }).map((r) => r.message)).toEqual(["new", "mid"]);
      expect(store.getErrors({ limit: 1 }).map((r) => r.message)).toEqual(["new"]);
    });

    it("treats a zero-hour window as now onwards", () => {
      expect(createStore().getErrors({ hours: 0 }).map((r) => r.message)).toEqual(["new"]);
    });
  });

  describe("getSummary", () => {
    it("breaks down the window by severity, category and source", () => {
      const store = createStore();
      clock = START - 48 * HOUR_MS;
      store.logError({ severity: "LOW", category: "GUI", message: "ancient", component: "dashboard", function: "paint" });

      clock = START - 2 * HOUR_MS;
      const vision = { severity: "MEDIUM" as const, category: "VISION" as const, message: "blur", component: "ocr", function: "read" };
      store.logError(vision);
      store.logError(vision);
      clock = START - HOUR_MS;
      store.logError({ severity: "CRITICAL", category: "CAPTURE", message: "source lost", component: "capture", function: "produce" });
      clock = START;

      const summary = store.getSummary(24);

      expect(summary.timeRangeHours).toBe(24);
      expect(summary.generatedAt.getTime()).toBe(START);
      expect(summary.severityBreakdown).toEqual({
        MEDIUM: { unique: 1, total: 2 },
        CRITICAL: { unique: 1, total: 1 },
      });
      expect(summary.categoryBreakdown.VISION).toEqual({ unique: 1, total: 2, perHour: 2 / 24 });
      expect(summary.categoryBreakdown.GUI).toBeUndefined();
      expect(summary.topErrorSources[0]).toEqual({ component: "ocr", function: "read", unique: 1, total: 2 });
      expect(summary.recentCriticalErrors).toHaveLength(1);
      expect(summary.recentCriticalErrors[0].message).toBe("source lost");
      expect(summary.totalUniqueErrors).toBe(2);
      expect(summary.totalErrorOccurrences).toBe(3);
    });
  });

  describe("cleanup", () => {
    it("removes only records that are both old and resolved", () => {
      const store = createStore();
      clock = START - 40 * 24 * HOUR_MS;
      const oldResolved = store.logError({ severity: "LOW", category: "VISION", message: "old resolved", component: "c", function: "f" });
      store.logError({ severity: "LOW", category: "VISION", message: "old open", component: "c", function: "f" });
      clock = START;
      const recentResolved = store.logError({ severity: "LOW", category: "VISION", message: "recent resolved", component: "c", function: "f" });

      expect(store.markResolved(oldResolved, "fixed")).toBe(true);
      expect(store.markResolved(recentResolved)).toBe(true);

      expect(store.cleanup(30, { dryRun: true })).toBe(1);
      expect(store.getErrors()).toHaveLength(3);

      expect(store.cleanup(30)).toBe(1);
      expect(store.getErrors().map((r) => r.message).sort()).toEqual(["old open", "recent resolved"]);
    });

    it("starts a fresh record after a cleaned-up error recurs", () => {
      const store = createStore();
      const input = { severity: "LOW" as const, category: "VISION" as const, message: "flaky", component: "c", function: "f" };
      clock = START - 40 * 24 * HOUR_MS;
      const id = store.logError(input);
      store.markResolved(id);
      clock = START;
      store.cleanup(30);

      const next = store.logError(input);
      expect(next).not.toBe(id);
      expect(store.getErrors()[0].occurrenceCount).toBe(1);
    });
  });

  it("reports markResolved on an unknown id as false", () => {
    expect(createStore().markResolved(999)).toBe(false);
  });
});
