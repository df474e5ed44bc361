export const ERROR_SEVERITIES = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"] as const;
export type ErrorSeverity = (typeof ERROR_SEVERITIES)[number];

export const ERROR_CATEGORIES = [
  "VISION",
  "CAPTURE",
  "DATABASE",
  "GUI",
  "NETWORK",
  "FILE_SYSTEM",
  "CONFIGURATION",
  "PERFORMANCE",
  "UNKNOWN",
] as const;
export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export const RESOLUTION_STATUSES = ["OPEN", "IN_PROGRESS", "RESOLVED", "IGNORED"] as const;
export type ResolutionStatus = (typeof RESOLUTION_STATUSES)[number];

/** Process snapshot attached to every error. */
export interface ErrorContext {
  threadName: string;
  pid: number;
  memoryUsageMb: number;
  heapUsedMb: number;
  cpuUsagePercent: number;
  sessionId?: number;
  frameNumber?: number;
  processingTimeMs?: number;
  additionalData: Record<string, unknown>;
}

export interface ErrorRecord {
  id: number;
  timestamp: Date;
  severity: ErrorSeverity;
  category: ErrorCategory;
  component: string;
  function: string;
  message: string;
  exceptionType: string;
  stackTrace: string;
  context: ErrorContext;
  occurrenceCount: number;
  firstSeen: Date;
  lastSeen: Date;
  resolutionStatus: ResolutionStatus;
  resolutionNotes: string;
}

export interface LogErrorInput {
  severity: ErrorSeverity;
  category: ErrorCategory;
  message: string;
  component: string;
  function: string;
  error?: unknown;
  sessionId?: number;
  frameNumber?: number;
  processingTimeMs?: number;
  data?: Record<string, unknown>;
}

export interface PerformanceEventInput {
  component: string;
  function: string;
  processingTimeMs?: number;
  severity?: ErrorSeverity;
  data?: Record<string, unknown>;
}

/**
 * What pipeline components need from the error subsystem.
 * Implemented by ErrorStore; tests can substitute a recorder.
 */
export interface ErrorReporter {
  logError(input: LogErrorInput): number;
  logPerformance(message: string, input: PerformanceEventInput): number;
}

export interface ErrorFilters {
  severity?: ErrorSeverity;
  category?: ErrorCategory;
  component?: string;
  hours?: number;
  limit?: number;
}

export interface BreakdownEntry {
  unique: number;
  total: number;
}

export interface CategoryBreakdownEntry extends BreakdownEntry {
  perHour: number;
}

export interface ErrorSource {
  component: string;
  function: string;
  unique: number;
  total: number;
}

export interface CriticalErrorEntry {
  id: number;
  timestamp: Date;
  component: string;
  function: string;
  message: string;
  count: number;
}

export interface ErrorSummary {
  timeRangeHours: number;
  generatedAt: Date;
  severityBreakdown: Partial<Record<ErrorSeverity, BreakdownEntry>>;
  categoryBreakdown: Partial<Record<ErrorCategory, CategoryBreakdownEntry>>;
  topErrorSources: ErrorSource[];
  recentCriticalErrors: CriticalErrorEntry[];
  totalUniqueErrors: number;
  totalErrorOccurrences: number;
}
