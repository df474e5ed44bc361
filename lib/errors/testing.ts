import type { ErrorReporter, LogErrorInput, PerformanceEventInput } from "./types";

export type RecordedPerformanceEvent = { message: string; input: PerformanceEventInput };

/** In-memory ErrorReporter for tests: keeps every call in order. */
export class RecordingReporter implements ErrorReporter {
  readonly errors: LogErrorInput[] = [];
  readonly performance: RecordedPerformanceEvent[] = [];

  logError(input: LogErrorInput): number {
    this.errors.push(input);
    return this.errors.length;
  }

  logPerformance(message: string, input: PerformanceEventInput): number {
    this.performance.push({ message, input });
    return this.performance.length;
  }
}
