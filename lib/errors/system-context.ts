import { cpus } from "os";
import { isMainThread, threadId } from "worker_threads";
import type { ErrorContext } from "./types";

export type CpuUsage = {
  user: number;
  system: number;
};

type Clock = () => number;
type UsageProvider = () => CpuUsage;

type CpuMonitorOptions = {
  clock?: Clock;
  usageProvider?: UsageProvider;
  cpuCount?: number;
};

const MICROSECONDS_IN_MILLISECOND = 1000;
const BYTES_IN_MB = 1024 * 1024;

const round2 = (value: number) => Math.round(value * 100) / 100;

/**
 * Process CPU share since the previous sample, as a percentage of all cores.
 */
export class CpuMonitor {
  private readonly clock: Clock;
  private readonly usageProvider: UsageProvider;
  private readonly cpuCount: number;
  private lastUsage: CpuUsage;
  private lastSampleAt: number;

  constructor(options: CpuMonitorOptions = {}) {
    this.clock = options.clock ?? (() => performance.now());
    this.usageProvider = options.usageProvider ?? (() => process.cpuUsage());
    this.cpuCount = Math.max(1, options.cpuCount ?? (cpus().length || 1));
    this.lastUsage = this.usageProvider();
    this.lastSampleAt = this.clock();
  }

  sample(): number {
    const now = this.clock();
    const current = this.usageProvider();
    const deltaMicros = Math.max(
      current.user - this.lastUsage.user + (current.system - this.lastUsage.system),
      0,
    );
    const elapsedMs = Math.max(now - this.lastSampleAt, 1);

    this.lastUsage = current;
    this.lastSampleAt = now;

    const percent =
      (deltaMicros / MICROSECONDS_IN_MILLISECOND / elapsedMs / this.cpuCount) * 100;
    return Math.min(Math.max(percent, 0), 100);
  }
}

export function currentThreadName(): string {
  return isMainThread ? "main" : `worker-${threadId}`;
}

/** Snapshot memory, CPU and thread identity for an error record. */
export function captureSystemContext(
  cpu: CpuMonitor,
  extra: Pick<ErrorContext, "sessionId" | "frameNumber" | "processingTimeMs"> & {
    additionalData?: Record<string, unknown>;
  } = {},
): ErrorContext {
  const memory = process.memoryUsage();
  return {
    threadName: currentThreadName(),
    pid: process.pid,
    memoryUsageMb: round2(memory.rss / BYTES_IN_MB),
    heapUsedMb: round2(memory.heapUsed / BYTES_IN_MB),
    cpuUsagePercent: round2(cpu.sample()),
    ...(extra.sessionId !== undefined ? { sessionId: extra.sessionId } : {}),
    ...(extra.frameNumber !== undefined ? { frameNumber: extra.frameNumber } : {}),
    ...(extra.processingTimeMs !== undefined
      ? { processingTimeMs: extra.processingTimeMs }
      : {}),
    additionalData: extra.additionalData ?? {},
  };
}
