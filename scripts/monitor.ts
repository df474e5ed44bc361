/**
 * Run the table monitor against the configured capture directory.
 *
 * Usage:
 *   tsx scripts/monitor.ts                  # run until Ctrl+C
 *   tsx scripts/monitor.ts --duration 30    # stop after 30 seconds
 *   tsx scripts/monitor.ts --source data/captures --fps 5
 */

import { loadSettings } from "../lib/config/settings";
import { ErrorStore } from "../lib/errors/error-store";
import { toGameStateJson } from "../lib/game-state/serialize";
import { createLogger } from "../lib/logging/logger";
import { createTableMonitor } from "../lib/monitor/create";
import type { TableMonitor } from "../lib/monitor/table-monitor";

const log = createLogger({ module: "scripts.monitor" });

function flag(args: string[], name: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  return i >= 0 ? args[i + 1] : undefined;
}

function printStats(monitor: TableMonitor) {
  const stats = monitor.getPerformanceStats();

  console.log("\nMonitor Stats");
  console.log("─".repeat(40));
  console.log(`Frames captured:   ${stats.capture.framesCaptured}`);
  console.log(`Frames dropped:    ${stats.capture.framesDropped}`);
  console.log(`Frames processed:  ${stats.framesProcessed}`);
  console.log(`States produced:   ${stats.statesProduced}`);
  console.log(`Current FPS:       ${stats.capture.currentFps.toFixed(1)}`);
  console.log(`Avg processing:    ${stats.averageProcessingTimeMs.toFixed(1)}ms`);

  if (stats.lastMetrics) {
    const m = stats.lastMetrics;
    console.log(
      `Last frame:        ${m.elementsDetected} detected, ${m.elementsFailed} failed, ` +
        `detection ${(m.detectionConfidence * 100).toFixed(1)}%, text ${(m.textConfidence * 100).toFixed(1)}%`,
    );
  }

  const session = monitor.getSessionStats();
  if (session) {
    console.log(
      `Session:           #${session.session.id} ${session.session.status}, ${session.handsPlayed} hands, ` +
        `${session.gameStatesRecorded} states`,
    );
  }

  const state = monitor.getCurrentGameState();
  if (state) {
    console.log("\nLast game state:");
    console.log(JSON.stringify(toGameStateJson(state), null, 2));
  }
}

async function main() {
  const args = process.argv.slice(2);
  const settings = loadSettings();

  const source = flag(args, "source");
  if (source) settings.capture.sourceDir = source;
  const fps = Number(flag(args, "fps"));
  if (Number.isFinite(fps) && fps > 0) settings.capture.fps = fps;
  const durationSec = Number(flag(args, "duration"));

  const reporter = new ErrorStore({ dbPath: settings.database.errorLogPath });
  const monitor = createTableMonitor(settings, { reporter });

  if (!(await monitor.start())) {
    log.error("Monitor failed to start; see the error log for details");
    process.exitCode = 1;
    return;
  }

  await new Promise<void>((resolve) => {
    const timer = Number.isFinite(durationSec) && durationSec > 0 ? setTimeout(resolve, durationSec * 1000) : null;
    process.once("SIGINT", () => {
      if (timer) clearTimeout(timer);
      resolve();
    });
  });

  await monitor.stop();
  printStats(monitor);
}

main().catch((err: unknown) => {
  log.fatal(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
