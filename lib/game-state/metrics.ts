import { type ExtractionResult, POT_DISPLAY, TIMER } from "@/lib/extraction/pipeline";
import type { ParsedField } from "@/lib/text-recognition/fields";
import type { GameState, VisionMetrics } from "./types";

export interface MetricsInput {
  timestamp: number;
  processingTimeMs: number;
  frameRate: number;
  state: GameState | null;
  extraction: ExtractionResult | null;
  error?: unknown;
}

const mean = (values: number[]) =>
  values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Per-frame vision metrics. Fallback cards never count toward detection
 * confidence; a frame without state counts as one failed element.
 */
export function computeVisionMetrics(input: MetricsInput): VisionMetrics {
  const { state, extraction } = input;
  const base = {
    timestamp: input.timestamp,
    processingTimeMs: Math.round(input.processingTimeMs),
    frameRate: input.frameRate,
  };

  if (!state || !extraction) {
    const reason = input.error instanceof Error ? input.error.message : "no game state";
    return {
      ...base,
      detectionConfidence: 0,
      textConfidence: 0,
      elementsDetected: 0,
      elementsFailed: 1,
      errorDetails: [`Failed to parse game state: ${reason}`],
    };
  }

  const errorDetails = extraction.missingRegions.map((name) => `Region not configured: ${name}`);

  const primaryCards = [...state.communityCards, ...state.players.flatMap((p) => p.holeCards)].filter(
    (card) => card.source === "primary",
  );

  const expected: [string, ParsedField<unknown> | null][] = [];
  if (!extraction.missingRegions.includes(POT_DISPLAY)) expected.push(["pot", extraction.pot]);
  if (!extraction.missingRegions.includes(TIMER)) expected.push(["timer", extraction.timer]);
  for (const seat of extraction.seats) {
    expected.push([`player_${seat.position} name`, seat.name], [`player_${seat.position} stack`, seat.stack]);
  }

  const unread = expected.filter(([, field]) => !field);
  for (const [label] of unread) errorDetails.push(`${label} not read`);

  // Bets are usually absent, so a missing bet is not a failure.
  const accepted = [
    ...expected.flatMap(([, field]) => (field ? [field.confidence] : [])),
    ...extraction.seats.flatMap((seat) => (seat.bet ? [seat.bet.confidence] : [])),
  ];

  const detectorErrors = extraction.cardDetections.filter((d) => d.outcome.kind === "error");
  for (const detection of detectorErrors) {
    errorDetails.push(`Card detector error in ${detection.region}`);
  }

  return {
    ...base,
    detectionConfidence: mean(primaryCards.map((card) => card.confidence)),
    textConfidence: mean(accepted),
    elementsDetected: state.communityCards.length + state.players.length + accepted.length,
    elementsFailed: unread.length + detectorErrors.length + extraction.missingRegions.length,
    errorDetails,
  };
}
