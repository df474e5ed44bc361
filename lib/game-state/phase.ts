import type { Logger } from "@/lib/logging/logger";
import type { GamePhase } from "./types";

const PHASE_BY_COUNT: Record<number, GamePhase> = {
  0: "PREFLOP",
  3: "FLOP",
  4: "TURN",
  5: "RIVER",
};

/** Phase from the number of community cards. Any other count is PREFLOP. */
export function phaseForBoard(cardCount: number, logger?: Logger): GamePhase {
  const phase = PHASE_BY_COUNT[cardCount];
  if (phase) return phase;

  logger?.warn(`Unexpected number of community cards: ${cardCount}`, { cardCount });
  return "PREFLOP";
}
