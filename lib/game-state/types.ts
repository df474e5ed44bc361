import type { PlayerAction } from "@/lib/card-detection/buttons";
import type { Card } from "@/lib/card-detection/types";
import type { BettingOptions } from "@/lib/config/settings";

export const GAME_PHASES = ["PREFLOP", "FLOP", "TURN", "RIVER"] as const;
export type GamePhase = (typeof GAME_PHASES)[number];

export interface Player {
  position: number;
  name: string;
  stackSize: number;
  holeCards: Card[];
  currentBet: number;
  isActive: boolean;
  isCurrent: boolean;
}

export interface GameState {
  /** Epoch ms of the frame the state was built from. */
  timestamp: number;
  handId: string;
  phase: GamePhase;
  potSize: number;
  /** Left to right. */
  communityCards: Card[];
  /** Ordered by position. */
  players: Player[];
  /** Seconds; 0 when no timer was read. */
  timerRemaining: number;
  availableActions: PlayerAction[];
  bettingOptions: BettingOptions;
}

export interface VisionMetrics {
  timestamp: number;
  processingTimeMs: number;
  frameRate: number;
  /** Mean confidence of primary-detector cards; 0 when there were none. */
  detectionConfidence: number;
  /** Mean confidence of accepted text fields; 0 when none were accepted. */
  textConfidence: number;
  elementsDetected: number;
  elementsFailed: number;
  errorDetails: string[];
}
