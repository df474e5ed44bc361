import { z } from "zod";
import { PLAYER_ACTIONS } from "@/lib/card-detection/buttons";
import { RANKS, SUITS } from "@/lib/card-detection/types";
import { phaseForBoard } from "./phase";
import { GAME_PHASES, type GameState, type VisionMetrics } from "./types";

const cardJsonSchema = z.object({
  rank: z.union([z.enum(RANKS), z.literal("?")]),
  suit: z.union([z.enum(SUITS), z.literal("?")]),
  confidence: z.number().min(0).max(1),
  position: z.object({ x: z.number(), y: z.number() }),
  source: z.enum(["primary", "fallback"]),
});

const playerJsonSchema = z.object({
  position: z.number().int().nonnegative(),
  name: z.string(),
  stack_size: z.number().nonnegative(),
  hole_cards: z.array(cardJsonSchema),
  current_bet: z.number().nonnegative(),
  is_active: z.boolean(),
  is_current: z.boolean(),
});

export const gameStateJsonSchema = z
  .object({
    timestamp: z.string().datetime(),
    hand_id: z.string().min(1),
    phase: z.enum(GAME_PHASES),
    pot_size: z.number().nonnegative(),
    community_cards: z.array(cardJsonSchema),
    players: z.array(playerJsonSchema),
    timer_remaining: z.number().nonnegative(),
    available_actions: z.array(z.enum(PLAYER_ACTIONS)),
    betting_options: z.object({
      min_bet: z.number().nonnegative(),
      max_bet: z.number().nonnegative(),
      slider_positions: z.record(z.string(), z.number()),
    }),
  })
  .refine((state) => state.phase === phaseForBoard(state.community_cards.length), {
    message: "phase does not match the number of community cards",
    path: ["phase"],
  });

export type GameStateJson = z.infer<typeof gameStateJsonSchema>;

export function toGameStateJson(state: GameState): GameStateJson {
  return {
    timestamp: new Date(state.timestamp).toISOString(),
    hand_id: state.handId,
    phase: state.phase,
    pot_size: state.potSize,
    community_cards: state.communityCards,
    players: state.players.map((player) => ({
      position: player.position,
      name: player.name,
      stack_size: player.stackSize,
      hole_cards: player.holeCards,
      current_bet: player.currentBet,
      is_active: player.isActive,
      is_current: player.isCurrent,
    })),
    timer_remaining: state.timerRemaining,
    available_actions: state.availableActions,
    betting_options: {
      min_bet: state.bettingOptions.minBet,
      max_bet: state.bettingOptions.maxBet,
      slider_positions: state.bettingOptions.sliderPositions,
    },
  };
}

/** Validate snake_case JSON and rebuild the state. Players come back ordered by position. */
export function parseGameStateJson(input: unknown): GameState {
  const json = gameStateJsonSchema.parse(input);
  return {
    timestamp: Date.parse(json.timestamp),
    handId: json.hand_id,
    phase: json.phase,
    potSize: json.pot_size,
    communityCards: json.community_cards,
    players: json.players
      .map((player) => ({
        position: player.position,
        name: player.name,
        stackSize: player.stack_size,
        holeCards: player.hole_cards,
        currentBet: player.current_bet,
        isActive: player.is_active,
        isCurrent: player.is_current,
      }))
      .sort((a, b) => a.position - b.position),
    timerRemaining: json.timer_remaining,
    availableActions: json.available_actions,
    bettingOptions: {
      minBet: json.betting_options.min_bet,
      maxBet: json.betting_options.max_bet,
      sliderPositions: json.betting_options.slider_positions,
    },
  };
}

export interface VisionMetricsJson {
  timestamp: string;
  processing_time_ms: number;
  frame_rate: number;
  detection_confidence: number;
  text_confidence: number;
  elements_detected: number;
  elements_failed: number;
  error_details: string[];
}

export function toVisionMetricsJson(metrics: VisionMetrics): VisionMetricsJson {
  return {
    timestamp: new Date(metrics.timestamp).toISOString(),
    processing_time_ms: metrics.processingTimeMs,
    frame_rate: metrics.frameRate,
    detection_confidence: metrics.detectionConfidence,
    text_confidence: metrics.textConfidence,
    elements_detected: metrics.elementsDetected,
    elements_failed: metrics.elementsFailed,
    error_details: metrics.errorDetails,
  };
}
