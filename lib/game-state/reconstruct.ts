import type { Frame } from "@/lib/capture/types";
import type { BettingOptions } from "@/lib/config/settings";
import type { ErrorReporter } from "@/lib/errors/types";
import type { ExtractionPipeline, ExtractionResult, SeatObservation } from "@/lib/extraction/pipeline";
import { createLogger, type Logger } from "@/lib/logging/logger";
import { HandTracker, identifiedCodes } from "./hand-identity";
import { phaseForBoard } from "./phase";
import type { GameState, Player } from "./types";

const COMPONENT = "game-state.reconstruct";

export interface FrameAnalysis {
  /** Null when extraction or assembly failed for this frame. */
  state: GameState | null;
  extraction: ExtractionResult | null;
  error: unknown;
}

export interface StateReconstructorOptions {
  pipeline: ExtractionPipeline;
  reporter: ErrorReporter;
  bettingOptions: BettingOptions;
  hands?: HandTracker;
  logger?: Logger;
}

export const defaultPlayerName = (position: number) => `Player_${position}`;

export function toPlayer(seat: SeatObservation): Player {
  return {
    position: seat.position,
    name: seat.name?.value ?? defaultPlayerName(seat.position),
    stackSize: seat.stack?.value ?? 0,
    holeCards: seat.holeCards,
    currentBet: seat.bet?.value ?? 0,
    isActive: seat.status.isActive,
    isCurrent: seat.status.isCurrent,
  };
}

/** One GameState per frame, or none when any step throws. */
export class StateReconstructor {
  readonly hands: HandTracker;
  private readonly pipeline: ExtractionPipeline;
  private readonly reporter: ErrorReporter;
  private readonly bettingOptions: BettingOptions;
  private readonly logger: Logger;

  constructor(options: StateReconstructorOptions) {
    this.pipeline = options.pipeline;
    this.reporter = options.reporter;
    this.bettingOptions = options.bettingOptions;
    this.hands = options.hands ?? new HandTracker();
    this.logger = options.logger ?? createLogger({ module: COMPONENT });
  }

  async reconstruct(frame: Frame): Promise<FrameAnalysis> {
    let extraction: ExtractionResult | null = null;
    try {
      extraction = await this.pipeline.extract(frame);
      return { state: this.assemble(extraction, frame.capturedAt), extraction, error: null };
    } catch (error) {
      this.reporter.logError({
        severity: "MEDIUM",
        category: "VISION",
        message: "Game state reconstruction failed",
        component: COMPONENT,
        function: "reconstruct",
        error,
        frameNumber: frame.index,
      });
      return { state: null, extraction, error };
    }
  }

  assemble(extraction: ExtractionResult, timestamp: number): GameState {
    const players = extraction.seats.map(toPlayer);
    const handId = this.hands.observe(
      extraction.seats.map((seat) => ({
        position: seat.position,
        name: seat.name?.value ?? null,
        holeCards: identifiedCodes(seat.holeCards),
      })),
      identifiedCodes(extraction.communityCards),
    );

    return Object.freeze({
      timestamp,
      handId,
      phase: phaseForBoard(extraction.communityCards.length, this.logger),
      potSize: extraction.pot?.value ?? 0,
      communityCards: extraction.communityCards,
      players,
      timerRemaining: extraction.timer?.value ?? 0,
      availableActions: extraction.availableActions,
      bettingOptions: this.bettingOptions,
    });
  }
}
