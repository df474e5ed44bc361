import { detectActionButtons, type PlayerAction } from "@/lib/card-detection/buttons";
import { analyzePlayerStatus, type PlayerStatus } from "@/lib/card-detection/player-status";
import type { CardDetectionResult, CardDetectionStage } from "@/lib/card-detection/stage";
import type { Card } from "@/lib/card-detection/types";
import type { RawImage } from "@/lib/capture/types";
import type { FieldThresholds } from "@/lib/config/settings";
import { createLogger, type Logger } from "@/lib/logging/logger";
import { type ParsedField, parsePlayerName, parsePot, parseStack, parseTimer } from "@/lib/text-recognition/fields";
import type { BatchedTextRecognizer } from "@/lib/text-recognition/recognizer";
import type { TextElement, TextReadResult } from "@/lib/text-recognition/types";
import type { NamedRegion } from "./region";

export const COMMUNITY_CARDS = "community_cards";
export const POT_DISPLAY = "pot_display";
export const TIMER = "timer";
export const ACTION_BUTTONS = "action_buttons";

const SEAT_PATTERN = /^player_(\d+)$/;

export interface SeatRegions {
  seat: NamedRegion;
  name: NamedRegion;
  stack: NamedRegion;
  holeCards: NamedRegion;
  bet: NamedRegion;
}

/**
 * Fixed layout inside a seat rectangle: name in the top-left, stack in the
 * lower-left, hole cards in the upper-right, bet in a 100×50 box straddling
 * the seat's left edge at mid height.
 */
export function seatSubRegions(seat: NamedRegion): SeatRegions {
  const { x, y, width: w, height: h } = seat;
  const halfW = Math.floor(w / 2);
  return {
    seat,
    name: { name: `${seat.name}_name`, x, y, width: halfW, height: Math.floor(h / 3) },
    stack: { name: `${seat.name}_stack`, x, y: y + Math.floor(h / 2), width: halfW, height: Math.floor(h / 3) },
    holeCards: { name: `${seat.name}_cards`, x: x + halfW, y, width: halfW, height: Math.floor(h / 2) },
    bet: { name: `${seat.name}_bet`, x: x - 50, y: y + Math.floor(h / 2), width: 100, height: 50 },
  };
}

export interface SeatObservation {
  position: number;
  regions: SeatRegions;
  name: ParsedField<string> | null;
  stack: ParsedField<number> | null;
  bet: ParsedField<number> | null;
  holeCards: Card[];
  status: PlayerStatus;
}

export interface ExtractionResult {
  /** Left to right. */
  communityCards: Card[];
  pot: ParsedField<number> | null;
  timer: ParsedField<number> | null;
  /** Ordered by position. */
  seats: SeatObservation[];
  availableActions: PlayerAction[];
  cardDetections: CardDetectionResult[];
  text: TextReadResult;
  /** Configured region names the pipeline looked for and did not find. */
  missingRegions: string[];
}

export interface ExtractionPipelineOptions {
  cards: CardDetectionStage;
  text: BatchedTextRecognizer;
  regions: NamedRegion[];
  thresholds: FieldThresholds;
  logger?: Logger;
}

/** Turns one frame into raw per-region observations. */
export class ExtractionPipeline {
  private readonly cards: CardDetectionStage;
  private readonly text: BatchedTextRecognizer;
  private readonly thresholds: FieldThresholds;
  private readonly logger: Logger;
  private readonly byName: Map<string, NamedRegion>;
  private readonly seats: { position: number; regions: SeatRegions }[];

  constructor(options: ExtractionPipelineOptions) {
    this.cards = options.cards;
    this.text = options.text;
    this.thresholds = options.thresholds;
    this.logger = options.logger ?? createLogger({ module: "extraction.pipeline" });
    this.byName = new Map(options.regions.map((region) => [region.name, region]));
    this.seats = options.regions
      .flatMap((region) => {
        const match = SEAT_PATTERN.exec(region.name);
        return match ? [{ position: Number(match[1]), regions: seatSubRegions(region) }] : [];
      })
      .sort((a, b) => a.position - b.position);
  }

  async extract(frame: RawImage): Promise<ExtractionResult> {
    const missingRegions: string[] = [];
    const region = (name: string) => {
      const found = this.byName.get(name);
      if (!found) missingRegions.push(name);
      return found;
    };

    const communityRegion = region(COMMUNITY_CARDS);
    const potRegion = region(POT_DISPLAY);
    const timerRegion = region(TIMER);
    const actionRegion = region(ACTION_BUTTONS);

    const textRegions: NamedRegion[] = [];
    if (potRegion) textRegions.push(potRegion);
    if (timerRegion) textRegions.push(timerRegion);
    for (const { regions } of this.seats) {
      textRegions.push(regions.name, regions.stack, regions.bet);
    }

    const text = await this.text.read(frame, textRegions);
    const elementsOf = (target: NamedRegion | undefined): TextElement[] =>
      target ? text.readings.get(target.name)?.elements ?? [] : [];

    const cardDetections: CardDetectionResult[] = [];
    let communityCards: Card[] = [];
    if (communityRegion) {
      const detection = await this.cards.detect(frame, communityRegion);
      cardDetections.push(detection);
      communityCards = [...detection.cards].sort((a, b) => a.position.x - b.position.x);
    }

    const seats: SeatObservation[] = [];
    for (const { position, regions } of this.seats) {
      const detection = await this.cards.detect(frame, regions.holeCards);
      cardDetections.push(detection);
      seats.push({
        position,
        regions,
        name: parsePlayerName(elementsOf(regions.name), this.thresholds),
        stack: parseStack(elementsOf(regions.stack), this.thresholds),
        bet: parseStack(elementsOf(regions.bet), this.thresholds),
        holeCards: detection.cards,
        status: analyzePlayerStatus(frame, regions.seat),
      });
    }

    const availableActions = actionRegion ? detectActionButtons(frame, actionRegion) : [];

    this.logger.debug(
      `Extracted ${communityCards.length} community cards, ${seats.length} seats, ${availableActions.length} actions`,
    );

    return {
      communityCards,
      pot: parsePot(elementsOf(potRegion), this.thresholds),
      timer: parseTimer(elementsOf(timerRegion), this.thresholds),
      seats,
      availableActions,
      cardDetections,
      text,
      missingRegions,
    };
  }
}
