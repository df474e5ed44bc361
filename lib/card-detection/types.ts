import type { RawImage } from "@/lib/capture/types";
import type { Point, Rect } from "@/lib/extraction/region";

export const SUITS = ["c", "d", "h", "s"] as const;
export type Suit = (typeof SUITS)[number];

export const RANKS = ["2", "3", "4", "5", "6", "7", "8", "9", "10", "J", "Q", "K", "A"] as const;
export type Rank = (typeof RANKS)[number];

export type CardCode = `${Rank}${Suit}`;

/** Placeholder rank/suit reported by the fallback detector. */
export type Unknown = "?";

export type CardSource = "primary" | "fallback";

export interface Card {
  rank: Rank | Unknown;
  suit: Suit | Unknown;
  confidence: number;
  /** Center of the card in frame coordinates. */
  position: Point;
  source: CardSource;
}

export type MatchConfidence = "HIGH" | "MEDIUM" | "LOW" | "NONE";

export interface CardMatch {
  card: CardCode | null;
  confidence: MatchConfidence;
  matchScore: number;
  gap: number;
}

export interface LocatedCard extends Rect {
  /** Bright pixels / bounding box area of the blob the card came from. */
  fillRatio: number;
  /** Rank/suit corner crop. */
  corner: Rect;
}

export type DetectionOutcome =
  | { kind: "detected"; cards: Card[] }
  | { kind: "empty" }
  | { kind: "unavailable"; reason: string }
  | { kind: "error"; error: unknown };

export interface CardDetector {
  readonly name: string;
  readonly source: CardSource;
  /** Whether the detector can run at all. Checked once by the detection stage. */
  probe(): boolean;
  detect(image: RawImage, region: Rect): Promise<DetectionOutcome>;
}

export function isRank(value: string): value is Rank {
  return RANKS.some((rank) => rank === value);
}

export function isSuit(value: string): value is Suit {
  return SUITS.some((suit) => suit === value);
}

export function isCardCode(value: string): value is CardCode {
  return isRank(value.slice(0, -1)) && isSuit(value.slice(-1));
}

export function parseCardCode(code: CardCode): { rank: Rank; suit: Suit } {
  const rank = code.slice(0, -1);
  const suit = code.slice(-1);
  if (!isRank(rank) || !isSuit(suit)) throw new Error(`Invalid card code: ${code}`);
  return { rank, suit };
}

export function formatCard(card: Pick<Card, "rank" | "suit">): string {
  return `${card.rank}${card.suit}`;
}
