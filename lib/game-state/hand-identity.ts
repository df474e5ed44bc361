import { createHash } from "crypto";
import { type Card, formatCard } from "@/lib/card-detection/types";

export interface SeatSummary {
  position: number;
  /** Null when the name was not read this frame. */
  name: string | null;
  /** Identified hole cards, empty when hidden or unreadable. */
  holeCards: string[];
}

interface CurrentHand {
  id: string;
  sequence: number;
  seats: SeatSummary[];
  board: string[];
}

/** Cards the primary detector identified, as codes. */
export function identifiedCodes(cards: Card[]): string[] {
  return cards.filter((card) => card.source === "primary").map(formatCard);
}

/**
 * Assigns hand ids from the table's structure, never from wall-clock time.
 *
 * A frame continues the current hand when no read seat name changed, no
 * seat's visible hole cards were replaced by different ones, and the board
 * either extends the hand's board or is part of it (a missed card). A
 * cleared board or an unknown card starts a new hand. The hand keeps the
 * largest board seen. The id hashes the hand's sequence number, its seats and the board at
 * its first frame, so it is fixed for the hand's lifetime.
 */
export class HandTracker {
  private current: CurrentHand | null = null;
  private sequence = 0;

  observe(seats: SeatSummary[], board: string[]): string {
    const current = this.current;
    if (current && continues(current, seats, board)) {
      if (containsAll(board, current.board)) current.board = board;
      current.seats = mergeSeats(current.seats, seats);
      return current.id;
    }

    this.sequence += 1;
    const id = handIdFor(this.sequence, seats, board);
    this.current = { id, sequence: this.sequence, seats, board };
    return id;
  }

  get currentHandId(): string | null {
    return this.current?.id ?? null;
  }

  /** Hands started since construction or the last reset. */
  get handsSeen(): number {
    return this.sequence;
  }

  reset(): void {
    this.current = null;
    this.sequence = 0;
  }
}

export function handIdFor(sequence: number, seats: SeatSummary[], board: string[]): string {
  const canonical = JSON.stringify({
    sequence,
    seats: seats.map((seat) => [seat.position, seat.name]),
    board,
  });
  return `hand_${createHash("sha256").update(canonical).digest("hex").slice(0, 16)}`;
}

function continues(current: CurrentHand, seats: SeatSummary[], board: string[]): boolean {
  if (current.seats.length !== seats.length) return false;

  for (let i = 0; i < seats.length; i++) {
    const before = current.seats[i];
    const after = seats[i];
    if (before.position !== after.position) return false;
    if (before.name !== null && after.name !== null && before.name !== after.name) return false;
    if (before.holeCards.length > 0 && after.holeCards.length > 0 && !sameCards(before.holeCards, after.holeCards)) {
      return false;
    }
  }

  if (board.length === 0) return current.board.length === 0;
  return containsAll(board, current.board) || containsAll(current.board, board);
}

function containsAll(superset: string[], subset: string[]): boolean {
  return subset.every((code) => superset.includes(code));
}

/** Keep what earlier frames of the hand saw when this frame could not read it. */
function mergeSeats(before: SeatSummary[], after: SeatSummary[]): SeatSummary[] {
  return after.map((seat, i) => ({
    position: seat.position,
    name: seat.name ?? before[i].name,
    holeCards: seat.holeCards.length > 0 ? seat.holeCards : before[i].holeCards,
  }));
}

function sameCards(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((code) => b.includes(code));
}
