import type { FieldThresholds } from "@/lib/config/settings";
import { inReadingOrder } from "./attribution";
import type { TextElement } from "./types";

const AMOUNT = /^\d[\d,]*$/;
const TIMER = /^(\d{1,2}):(\d{2})$/;
const NAME = /^[A-Za-z0-9_]+$/;

export interface ParsedField<T> {
  value: T;
  confidence: number;
}

/**
 * First element, in reading order, whose text matches and whose confidence
 * is strictly above the threshold.
 */
function firstMatch(
  elements: TextElement[],
  pattern: RegExp,
  threshold: number,
): { element: TextElement; match: RegExpExecArray } | null {
  for (const element of inReadingOrder(elements)) {
    if (element.confidence <= threshold) continue;
    const match = pattern.exec(element.text);
    if (match) return { element, match };
  }
  return null;
}

function parseAmount(elements: TextElement[], threshold: number): ParsedField<number> | null {
  const found = firstMatch(elements, AMOUNT, threshold);
  if (!found) return null;
  return { value: Number(found.element.text.replace(/,/g, "")), confidence: found.element.confidence };
}

export const parseStack = (elements: TextElement[], thresholds: FieldThresholds) =>
  parseAmount(elements, thresholds.stackSize);

export const parsePot = (elements: TextElement[], thresholds: FieldThresholds) =>
  parseAmount(elements, thresholds.potSize);

/** `M:SS` or `MM:SS`, returned in seconds. */
export function parseTimer(elements: TextElement[], thresholds: FieldThresholds): ParsedField<number> | null {
  const found = firstMatch(elements, TIMER, thresholds.timer);
  if (!found) return null;
  const [, minutes, seconds] = found.match;
  return { value: Number(minutes) * 60 + Number(seconds), confidence: found.element.confidence };
}

export function parsePlayerName(elements: TextElement[], thresholds: FieldThresholds): ParsedField<string> | null {
  const found = firstMatch(elements, NAME, thresholds.playerName);
  if (!found) return null;
  return { value: found.element.text, confidence: found.element.confidence };
}
