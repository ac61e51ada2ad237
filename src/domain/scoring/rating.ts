import { inRange, parseRange } from "../checklist/range-parser.js";
import type { Rating } from "./types.js";

export const RATING_POINTS: Readonly<Record<Rating, number>> = {
  GREEN: 2,
  YELLOW: 1,
  RED: 0,
  NA: 0,
};

export const MAX_POINTS = RATING_POINTS.GREEN;

/**
 * Classify a metric value against its green/yellow/red threshold texts.
 *
 * Order is fixed GREEN → YELLOW → RED and the first satisfied range wins,
 * so overlapping ranges resolve in the metric's favor. NA when the value
 * is missing or non-finite, or when no range contains it.
 */
export function rate(
  value: number | null | undefined,
  greenText: unknown,
  yellowText: unknown,
  redText: unknown,
): Rating {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return "NA";
  }

  if (inRange(value, parseRange(greenText))) return "GREEN";
  if (inRange(value, parseRange(yellowText))) return "YELLOW";
  if (inRange(value, parseRange(redText))) return "RED";
  return "NA";
}

export function ratingToPoints(rating: Rating): number {
  return RATING_POINTS[rating];
}
