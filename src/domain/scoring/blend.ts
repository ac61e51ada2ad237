import { CATEGORIES, type Category } from "../checklist/types.js";
import type { CategoryValues } from "./types.js";

export const CATEGORY_WEIGHTS: Readonly<Record<Category, number>> = {
  Valuation: 0.2,
  Profitability: 0.25,
  "Balance Sheet": 0.25,
  Growth: 0.15,
  Risk: 0.15,
};

/**
 * Weighted average across categories. Missing or null categories drop out
 * of both numerator and denominator rather than counting as zero.
 * Used for scores and for coverages alike.
 */
export function blend(
  valuesByCategory: CategoryValues<number | null>,
): number | null {
  let weightSum = 0;
  let acc = 0;

  for (const category of CATEGORIES) {
    const weight = CATEGORY_WEIGHTS[category];
    const value = valuesByCategory[category];
    if (value === null || value === undefined || !Number.isFinite(value)) {
      continue;
    }
    weightSum += weight;
    acc += weight * value;
  }

  return weightSum === 0 ? null : acc / weightSum;
}
