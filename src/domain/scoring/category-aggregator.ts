import type { Category } from "../checklist/types.js";
import { MAX_POINTS, ratingToPoints } from "./rating.js";
import type {
  CategoryCoverage,
  CategoryScore,
  RatingsByMetric,
  WeightsByMetric,
} from "./types.js";

// ============================================================================
// Coverage-adjusted category scoring
// ============================================================================

/**
 * Raw score and coverage for one category.
 *
 * Raw score uses only scorable (non-NA) metrics in its denominator.
 * Coverage is the share of the category's positive weight that was
 * scorable. Metrics with weight <= 0 are ignored entirely; metrics absent
 * from the ratings map count as NA.
 */
export function scoreCategory(
  ratingsByMetric: RatingsByMetric,
  weightsByMetric: WeightsByMetric,
): CategoryCoverage {
  let possibleWeight = 0;
  let scorableWeight = 0;
  let earned = 0;
  let maxPoints = 0;

  for (const [metric, weight] of Object.entries(weightsByMetric)) {
    if (!(weight > 0)) continue;
    possibleWeight += weight;

    const rating = ratingsByMetric[metric] ?? "NA";
    if (rating === "NA") continue;

    scorableWeight += weight;
    earned += ratingToPoints(rating) * weight;
    maxPoints += MAX_POINTS * weight;
  }

  const coveragePct =
    possibleWeight === 0 ? 0 : (scorableWeight / possibleWeight) * 100;

  return {
    rawScorePct: maxPoints === 0 ? null : (earned / maxPoints) * 100,
    coveragePct,
  };
}

/**
 * Discount a raw score by coverage. A category that is perfect on one of
 * five weighted metrics ends up near zero.
 */
export function adjustScore(
  rawScorePct: number | null,
  coveragePct: number,
): number | null {
  if (rawScorePct === null) return null;
  return rawScorePct * (coveragePct / 100);
}

// ============================================================================
// Category caps
// ============================================================================

interface CategoryCap {
  category: Category;
  redOn: string[]; // metric-name substrings
  maxRawScorePct: number;
}

/** A single RED on these metrics caps the category's raw score. */
export const CATEGORY_CAPS: readonly CategoryCap[] = [
  {
    category: "Balance Sheet",
    redOn: ["Net Debt / EBITDA", "Interest Coverage"],
    maxRawScorePct: 60,
  },
  {
    category: "Risk",
    redOn: ["Avg Daily $ Volume"],
    maxRawScorePct: 65,
  },
];

export function applyCategoryCaps(
  category: Category,
  rawScorePct: number | null,
  ratingsByMetric: RatingsByMetric,
): number | null {
  if (rawScorePct === null) return null;

  let capped = rawScorePct;
  for (const cap of CATEGORY_CAPS) {
    if (cap.category !== category) continue;
    const triggered = Object.entries(ratingsByMetric).some(
      ([metric, rating]) =>
        rating === "RED" && cap.redOn.some((s) => metric.includes(s)),
    );
    if (triggered) capped = Math.min(capped, cap.maxRawScorePct);
  }
  return capped;
}

/** Caps are applied to the raw score before the coverage discount. */
export function buildCategoryScore(
  category: Category,
  ratingsByMetric: RatingsByMetric,
  weightsByMetric: WeightsByMetric,
): CategoryScore {
  const { rawScorePct, coveragePct } = scoreCategory(
    ratingsByMetric,
    weightsByMetric,
  );
  const capped = applyCategoryCaps(category, rawScorePct, ratingsByMetric);

  return {
    rawScorePct: capped,
    coveragePct,
    adjustedScorePct: adjustScore(capped, coveragePct),
  };
}
