import {
  DEFAULT_BUCKET,
  mapCategories,
  type Category,
  type ThresholdEntry,
  type ThresholdSpec,
} from "../checklist/types.js";
import { extractNumericBounds } from "../checklist/range-parser.js";
import {
  getThresholdSet,
  resolveSectorMode,
} from "../checklist/sector-adjustments.js";
import { checkAberrant } from "./outlier-guard.js";
import { rate, ratingToPoints } from "./rating.js";
import { metricWeight } from "./metric-weights.js";
import { buildCategoryScore } from "./category-aggregator.js";
import { blend } from "./blend.js";
import type {
  CategoryScorecard,
  MetricScore,
  Rating,
  TickerMetrics,
  TickerScorecard,
} from "./types.js";

const WARNING_PREFIX = "⚠ ";

/** "G:< 15 | Y:15-25 | R:> 25" for the thresholds actually applied. */
export function limitsText(entry: ThresholdEntry | null): string {
  if (!entry) return "";
  const parts: string[] = [];
  if (entry.greenText) parts.push(`G:${entry.greenText}`);
  if (entry.yellowText) parts.push(`Y:${entry.yellowText}`);
  if (entry.redText) parts.push(`R:${entry.redText}`);
  return parts.join(" | ");
}

function joinNotes(base: string, warnings: string[]): string {
  return [base, ...warnings.filter(Boolean).map((w) => WARNING_PREFIX + w)]
    .filter(Boolean)
    .join("\n");
}

function scoreMetric(
  input: TickerMetrics,
  spec: ThresholdSpec,
  category: Category,
  metric: string,
  bucket: string,
): MetricScore {
  const rawValue = input.values[metric] ?? null;
  const entry = getThresholdSet(spec, category, metric, bucket);

  let value: number | null = rawValue;
  let rating: Rating = "NA";
  let autoNote = "";

  if (entry) {
    const bounds = extractNumericBounds(
      entry.greenText,
      entry.yellowText,
      entry.redText,
    );
    const guard = checkAberrant(metric, rawValue, bounds.lower, bounds.upper);
    if (guard.aberrant) {
      value = null;
      autoNote = guard.reason;
    } else {
      rating = rate(rawValue, entry.greenText, entry.yellowText, entry.redText);
    }
  }

  const weight = metricWeight(category, metric);
  const points = rating === "NA" ? null : ratingToPoints(rating);

  return {
    metric,
    value,
    rawValue,
    rating,
    points,
    weight,
    weightedPoints: points === null ? null : points * weight,
    sectorMode: resolveSectorMode(spec, category, metric, bucket),
    limitsText: limitsText(entry),
    notes: joinNotes(entry?.notes ?? "", [
      input.notes?.[metric] ?? "",
      autoNote,
    ]),
  };
}

function scoreCategoryMetrics(
  input: TickerMetrics,
  spec: ThresholdSpec,
  category: Category,
  bucket: string,
): CategoryScorecard {
  const metrics = Object.keys(spec[category]).map((metric) =>
    scoreMetric(input, spec, category, metric, bucket),
  );

  const ratings: Record<string, Rating> = {};
  const weights: Record<string, number> = {};
  for (const m of metrics) {
    ratings[m.metric] = m.rating;
    weights[m.metric] = m.weight;
  }

  return {
    category,
    metrics,
    ratings,
    score: buildCategoryScore(category, ratings, weights),
  };
}

/**
 * Rate every checklist metric for one ticker and roll the ratings up into
 * category scores and the blended fundamental checklist scores.
 */
export function scoreTicker(
  input: TickerMetrics,
  spec: ThresholdSpec,
): TickerScorecard {
  const bucket = input.sectorBucket || DEFAULT_BUCKET;

  const categories = mapCategories((category) =>
    scoreCategoryMetrics(input, spec, category, bucket),
  );
  const pick = <T>(f: (c: CategoryScorecard) => T) =>
    mapCategories((category) => f(categories[category]));

  return {
    ticker: input.ticker,
    sectorBucket: bucket,
    categories,
    fundamentalRawPct: blend(pick((c) => c.score.rawScorePct)),
    totalCoveragePct: blend(pick((c) => c.score.coveragePct)),
    fundamentalAdjustedPct: blend(pick((c) => c.score.adjustedScorePct)),
  };
}
