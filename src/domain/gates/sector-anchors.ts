import {
  CATEGORIES,
  type Category,
  type SectorBucket,
} from "../checklist/types.js";
import type { CategoryValues, RatingsByMetric } from "../scoring/types.js";
import type { SectorAnchors } from "./rule-set.js";

export interface MissingAnchor {
  category: Category;
  patterns: readonly string[];
  metrics: string[]; // checklist metrics that matched, all rated NA
}

function matchesAnyPattern(metric: string, patterns: readonly string[]): boolean {
  const m = metric.toLowerCase();
  return patterns.some((p) => p && m.includes(p.toLowerCase()));
}

/**
 * Sector-critical metrics that are on the checklist but have no data.
 *
 * Only categories where at least one checklist metric matches an anchor
 * pattern are considered; a category is reported when every matching
 * metric is rated NA. Unknown sector buckets have no anchors.
 */
export function findMissingAnchors(
  anchors: SectorAnchors,
  sectorBucket: SectorBucket | null | undefined,
  perCategoryRatings: CategoryValues<RatingsByMetric>,
): MissingAnchor[] {
  if (!sectorBucket || !Object.hasOwn(anchors, sectorBucket)) return [];
  const byCategory = anchors[sectorBucket];

  const missing: MissingAnchor[] = [];
  for (const category of CATEGORIES) {
    const patterns = byCategory[category];
    if (!patterns || patterns.length === 0) continue;

    const ratings = perCategoryRatings[category] ?? {};
    const matched = Object.keys(ratings).filter((metric) =>
      matchesAnyPattern(metric, patterns),
    );
    if (matched.length === 0) continue;

    if (matched.every((metric) => ratings[metric] === "NA")) {
      missing.push({ category, patterns, metrics: matched });
    }
  }
  return missing;
}
