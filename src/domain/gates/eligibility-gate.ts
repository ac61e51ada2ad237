import { isCategory } from "../checklist/types.js";
import { blend } from "../scoring/blend.js";
import type { CategoryValues } from "../scoring/types.js";
import type {
  EligibilityInput,
  EligibilityResult,
  GateReason,
} from "./gate-types.js";
import { resolveMode, type ScreeningMode } from "./modes.js";
import {
  configuredCategories,
  type RuleBook,
  type RuleSet,
  type TotalScoreKey,
} from "./rule-set.js";
import { findMissingAnchors } from "./sector-anchors.js";

function fmt(n: number): string {
  return n.toFixed(0);
}

// NaN or infinite coverage is unknown data and counts as 0%
function finiteCoverages(coverages: CategoryValues<number>): CategoryValues<number> {
  const out: CategoryValues<number> = {};
  for (const [category, value] of Object.entries(coverages)) {
    if (isCategory(category) && value !== undefined) {
      out[category] = Number.isFinite(value) ? value : 0;
    }
  }
  return out;
}

// ============================================================================
// Individual gates (each returns every violation it finds)
// ============================================================================

export function checkOverallCoverage(
  overallCoveragePct: number,
  rules: RuleSet,
): GateReason[] {
  if (overallCoveragePct >= rules.minOverallCoverage) return [];
  return [
    {
      gate: "overall_coverage",
      kind: "coverage",
      detail: `Low overall coverage (${fmt(overallCoveragePct)}% < ${fmt(rules.minOverallCoverage)}%)`,
    },
  ];
}

/** A category with no reported (or a non-finite) coverage counts as 0%. */
export function checkCategoryCoverage(
  coverages: CategoryValues<number>,
  rules: RuleSet,
): GateReason[] {
  const reasons: GateReason[] = [];
  const known = finiteCoverages(coverages);
  for (const category of configuredCategories(rules.minCategoryCoverage)) {
    const limit = rules.minCategoryCoverage[category] ?? 0;
    const current = known[category] ?? 0;
    if (current < limit) {
      reasons.push({
        gate: "category_coverage",
        kind: "coverage",
        category,
        detail: `Thin ${category} data (${fmt(current)}% < ${fmt(limit)}%)`,
      });
    }
  }
  return reasons;
}

/** Structural red-flag floor on adjusted scores; unscored categories are skipped. */
export function checkCategoryScores(
  adjustedScores: CategoryValues<number | null>,
  rules: RuleSet,
): GateReason[] {
  const reasons: GateReason[] = [];
  for (const category of configuredCategories(rules.minCategoryScore)) {
    const limit = rules.minCategoryScore[category] ?? 0;
    const value = adjustedScores[category];
    if (value !== null && value !== undefined && value < limit) {
      reasons.push({
        gate: "category_score",
        kind: "score",
        category,
        detail: `Weak ${category} structure (${fmt(value)} < ${fmt(limit)})`,
      });
    }
  }
  return reasons;
}

export function normalizeProtectionLabel(label: string | null | undefined): string {
  return (label ?? "").trim().toUpperCase() || "NA";
}

export function checkDownsideProtection(
  label: string | null | undefined,
  rules: RuleSet,
): GateReason[] {
  const normalized = normalizeProtectionLabel(label);
  const listed = rules.downsideProtectionSet.includes(normalized);

  switch (rules.downsideProtectionPolicy) {
    case "enforceAllowed":
      return listed
        ? []
        : [
            {
              gate: "downside_protection",
              kind: "score",
              detail: `Downside protection insufficient (${normalized})`,
            },
          ];
    case "flagWatch":
      return listed
        ? [
            {
              gate: "downside_protection",
              kind: "score",
              detail: `Downside protection weak (${normalized})`,
            },
          ]
        : [];
    case "ignore":
      return [];
  }
}

const TOTAL_SCORE_LABELS: Record<TotalScoreKey, string> = {
  fundamentalAdjusted: "Fundamental adjusted score",
  reversalTotal: "Reversal total score",
};

export function checkTotalScores(
  totals: Partial<Record<TotalScoreKey, number | null | undefined>>,
  rules: RuleSet,
): GateReason[] {
  const reasons: GateReason[] = [];
  for (const key of ["fundamentalAdjusted", "reversalTotal"] as const) {
    const limit = rules.minTotalScores[key];
    const value = totals[key];
    if (limit === undefined || value === null || value === undefined) continue;
    if (!Number.isFinite(value) || value >= limit) continue;
    reasons.push({
      gate: "total_score",
      kind: "score",
      detail: `${TOTAL_SCORE_LABELS[key]} too low (${fmt(value)} < ${fmt(limit)})`,
    });
  }
  return reasons;
}

export function checkSectorAnchors(
  input: EligibilityInput,
  rules: RuleSet,
): GateReason[] {
  return findMissingAnchors(
    rules.sectorAnchors,
    input.sectorBucket,
    input.perCategoryRatings,
  ).map((missing) => ({
    gate: "sector_anchor",
    kind: "coverage",
    category: missing.category,
    detail: `No ${missing.category} anchor data for ${input.sectorBucket} (${missing.metrics.join(", ")})`,
  }));
}

// ============================================================================
// Decision
// ============================================================================

/**
 * Evaluate eligibility for one ticker.
 *
 * Every gate always runs so the result lists all violations. Strict mode
 * fails on any reason. Looser modes still fail whenever a coverage
 * (data-quality) reason is present and only downgrade to WATCH when every
 * reason is a score weakness: thin data never passes as "good on
 * limited data".
 */
export function evaluateEligibility(
  ruleBook: RuleBook,
  input: EligibilityInput,
): EligibilityResult {
  const mode = resolveMode(input.mode);
  const rules = ruleBook[mode];

  const overallCoveragePct = blend(finiteCoverages(input.categoryCoverages)) ?? 0;

  const gateReasons: GateReason[] = [
    ...checkOverallCoverage(overallCoveragePct, rules),
    ...checkCategoryCoverage(input.categoryCoverages, rules),
    ...checkCategoryScores(input.categoryAdjustedScores, rules),
    ...checkDownsideProtection(input.downsideProtectionLabel, rules),
    ...(mode === "strict"
      ? checkTotalScores(
          {
            fundamentalAdjusted: input.fundamentalAdjustedScore,
            reversalTotal: input.reversalTotalScore,
          },
          rules,
        )
      : []),
    ...checkSectorAnchors(input, rules),
  ];

  return decide(mode, overallCoveragePct, gateReasons);
}

function decide(
  mode: ScreeningMode,
  overallCoveragePct: number,
  gateReasons: GateReason[],
): EligibilityResult {
  const base = {
    mode,
    overallCoveragePct,
    reasons: Object.freeze(gateReasons.map((r) => r.detail)),
    gateReasons: Object.freeze(gateReasons.map((r) => Object.freeze(r))),
  };

  if (gateReasons.length === 0) {
    return Object.freeze({ ...base, status: "PASS", label: "ELIGIBLE" });
  }

  const dataProblem = gateReasons.some((r) => r.kind === "coverage");
  if (mode === "strict" || dataProblem) {
    return Object.freeze({ ...base, status: "FAIL", label: "INELIGIBLE" });
  }

  return Object.freeze({ ...base, status: "WATCH", label: "WATCH" });
}

/**
 * "reason A | reason B (+2 more)". maxItems <= 0 lists every reason.
 */
export function reasonsText(
  result: Pick<EligibilityResult, "reasons">,
  maxItems = 3,
): string {
  const { reasons } = result;
  if (reasons.length === 0) return "";
  const items = maxItems > 0 ? reasons.slice(0, maxItems) : reasons;
  const hidden = reasons.length - items.length;
  return items.join(" | ") + (hidden > 0 ? ` (+${hidden} more)` : "");
}
