import { CATEGORIES } from "../checklist/types.js";
import type { EligibilityResult, EligibilityStatus } from "../gates/gate-types.js";
import { reasonsText } from "../gates/eligibility-gate.js";
import type { TickerScorecard } from "../scoring/types.js";

// ============================================================================
// Verdict Configuration
// ============================================================================

export const VERDICT_CONFIG: Record<
  EligibilityStatus,
  { headline: string; template: string; next_steps: readonly string[] }
> = {
  PASS: {
    headline: "Eligible",
    template:
      "{{ticker}} clears the {{mode}} screen with an adjusted fundamental score of {{score}} on {{coverage}}% coverage.",
    next_steps: [
      "Add to the candidate list for this run",
      "Review sector-specific notes before sizing",
    ],
  },
  WATCH: {
    headline: "Watch",
    template:
      "{{ticker}} scored {{score}} on {{coverage}}% coverage but shows weak spots. {{issues_summary}}",
    next_steps: [
      "Keep on the watch list",
      "Re-screen after the next reporting period",
    ],
  },
  FAIL: {
    headline: "Ineligible",
    template:
      "{{ticker}} does not clear the {{mode}} screen (score {{score}}, coverage {{coverage}}%). {{issues_summary}}",
    next_steps: [
      "Exclude from this run",
      "Check whether missing metrics can be sourced",
    ],
  },
};

// ============================================================================
// Score bands
// ============================================================================

const SCORE_BANDS: ReadonlyArray<{ min: number; label: string }> = [
  { min: 75, label: "exceptional" },
  { min: 60, label: "strong" },
  { min: 40, label: "acceptable" },
  { min: 20, label: "fragile" },
];

/** 0–20 weak/unknown, 20–40 fragile, 40–60 acceptable, 60–75 strong, 75–100 exceptional. */
export function describeScoreBand(score: number | null | undefined): string {
  if (score === null || score === undefined || !Number.isFinite(score)) {
    return "weak/unknown";
  }
  return SCORE_BANDS.find((band) => score >= band.min)?.label ?? "weak/unknown";
}

function formatPct(value: number | null | undefined): string {
  return value === null || value === undefined ? "n/a" : String(Math.round(value));
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.hasOwn(values, key) ? values[key] : match,
  );
}

// ============================================================================
// Summary Generator
// ============================================================================

export interface ScreeningSummary {
  headline: string;
  justification: string;
  key_factors: string[];
  next_steps: string[];
}

export function generateScreeningSummary(
  scorecard: TickerScorecard,
  eligibility: EligibilityResult,
  maxReasons = 3,
): ScreeningSummary {
  const config = VERDICT_CONFIG[eligibility.status];

  const keyFactors = CATEGORIES.map((category) => {
    const { adjustedScorePct, coveragePct } = scorecard.categories[category].score;
    const band = describeScoreBand(adjustedScorePct);
    const prefix =
      adjustedScorePct !== null && adjustedScorePct >= 60
        ? "+"
        : adjustedScorePct === null || adjustedScorePct < 40
          ? "-"
          : "~";
    return `${prefix} ${category}: ${band} (${formatPct(adjustedScorePct)}, ${formatPct(coveragePct)}% coverage)`;
  });

  const issues = reasonsText(eligibility, maxReasons);
  const justification = fill(config.template, {
    ticker: scorecard.ticker,
    mode: eligibility.mode,
    score: formatPct(scorecard.fundamentalAdjustedPct),
    coverage: formatPct(eligibility.overallCoveragePct),
    issues_summary: issues
      ? `Key concerns: ${issues}.`
      : "No specific concerns identified.",
  });

  return {
    headline: config.headline,
    justification,
    key_factors: keyFactors,
    next_steps: [...config.next_steps],
  };
}
