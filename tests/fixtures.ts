import path from "path";
import { fileURLToPath } from "url";
import {
  DEFAULT_BUCKET,
  mapCategories,
  type Category,
  type SectorBucket,
  type ThresholdEntry,
  type ThresholdSpec,
} from "../src/domain/checklist/types.js";
import type { EligibilityInput } from "../src/domain/gates/gate-types.js";
import { DEFAULT_RULE_BOOK, type RuleBook, type RuleSet } from "../src/domain/gates/rule-set.js";
import type { ScreeningMode } from "../src/domain/gates/modes.js";
import type { CategoryValues } from "../src/domain/scoring/types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const FIXTURES_DIR = path.join(__dirname, "fixtures");
export const CHECKLIST_FIXTURE_DIR = path.join(FIXTURES_DIR, "checklist");

/** Threshold entry with green/yellow/red texts and no notes. */
export function makeEntry(
  greenText: string | null,
  yellowText: string | null,
  redText: string | null,
  overrides: Partial<ThresholdEntry> = {},
): ThresholdEntry {
  return { greenText, yellowText, redText, marking: null, notes: null, ...overrides };
}

type SpecShape = CategoryValues<Record<string, Record<SectorBucket, ThresholdEntry>>>;

/**
 * Build a threshold spec from a partial per-category shape. Categories
 * left out are empty.
 */
export function makeSpec(shape: SpecShape): ThresholdSpec {
  return mapCategories((category) => shape[category] ?? {});
}

/** Single default-bucket entry for a metric. */
export function defaultOnly(entry: ThresholdEntry): Record<SectorBucket, ThresholdEntry> {
  return { [DEFAULT_BUCKET]: entry };
}

/**
 * Small checklist used across scoring and pipeline tests.
 * Weights follow metricWeight(): P/E 1.3, EV/EBITDA 1.6, ROE 1.0,
 * Operating Margin 1.4, Net Debt / EBITDA 1.7, Current Ratio 1.0,
 * Revenue CAGR 1.2, Beta 1.0.
 */
export function makeSmallSpec(): ThresholdSpec {
  return makeSpec({
    Valuation: {
      "P/E (TTM)": {
        ...defaultOnly(makeEntry("< 15", "15-25", "> 25", { notes: "Use normalized earnings" })),
        "Software/Tech": makeEntry("< 30", "30-45", "> 45"),
      },
      "EV/EBITDA (TTM)": defaultOnly(makeEntry("< 10", "10-16", "> 16")),
    },
    Profitability: {
      "ROE (TTM %)": defaultOnly(makeEntry("> 15%", "8-15%", "< 8%")),
      "Operating Margin (TTM %)": defaultOnly(makeEntry("> 20%", "10-20%", "< 10%")),
    },
    "Balance Sheet": {
      "Net Debt / EBITDA": defaultOnly(makeEntry("< 1.5", "1.5-3", "> 3")),
      "Current Ratio": defaultOnly(makeEntry("> 1.5", "1-1.5", "< 1")),
    },
    Growth: {
      "Revenue CAGR (3Y %)": defaultOnly(makeEntry("> 10%", "3-10%", "< 3%")),
    },
    Risk: {
      "Beta (5Y)": defaultOnly(makeEntry("< 1.1", "1.1-1.5", "> 1.5")),
    },
  });
}

/** Values that rate GREEN on every metric of makeSmallSpec(). */
export function allGreenValues(): Record<string, number | null> {
  return {
    "P/E (TTM)": 12,
    "EV/EBITDA (TTM)": 8,
    "ROE (TTM %)": 20,
    "Operating Margin (TTM %)": 25,
    "Net Debt / EBITDA": 1,
    "Current Ratio": 2,
    "Revenue CAGR (3Y %)": 12,
    "Beta (5Y)": 0.9,
  };
}

export function makeRuleSet(overrides: Partial<RuleSet> = {}): RuleSet {
  return {
    minOverallCoverage: 0,
    minCategoryCoverage: {},
    minCategoryScore: {},
    minTotalScores: {},
    downsideProtectionPolicy: "ignore",
    downsideProtectionSet: [],
    sectorAnchors: {},
    ...overrides,
  };
}

/** Rule book with one mode replaced; other modes keep built-in rules. */
export function makeRuleBook(mode: ScreeningMode, rules: RuleSet): RuleBook {
  return { ...DEFAULT_RULE_BOOK, [mode]: rules };
}

export function fullCoverage(): Record<Category, number> {
  return mapCategories(() => 100);
}

export function uniformScores(score: number): Record<Category, number> {
  return mapCategories(() => score);
}

export function makeEligibilityInput(
  overrides: Partial<EligibilityInput> = {},
): EligibilityInput {
  return {
    mode: "strict",
    categoryAdjustedScores: uniformScores(80),
    categoryCoverages: fullCoverage(),
    perCategoryRatings: {},
    sectorBucket: null,
    fundamentalAdjustedScore: 80,
    reversalTotalScore: 60,
    downsideProtectionLabel: "GREEN",
    ...overrides,
  };
}

