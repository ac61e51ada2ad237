import {
  CATEGORIES,
  isCategory,
  type Category,
  type SectorBucket,
} from "../checklist/types.js";
import type { CategoryValues } from "../scoring/types.js";
import { SCREENING_MODES, type ScreeningMode } from "./modes.js";

// ============================================================================
// Rule set types
// ============================================================================

export type DownsideProtectionPolicy = "enforceAllowed" | "flagWatch" | "ignore";

export type TotalScoreKey = "fundamentalAdjusted" | "reversalTotal";

/** sector bucket → category → metric-name patterns (case-insensitive). */
export type SectorAnchors = Readonly<
  Record<SectorBucket, CategoryValues<readonly string[]>>
>;

export interface RuleSet {
  minOverallCoverage: number;
  minCategoryCoverage: CategoryValues<number>;
  minCategoryScore: CategoryValues<number>;
  minTotalScores: Partial<Record<TotalScoreKey, number>>;
  downsideProtectionPolicy: DownsideProtectionPolicy;
  downsideProtectionSet: readonly string[];
  sectorAnchors: SectorAnchors;
}

export type RuleBook = Readonly<Record<ScreeningMode, Readonly<RuleSet>>>;

// ============================================================================
// Built-in rule book (used when the rules file is missing or malformed)
// ============================================================================

const DEFAULT_SECTOR_ANCHORS: SectorAnchors = {
  "Financials (Banks)": {
    Valuation: ["P/B", "P/E"],
    Profitability: ["ROE"],
  },
  REITs: {
    Valuation: ["FFO"],
    "Balance Sheet": ["Net Debt / EBITDA"],
  },
  "Software/Tech": {
    Profitability: ["Operating Margin", "FCF Margin"],
    Growth: ["Revenue CAGR"],
  },
};

const BUILT_IN_RULES: RuleBook = {
  strict: {
    minOverallCoverage: 70,
    minCategoryCoverage: {
      Valuation: 60,
      Profitability: 60,
      "Balance Sheet": 60,
    },
    minCategoryScore: { "Balance Sheet": 15 },
    minTotalScores: { fundamentalAdjusted: 45, reversalTotal: 40 },
    downsideProtectionPolicy: "enforceAllowed",
    downsideProtectionSet: ["GREEN", "YELLOW"],
    sectorAnchors: DEFAULT_SECTOR_ANCHORS,
  },
  permissible: {
    minOverallCoverage: 55,
    minCategoryCoverage: { "Balance Sheet": 40 },
    minCategoryScore: { "Balance Sheet": 10 },
    minTotalScores: {},
    downsideProtectionPolicy: "flagWatch",
    downsideProtectionSet: ["RED", "NA"],
    sectorAnchors: DEFAULT_SECTOR_ANCHORS,
  },
  loose: {
    minOverallCoverage: 40,
    minCategoryCoverage: {},
    minCategoryScore: {},
    minTotalScores: {},
    downsideProtectionPolicy: "flagWatch",
    downsideProtectionSet: ["RED"],
    sectorAnchors: {},
  },
};

export const DEFAULT_RULE_BOOK: RuleBook = deepFreeze(BUILT_IN_RULES);

// ============================================================================
// Parsing the JSON rule source
// ============================================================================

const POLICY_NAMES: Readonly<Record<string, DownsideProtectionPolicy>> = {
  enforce_allowed: "enforceAllowed",
  flag_watch: "flagWatch",
  ignore: "ignore",
};

const TOTAL_SCORE_KEYS: Readonly<Record<string, TotalScoreKey>> = {
  fund_adj: "fundamentalAdjusted",
  reversal_total: "reversalTotal",
};

export interface ParsedRuleBook {
  ruleBook: RuleBook;
  problems: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function parseCategoryNumbers(
  raw: unknown,
  field: string,
  errors: string[],
): CategoryValues<number> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    errors.push(`${field} must be an object`);
    return {};
  }
  const out: CategoryValues<number> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isCategory(key)) {
      errors.push(`${field}: unknown category "${key}"`);
    } else if (!isFiniteNumber(value)) {
      errors.push(`${field}.${key} must be a number`);
    } else {
      out[key] = value;
    }
  }
  return out;
}

function parseStringList(raw: unknown, field: string, errors: string[]): string[] {
  if (raw === undefined) return [];
  const list: unknown[] = Array.isArray(raw) ? raw : [];
  const strings = list.filter((v): v is string => typeof v === "string");
  if (!Array.isArray(raw) || strings.length !== list.length) {
    errors.push(`${field} must be a list of strings`);
    return [];
  }
  return strings.map((v) => v.trim()).filter(Boolean);
}

function parseSectorAnchors(raw: unknown, errors: string[]): SectorAnchors {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    errors.push("sector_anchors must be an object");
    return {};
  }
  const out: Record<SectorBucket, CategoryValues<readonly string[]>> = {};
  for (const [sector, byCategory] of Object.entries(raw)) {
    if (!isRecord(byCategory)) {
      errors.push(`sector_anchors.${sector} must be an object`);
      continue;
    }
    const patterns: CategoryValues<readonly string[]> = {};
    for (const [category, list] of Object.entries(byCategory)) {
      if (!isCategory(category)) {
        errors.push(`sector_anchors.${sector}: unknown category "${category}"`);
        continue;
      }
      patterns[category] = parseStringList(
        list,
        `sector_anchors.${sector}.${category}`,
        errors,
      );
    }
    out[sector] = patterns;
  }
  return out;
}

/**
 * Parse one mode's rules from the snake_case JSON shape.
 * Returns null (with reasons in `errors`) when any field is malformed.
 */
export function parseRuleSet(raw: unknown, errors: string[]): RuleSet | null {
  if (!isRecord(raw)) {
    errors.push("rule set must be an object");
    return null;
  }
  const before = errors.length;

  const minOverall = raw.min_overall_coverage ?? 0;
  if (!isFiniteNumber(minOverall) || minOverall < 0 || minOverall > 100) {
    errors.push("min_overall_coverage must be a number between 0 and 100");
  }

  const minTotalScores: Partial<Record<TotalScoreKey, number>> = {};
  const rawTotals = raw.min_total_scores ?? {};
  if (!isRecord(rawTotals)) {
    errors.push("min_total_scores must be an object");
  } else {
    for (const [key, value] of Object.entries(rawTotals)) {
      const target = Object.hasOwn(TOTAL_SCORE_KEYS, key)
        ? TOTAL_SCORE_KEYS[key]
        : undefined;
      if (!target) {
        errors.push(`min_total_scores: unknown score "${key}"`);
      } else if (!isFiniteNumber(value)) {
        errors.push(`min_total_scores.${key} must be a number`);
      } else {
        minTotalScores[target] = value;
      }
    }
  }

  const rawPolicy = raw.davf_policy ?? "ignore";
  const policy =
    typeof rawPolicy === "string" && Object.hasOwn(POLICY_NAMES, rawPolicy)
      ? POLICY_NAMES[rawPolicy]
      : undefined;
  if (!policy) {
    errors.push(
      `davf_policy must be one of ${Object.keys(POLICY_NAMES).join(", ")}`,
    );
  }

  const ruleSet: RuleSet = {
    minOverallCoverage: isFiniteNumber(minOverall) ? minOverall : 0,
    minCategoryCoverage: parseCategoryNumbers(
      raw.min_category_coverage,
      "min_category_coverage",
      errors,
    ),
    minCategoryScore: parseCategoryNumbers(
      raw.min_category_score,
      "min_category_score",
      errors,
    ),
    minTotalScores,
    downsideProtectionPolicy: policy ?? "ignore",
    downsideProtectionSet: parseStringList(raw.davf_list, "davf_list", errors).map(
      (label) => label.toUpperCase(),
    ),
    sectorAnchors: parseSectorAnchors(raw.sector_anchors, errors),
  };

  return errors.length === before ? ruleSet : null;
}

/**
 * Build a rule book from the parsed JSON rule source.
 *
 * A mode that is missing or malformed keeps its built-in rules; every
 * problem is reported so the caller can log it. Returns null when the
 * document is not an object at all.
 */
export function parseRuleBook(raw: unknown): ParsedRuleBook | null {
  if (!isRecord(raw)) return null;

  const problems: string[] = [];
  const resolved: Partial<Record<ScreeningMode, RuleSet>> = {};

  for (const mode of SCREENING_MODES) {
    if (!Object.hasOwn(raw, mode)) {
      problems.push(`${mode}: not configured, using built-in rules`);
      continue;
    }
    const errors: string[] = [];
    const ruleSet = parseRuleSet(raw[mode], errors);
    if (ruleSet) {
      resolved[mode] = ruleSet;
    } else {
      problems.push(...errors.map((e) => `${mode}: ${e}`));
    }
  }

  const ruleBook: RuleBook = {
    strict: resolved.strict ?? DEFAULT_RULE_BOOK.strict,
    permissible: resolved.permissible ?? DEFAULT_RULE_BOOK.permissible,
    loose: resolved.loose ?? DEFAULT_RULE_BOOK.loose,
  };

  return { ruleBook: deepFreeze(ruleBook), problems };
}

export function configuredCategories(values: CategoryValues<unknown>): Category[] {
  return CATEGORIES.filter((c) => values[c] !== undefined);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
