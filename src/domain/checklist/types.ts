// Checklist Types
//
// ThresholdSpec — category → metric → sector bucket → threshold texts.
// Built once per run by the checklist store and frozen; every metric
// carries a DEFAULT_BUCKET entry.

export const CATEGORIES = [
  "Valuation",
  "Profitability",
  "Balance Sheet",
  "Growth",
  "Risk",
] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_BUCKET = "Default (All)";

/** Sector buckets with their own column in the sector adjustments table. */
export const SECTOR_BUCKETS = [
  DEFAULT_BUCKET,
  "Software/Tech",
  "Industrials",
  "Consumer Staples",
  "Consumer Discretionary",
  "Healthcare/Pharma",
  "Energy/Materials",
  "Financials (Banks)",
  "REITs",
  "Utilities/Telecom",
] as const;

export type SectorBucket = string;

export interface ThresholdEntry {
  greenText: string | null;
  yellowText: string | null;
  redText: string | null;
  marking: string | null;
  notes: string | null;
}

export type MetricThresholds = Readonly<Record<SectorBucket, ThresholdEntry>>;

export type ThresholdSpec = Readonly<
  Record<Category, Readonly<Record<string, MetricThresholds>>>
>;

export interface ParsedRange {
  lower: number | null;
  upper: number | null;
}

/** One row of the sector adjustments table, cells keyed by sector bucket. */
export interface SectorAdjustmentRow {
  metric: string;
  cells: Readonly<Record<SectorBucket, string | null>>;
  notes: string | null;
}

export function isCategory(value: string): value is Category {
  const names: readonly string[] = CATEGORIES;
  return names.includes(value);
}

/** Build a per-category record without casting. */
export function mapCategories<T>(f: (category: Category) => T): Record<Category, T> {
  return {
    Valuation: f("Valuation"),
    Profitability: f("Profitability"),
    "Balance Sheet": f("Balance Sheet"),
    Growth: f("Growth"),
    Risk: f("Risk"),
  };
}
