// Scoring Types

import type { Category, SectorBucket } from "../checklist/types.js";

export type Rating = "GREEN" | "YELLOW" | "RED" | "NA";

export type RatingsByMetric = Readonly<Record<string, Rating>>;
export type WeightsByMetric = Readonly<Record<string, number>>;

export type CategoryValues<T> = Partial<Record<Category, T>>;

export interface CategoryCoverage {
  rawScorePct: number | null; // null when nothing in the category was scorable
  coveragePct: number; // 0..100, share of positive weight that was scorable
}

export interface CategoryScore extends CategoryCoverage {
  adjustedScorePct: number | null;
}

export interface MetricScore {
  metric: string;
  value: number | null; // null when suppressed as aberrant
  rawValue: number | null;
  rating: Rating;
  points: number | null; // null when NA
  weight: number;
  weightedPoints: number | null;
  sectorMode: SectorBucket;
  limitsText: string;
  notes: string;
}

export interface CategoryScorecard {
  category: Category;
  metrics: MetricScore[];
  ratings: RatingsByMetric;
  score: CategoryScore;
}

export interface TickerScorecard {
  ticker: string;
  sectorBucket: SectorBucket;
  categories: Record<Category, CategoryScorecard>;
  fundamentalRawPct: number | null;
  totalCoveragePct: number | null;
  fundamentalAdjustedPct: number | null;
}

/** Metric values for one ticker, supplied by the market-data collaborator. */
export interface TickerMetrics {
  ticker: string;
  sectorBucket?: SectorBucket;
  values: Readonly<Record<string, number | null>>;
  /** Data-quality notes from the fetch layer, keyed by metric name. */
  notes?: Readonly<Record<string, string>>;
}
