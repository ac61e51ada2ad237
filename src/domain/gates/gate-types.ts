import type { Category, SectorBucket } from "../checklist/types.js";
import type { CategoryValues, RatingsByMetric } from "../scoring/types.js";
import type { ScreeningMode } from "./modes.js";

export type EligibilityStatus = "PASS" | "WATCH" | "FAIL";

export type EligibilityLabel = "ELIGIBLE" | "WATCH" | "INELIGIBLE";

export type GateName =
  | "overall_coverage"
  | "category_coverage"
  | "category_score"
  | "downside_protection"
  | "total_score"
  | "sector_anchor";

// coverage = the data cannot be trusted (always FAIL)
// score = the data is readable but weak (WATCH outside strict mode)
export type GateReasonKind = "coverage" | "score";

export interface GateReason {
  gate: GateName;
  kind: GateReasonKind;
  detail: string;
  category?: Category;
}

export interface EligibilityInput {
  mode: string;
  categoryAdjustedScores: CategoryValues<number | null>;
  categoryCoverages: CategoryValues<number>;
  perCategoryRatings: CategoryValues<RatingsByMetric>;
  sectorBucket?: SectorBucket | null;
  fundamentalAdjustedScore?: number | null;
  reversalTotalScore?: number | null;
  downsideProtectionLabel?: string | null;
}

export interface EligibilityResult {
  readonly mode: ScreeningMode;
  readonly status: EligibilityStatus;
  readonly label: EligibilityLabel;
  readonly overallCoveragePct: number;
  readonly reasons: readonly string[];
  readonly gateReasons: readonly GateReason[];
}
