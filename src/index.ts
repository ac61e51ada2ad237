export { createScreeningContext, type ScreeningContext } from "./context.js";
export {
  loadConfig,
  loadScreeningConfig,
  validateScreeningConfig,
  type ScreeningConfig,
} from "./core/config.js";

export * from "./domain/checklist/types.js";
export { parseRange, extractNumericBounds, inRange } from "./domain/checklist/range-parser.js";
export {
  metricNamesMatch,
  normalizeMetricName,
  stripParentheticals,
} from "./domain/checklist/metric-matcher.js";
export {
  applySectorAdjustments,
  getThresholdSet,
  resolveSectorMode,
} from "./domain/checklist/sector-adjustments.js";

export * from "./domain/scoring/types.js";
export { checkAberrant, type AberrantCheck } from "./domain/scoring/outlier-guard.js";
export { rate, ratingToPoints } from "./domain/scoring/rating.js";
export { metricWeight } from "./domain/scoring/metric-weights.js";
export {
  scoreCategory,
  adjustScore,
  applyCategoryCaps,
  buildCategoryScore,
} from "./domain/scoring/category-aggregator.js";
export { blend, CATEGORY_WEIGHTS } from "./domain/scoring/blend.js";
export { scoreTicker } from "./domain/scoring/score-ticker.js";

export * from "./domain/gates/gate-types.js";
export { SCREENING_MODES, resolveMode, type ScreeningMode } from "./domain/gates/modes.js";
export {
  DEFAULT_RULE_BOOK,
  parseRuleBook,
  type RuleBook,
  type RuleSet,
} from "./domain/gates/rule-set.js";
export { evaluateEligibility, reasonsText } from "./domain/gates/eligibility-gate.js";

export {
  ScreeningPipeline,
  type ScreeningInput,
  type ScreeningOutcome,
  type BatchScreeningResult,
} from "./domain/screening/screening-pipeline.js";
export {
  describeScoreBand,
  generateScreeningSummary,
  type ScreeningSummary,
} from "./domain/screening/messages.js";

export { loadChecklist, ChecklistLoadError } from "./data-sources/checklist-store.js";
export { loadRuleBook } from "./data-sources/rule-book-store.js";
