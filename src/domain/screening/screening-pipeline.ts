import type { ThresholdSpec } from "../checklist/types.js";
import { evaluateEligibility } from "../gates/eligibility-gate.js";
import type { EligibilityResult } from "../gates/gate-types.js";
import type { RuleBook } from "../gates/rule-set.js";
import { mapCategories } from "../checklist/types.js";
import { scoreTicker } from "../scoring/score-ticker.js";
import type { TickerMetrics, TickerScorecard } from "../scoring/types.js";
import { generateScreeningSummary, type ScreeningSummary } from "./messages.js";
import { logDebug, logError, getErrorMessage } from "../../core/logging.js";

export interface ScreeningPipelineConfig {
  thresholds: ThresholdSpec;
  ruleBook: RuleBook;
  mode: string;
  reasonsMaxItems: number;
}

/** Metric values plus the signals computed by other parts of the report. */
export interface ScreeningInput extends TickerMetrics {
  reversalTotalScore?: number | null;
  downsideProtectionLabel?: string | null;
}

export interface ScreeningOutcome {
  ticker: string;
  scorecard: TickerScorecard;
  eligibility: EligibilityResult;
  summary: ScreeningSummary;
}

export interface FilteredTicker {
  ticker: string;
  outcome: ScreeningOutcome;
  firstReason: string;
}

export interface BatchScreeningResult {
  candidates: ScreeningOutcome[];
  filtered: FilteredTicker[];
  dropped: Array<{ ticker: string; reason: string }>;
  errors: Array<{ ticker: string; error: string }>;
  stats: { pass: number; watch: number; fail: number; dropped: number; error: number };
}

function hasAnyValue(input: TickerMetrics): boolean {
  return Object.values(input.values).some(
    (v) => v !== null && v !== undefined,
  );
}

// ScreeningPipeline scores tickers against one checklist and rule book.
// Both are loaded once per run and shared read-only across every ticker.
export class ScreeningPipeline {
  private config: ScreeningPipelineConfig;

  constructor(config: ScreeningPipelineConfig) {
    this.config = config;
  }

  get mode(): string {
    return this.config.mode;
  }

  screen(input: ScreeningInput, mode: string = this.config.mode): ScreeningOutcome {
    const { thresholds, ruleBook, reasonsMaxItems } = this.config;

    const scorecard = scoreTicker(input, thresholds);
    const { categories } = scorecard;

    const eligibility = evaluateEligibility(ruleBook, {
      mode,
      categoryAdjustedScores: mapCategories(
        (c) => categories[c].score.adjustedScorePct,
      ),
      categoryCoverages: mapCategories((c) => categories[c].score.coveragePct),
      perCategoryRatings: mapCategories((c) => categories[c].ratings),
      sectorBucket: scorecard.sectorBucket,
      fundamentalAdjustedScore: scorecard.fundamentalAdjustedPct,
      reversalTotalScore: input.reversalTotalScore,
      downsideProtectionLabel: input.downsideProtectionLabel,
    });

    logDebug(
      `${input.ticker}: ${eligibility.status} (coverage ${eligibility.overallCoveragePct.toFixed(1)}%)`,
    );

    return {
      ticker: input.ticker,
      scorecard,
      eligibility,
      summary: generateScreeningSummary(scorecard, eligibility, reasonsMaxItems),
    };
  }

  /**
   * Screen every ticker; a failure on one ticker is recorded and the batch
   * continues. Tickers with no metric values at all are dropped unscored.
   */
  screenBatch(
    inputs: readonly ScreeningInput[],
    mode: string = this.config.mode,
  ): BatchScreeningResult {
    const result: BatchScreeningResult = {
      candidates: [],
      filtered: [],
      dropped: [],
      errors: [],
      stats: { pass: 0, watch: 0, fail: 0, dropped: 0, error: 0 },
    };

    for (const input of inputs) {
      if (!hasAnyValue(input)) {
        result.stats.dropped++;
        result.dropped.push({ ticker: input.ticker, reason: "no metric data" });
        continue;
      }

      try {
        const outcome = this.screen(input, mode);
        const { status, reasons } = outcome.eligibility;
        if (status === "FAIL") {
          result.stats.fail++;
          result.filtered.push({
            ticker: input.ticker,
            outcome,
            firstReason: reasons[0] ?? "",
          });
        } else {
          if (status === "PASS") result.stats.pass++;
          else result.stats.watch++;
          result.candidates.push(outcome);
        }
      } catch (err) {
        const message = getErrorMessage(err);
        logError(`Screening failed for ${input.ticker}:`, message);
        result.stats.error++;
        result.errors.push({ ticker: input.ticker, error: message });
      }
    }

    return result;
  }
}
