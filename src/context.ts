import { loadConfig, type ScreeningConfig } from "./core/config.js";
import { loadChecklist } from "./data-sources/checklist-store.js";
import { loadRuleBook } from "./data-sources/rule-book-store.js";
import type { ThresholdSpec } from "./domain/checklist/types.js";
import type { RuleBook } from "./domain/gates/rule-set.js";
import { resolveMode } from "./domain/gates/modes.js";
import { ScreeningPipeline } from "./domain/screening/screening-pipeline.js";
import { logInfo } from "./core/logging.js";

export interface ScreeningContext {
  config: ScreeningConfig;
  thresholds: ThresholdSpec;
  ruleBook: RuleBook;
  pipeline: ScreeningPipeline;
}

/**
 * Create and initialize the screening context.
 * All file loading happens here (not at module import time). A checklist
 * that cannot be loaded is fatal; the rule book falls back to built-ins.
 */
export async function createScreeningContext(
  overrides: Partial<ScreeningConfig> = {},
): Promise<ScreeningContext> {
  const config = loadConfig(overrides);

  const thresholds = await loadChecklist(config.checklistDir);
  const ruleBook = await loadRuleBook(config.rulesPath);

  const pipeline = new ScreeningPipeline({
    thresholds,
    ruleBook,
    mode: config.defaultMode,
    reasonsMaxItems: config.reasonsMaxItems,
  });

  logInfo(`Screening ready (mode: ${resolveMode(config.defaultMode)})`);

  return { config, thresholds, ruleBook, pipeline };
}
