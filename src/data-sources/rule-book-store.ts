import fs from "fs";
import fsp from "fs/promises";
import { logInfo, logWarn, logError, getErrorMessage } from "../core/logging.js";
import {
  DEFAULT_RULE_BOOK,
  parseRuleBook,
  type RuleBook,
} from "../domain/gates/rule-set.js";

/**
 * Load the eligibility rule book from its JSON source.
 *
 * Never throws: a missing file, unreadable JSON or a document that is not
 * an object all fall back to the built-in rule book. Modes that fail to
 * parse fall back individually.
 */
export async function loadRuleBook(rulesPath: string): Promise<RuleBook> {
  if (!fs.existsSync(rulesPath)) {
    logWarn(`Eligibility rules not found at ${rulesPath}; using built-in rules`);
    return DEFAULT_RULE_BOOK;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fsp.readFile(rulesPath, "utf-8"));
  } catch (err) {
    logError(
      `Failed to read eligibility rules from ${rulesPath}; using built-in rules:`,
      getErrorMessage(err),
    );
    return DEFAULT_RULE_BOOK;
  }

  const parsed = parseRuleBook(raw);
  if (!parsed) {
    logError(
      `Eligibility rules in ${rulesPath} must be a JSON object; using built-in rules`,
    );
    return DEFAULT_RULE_BOOK;
  }

  for (const problem of parsed.problems) {
    logWarn(`Eligibility rules: ${problem}`);
  }
  logInfo(`Eligibility rules loaded from ${rulesPath}`);
  return parsed.ruleBook;
}
