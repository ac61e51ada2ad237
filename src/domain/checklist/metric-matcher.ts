/**
 * Metric-name matching between sector adjustment rows and checklist metrics.
 *
 * Plain containment only counts for the safe prefixes below. The hard
 * guards keep generic rows like "Market Cap" off
 * "SBC % of Market Cap (TTM)".
 */

/** Prefixes for which plain containment is accepted as a match. */
const SAFE_PREFIXES = [
  "fcf yield",
  "ev/fcf",
  "margin trend",
  "roic",
  "share count cagr",
  "net buyback yield",
  "shareholder yield",
  "short interest",
  "days to cover",
  "avg daily",
  "max drawdown",
  "realized volatility",
  "worst weekly return",
  "p/e",
  "p/s",
  "ev/ebit",
  "ev/ebitda",
];

/** Markers that must appear on both sides or neither. */
const EXCLUSIVE_MARKERS = ["sbc", "%", "market cap"];

const MIN_TOKEN_OVERLAP = 0.85;
const MAX_LENGTH_DIFF = 12;

export function normalizeMetricName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, " ");
}

/** "FCF Yield (TTM, %)" → "FCF Yield" */
export function stripParentheticals(name: string): string {
  return name.replace(/\s*\([^)]*\)/g, "").trim();
}

function tokenSet(name: string): Set<string> {
  const cleaned = normalizeMetricName(stripParentheticals(name))
    .replace(/[^a-z0-9%/\- ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return new Set(cleaned.split(" ").filter(Boolean));
}

function tokenOverlap(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / Math.max(a.size, b.size);
}

/**
 * Does a sector adjustment row label refer to this checklist metric?
 *
 * Stages short-circuit in order: exact, exact without parentheticals,
 * hard guards, safe-prefix containment, token overlap.
 */
export function metricNamesMatch(
  adjustmentRowName: string,
  canonicalName: string,
): boolean {
  const a = normalizeMetricName(adjustmentRowName);
  const t = normalizeMetricName(canonicalName);
  if (!a || !t) return false;

  if (a === t) return true;

  const a2 = normalizeMetricName(stripParentheticals(adjustmentRowName));
  const t2 = normalizeMetricName(stripParentheticals(canonicalName));
  if (a2 && a2 === t2) return true;

  for (const marker of EXCLUSIVE_MARKERS) {
    if (a2.includes(marker) !== t2.includes(marker)) return false;
  }

  const hasSafePrefix = SAFE_PREFIXES.some(
    (p) => a2.startsWith(p) || t2.startsWith(p),
  );
  if (hasSafePrefix && a2 && t2 && (a2.includes(t2) || t2.includes(a2))) {
    return true;
  }

  const ta = tokenSet(adjustmentRowName);
  const tt = tokenSet(canonicalName);
  if (ta.size === 0 || tt.size === 0) return false;

  return (
    tokenOverlap(ta, tt) >= MIN_TOKEN_OVERLAP &&
    Math.abs(a2.length - t2.length) <= MAX_LENGTH_DIFF
  );
}
