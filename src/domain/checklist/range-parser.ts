import type { ParsedRange } from "./types.js";

const NUM = String.raw`[+-]?\d*\.?\d+`;

const QUALITATIVE_MARKERS = ["expanding", "stable", "contracting"];

const CURRENCY_MULTIPLIERS: Record<string, number> = {
  K: 1e3,
  M: 1e6,
  B: 1e9,
  T: 1e12,
};

const SUFFIX_PATTERN = new RegExp(String.raw`(${NUM})\s*([KMBT])\b`, "i");
const SUFFIX_STRIP_PATTERN = new RegExp(String.raw`(${NUM})\s*[KMBT]\b`, "gi");
const COMPARATOR_PATTERN = new RegExp(String.raw`(<=|>=|<|>)\s*(${NUM})`);
const RANGE_PATTERN = new RegExp(String.raw`(${NUM})\s*-\s*(${NUM})`);

function toText(cell: unknown): string | null {
  if (cell === null || cell === undefined) return null;
  const txt = String(cell).trim();
  return txt ? txt : null;
}

/**
 * Parse a free-text threshold cell into a numeric range.
 *
 * Handles "< 15", "15–25", "> 25 or negative", "> 6% | otherwise ...",
 * "< 3 days", "> $10B", "$10M-$50M" and "-35 to -50". A range carries one
 * currency multiplier, taken from its first suffix: "$500M - $2B" reads as
 * 2M..500M.
 * Returns null for blank, qualitative ("stable", "expanding") or
 * otherwise unparseable text. Never throws.
 */
export function parseRange(cell: unknown): ParsedRange | null {
  let txt = toText(cell);
  if (txt === null) return null;

  txt = txt.replace(/[–—]/g, "-").replace(/\s+/g, " ").trim();

  const lower = txt.toLowerCase();
  if (QUALITATIVE_MARKERS.some((w) => lower.includes(w))) return null;

  txt = txt.replace(/[,_]/g, "");

  // Currency suffixes only count when a $ is present ("5M" alone stays 5)
  let multiplier = 1;
  if (txt.includes("$")) {
    const suffix = SUFFIX_PATTERN.exec(txt);
    if (suffix) {
      multiplier = CURRENCY_MULTIPLIERS[suffix[2].toUpperCase()] ?? 1;
      txt = txt.replace(SUFFIX_STRIP_PATTERN, "$1");
    }
    txt = txt.replace(/\$/g, "").trim();
  }

  // Values are percentage points, not fractions
  txt = txt.replace(/%/g, "").trim();
  txt = txt.replace(/\s+to\s+/gi, " - ");

  const comparator = COMPARATOR_PATTERN.exec(txt);
  if (comparator) {
    const bound = Number(comparator[2]) * multiplier;
    return comparator[1].startsWith("<")
      ? { lower: null, upper: bound }
      : { lower: bound, upper: null };
  }

  const range = RANGE_PATTERN.exec(txt);
  if (range) {
    const a = Number(range[1]) * multiplier;
    const b = Number(range[2]) * multiplier;
    return a <= b ? { lower: a, upper: b } : { lower: b, upper: a };
  }

  return null;
}

/**
 * Widest numeric bounds across the green/yellow/red texts:
 * the smallest lower bound and the largest upper bound.
 */
export function extractNumericBounds(
  greenText: unknown,
  yellowText: unknown,
  redText: unknown,
): ParsedRange {
  const ranges = [greenText, yellowText, redText]
    .map(parseRange)
    .filter((r): r is ParsedRange => r !== null);

  const lows = ranges
    .map((r) => r.lower)
    .filter((n): n is number => n !== null);
  const highs = ranges
    .map((r) => r.upper)
    .filter((n): n is number => n !== null);

  return {
    lower: lows.length > 0 ? Math.min(...lows) : null,
    upper: highs.length > 0 ? Math.max(...highs) : null,
  };
}

/**
 * Membership of a value in a parsed range. One-sided ranges are strict
 * ("< 15" excludes 15); closed ranges are inclusive on both ends.
 */
export function inRange(value: number, range: ParsedRange | null): boolean {
  if (range === null) return false;
  const { lower, upper } = range;
  if (lower === null && upper !== null) return value < upper;
  if (lower !== null && upper === null) return value > lower;
  if (lower !== null && upper !== null) return lower <= value && value <= upper;
  return false;
}
