/**
 * Outlier suppression against checklist limits.
 *
 * A value far outside the corridor implied by its own thresholds is almost
 * always a unit or data error upstream (a ratio reported as a fraction, a
 * currency value in the wrong scale). Such values are rated NA and
 * annotated; the raw value itself is never rewritten.
 */

export interface AberrantCheck {
  aberrant: boolean;
  reason: string;
}

// Size-denominated metrics legitimately span many orders of magnitude
const SIZE_METRICS = ["Market Cap", "Enterprise Value", "Avg Daily $ Volume"];

const CORRIDOR_MULTIPLIER = 50;
const MIN_SPAN_FRACTION = 0.05;
const MAX_UNBOUNDED_MAGNITUDE = 1e15;

const OK: AberrantCheck = { aberrant: false, reason: "" };

export const ABERRANT_NON_FINITE =
  "No meaningful data to calculate this metric (NaN/Inf).";
export const ABERRANT_EXTREME =
  "No meaningful data to calculate this metric (extreme magnitude).";
export const ABERRANT_OUTLIER =
  "No meaningful data to calculate this metric (aberrant outlier vs checklist limits).";

export function isSizeMetric(metricName: string): boolean {
  return SIZE_METRICS.some((m) => metricName.includes(m));
}

/** Hard limits derived from the checklist bounds, or null when unbounded. */
export function corridorLimits(
  low: number | null,
  high: number | null,
): { hardLow: number; hardHigh: number } | null {
  if (low === null && high === null) return null;

  const ref = Math.max(
    ...[low, high].filter((x): x is number => x !== null).map(Math.abs),
    1.0,
  );

  if (low !== null && high !== null) {
    const span = Math.max(Math.abs(high - low), ref * MIN_SPAN_FRACTION);
    return {
      hardLow: low - CORRIDOR_MULTIPLIER * span,
      hardHigh: high + CORRIDOR_MULTIPLIER * span,
    };
  }
  if (high !== null) {
    return {
      hardLow: -CORRIDOR_MULTIPLIER * ref,
      hardHigh: high + CORRIDOR_MULTIPLIER * ref,
    };
  }
  return {
    hardLow: (low ?? -ref) - CORRIDOR_MULTIPLIER * ref,
    hardHigh: CORRIDOR_MULTIPLIER * ref,
  };
}

export function checkAberrant(
  metricName: string,
  value: number | null | undefined,
  low: number | null,
  high: number | null,
): AberrantCheck {
  if (value === null || value === undefined) return OK;
  if (!Number.isFinite(value)) {
    return { aberrant: true, reason: ABERRANT_NON_FINITE };
  }

  if (isSizeMetric(metricName)) return OK;

  const limits = corridorLimits(low, high);
  if (limits === null) {
    return Math.abs(value) > MAX_UNBOUNDED_MAGNITUDE
      ? { aberrant: true, reason: ABERRANT_EXTREME }
      : OK;
  }

  if (value < limits.hardLow || value > limits.hardHigh) {
    return { aberrant: true, reason: ABERRANT_OUTLIER };
  }
  return OK;
}
