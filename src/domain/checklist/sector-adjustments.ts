import {
  CATEGORIES,
  DEFAULT_BUCKET,
  mapCategories,
  type Category,
  type SectorAdjustmentRow,
  type SectorBucket,
  type ThresholdEntry,
  type ThresholdSpec,
} from "./types.js";
import { metricNamesMatch, normalizeMetricName } from "./metric-matcher.js";

type MutableSpec = Record<Category, Record<string, Record<SectorBucket, ThresholdEntry>>>;

// Helper rows in the adjustments table that are not metrics
const HEADING_MARKERS = ["how to use", "step", "sector id", "adjustments", "notes"];

export interface AdjustmentTexts {
  greenText: string;
  yellowText: string;
  redText: string;
}

export function emptySpec(): MutableSpec {
  return mapCategories<Record<string, Record<SectorBucket, ThresholdEntry>>>(
    () => ({}),
  );
}

function cloneSpec(spec: ThresholdSpec): MutableSpec {
  const copy = emptySpec();
  for (const category of CATEGORIES) {
    for (const [metric, byBucket] of Object.entries(spec[category])) {
      copy[category][metric] = { ...byBucket };
    }
  }
  return copy;
}

export function isHeadingRow(metric: string): boolean {
  const m = normalizeMetricName(metric);
  if (!m) return true;
  return HEADING_MARKERS.some((marker) => m.includes(marker));
}

/** "< 15 / 15-25 / > 25" → green, yellow, red texts. */
export function splitAdjustmentCell(
  cell: string | null | undefined,
): AdjustmentTexts | null {
  if (!cell || !cell.trim()) return null;
  const parts = cell
    .split("/")
    .map((p) => p.trim())
    .filter(Boolean);
  if (parts.length < 3) return null;
  return { greenText: parts[0], yellowText: parts[1], redText: parts[2] };
}

/**
 * Merge sector adjustment rows onto a threshold spec.
 *
 * Every checklist metric (in any category) whose name matches a row label
 * gets a sector entry per non-empty cell. Markings are inherited from the
 * metric's default entry. Returns a new spec; the input is not modified.
 */
export function applySectorAdjustments(
  spec: ThresholdSpec,
  rows: readonly SectorAdjustmentRow[],
): ThresholdSpec {
  const next = cloneSpec(spec);

  for (const row of rows) {
    const label = row.metric.trim();
    if (isHeadingRow(label)) continue;

    for (const [bucket, cell] of Object.entries(row.cells)) {
      const texts = splitAdjustmentCell(cell);
      if (!texts) continue;

      for (const category of CATEGORIES) {
        for (const [metric, byBucket] of Object.entries(next[category])) {
          if (!metricNamesMatch(label, metric)) continue;
          byBucket[bucket] = {
            ...texts,
            marking: byBucket[DEFAULT_BUCKET]?.marking ?? null,
            notes: row.notes,
          };
        }
      }
    }
  }

  return next;
}

/**
 * Threshold entry for a metric in a sector bucket, falling back to the
 * default bucket. Null when the metric is not on the checklist.
 */
export function getThresholdSet(
  spec: ThresholdSpec,
  category: Category,
  metric: string,
  bucket: SectorBucket,
): ThresholdEntry | null {
  const byBucket = spec[category][metric];
  if (!byBucket) return null;
  if (Object.hasOwn(byBucket, bucket)) return byBucket[bucket];
  return byBucket[DEFAULT_BUCKET] ?? null;
}

/** Which bucket's thresholds getThresholdSet() will use. */
export function resolveSectorMode(
  spec: ThresholdSpec,
  category: Category,
  metric: string,
  bucket: SectorBucket,
): SectorBucket {
  const byBucket = spec[category][metric];
  return byBucket && Object.hasOwn(byBucket, bucket) ? bucket : DEFAULT_BUCKET;
}

export function freezeSpec(spec: ThresholdSpec): ThresholdSpec {
  for (const category of CATEGORIES) {
    for (const byBucket of Object.values(spec[category])) {
      for (const entry of Object.values(byBucket)) Object.freeze(entry);
      Object.freeze(byBucket);
    }
    Object.freeze(spec[category]);
  }
  return Object.freeze(spec);
}
