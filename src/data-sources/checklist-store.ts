import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import { parse } from "csv-parse/sync";
import { logInfo, logWarn, logDebug } from "../core/logging.js";
import {
  CATEGORIES,
  DEFAULT_BUCKET,
  SECTOR_BUCKETS,
  type Category,
  type SectorAdjustmentRow,
  type SectorBucket,
  type ThresholdEntry,
  type ThresholdSpec,
} from "../domain/checklist/types.js";
import {
  applySectorAdjustments,
  emptySpec,
  freezeSpec,
} from "../domain/checklist/sector-adjustments.js";

export const SECTOR_ADJUSTMENTS_FILE = "Sector Adjustments.csv";
const NOTES_COLUMN = "Notes (why/when)";

export class ChecklistLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChecklistLoadError";
  }
}

type CsvRow = Record<string, string>;

function isFieldList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Header-keyed rows. Blank lines are skipped and cells trimmed. A row with
 * more fields than the header (usually an unquoted comma) is logged; its
 * extra fields are ignored.
 */
export function parseCsvRows(content: string, source = "CSV"): CsvRow[] {
  const records: unknown = parse(content, {
    skip_empty_lines: true,
    trim: true,
    bom: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) return [];

  const [header, ...body] = records.filter(isFieldList);
  if (!header) return [];

  return body.map((fields, i) => {
    if (fields.length > header.length) {
      logWarn(
        `${source}: row ${i + 1} has ${fields.length} fields but the header has ${header.length}; ` +
          `extra fields ignored (quote cells that contain commas)`,
      );
    }
    const row: CsvRow = {};
    header.forEach((column, j) => {
      if (column) row[column] = fields[j] ?? "";
    });
    return row;
  });
}

function cell(row: CsvRow, column: string): string | null {
  const value = row[column]?.trim();
  return value ? value : null;
}

export function categoryFileName(category: Category): string {
  return `${category}.csv`;
}

/** Category sheet columns: Metric, Green, Yellow, Red, Marking, Notes. */
export function readCategoryRows(
  content: string,
  source?: string,
): Record<string, Record<SectorBucket, ThresholdEntry>> {
  const metrics: Record<string, Record<SectorBucket, ThresholdEntry>> = {};
  for (const row of parseCsvRows(content, source)) {
    const metric = cell(row, "Metric");
    if (!metric) continue;
    metrics[metric] = { [DEFAULT_BUCKET]: defaultEntry(row) };
  }
  return metrics;
}

function defaultEntry(row: CsvRow): ThresholdEntry {
  return {
    greenText: cell(row, "Green"),
    yellowText: cell(row, "Yellow"),
    redText: cell(row, "Red"),
    marking: cell(row, "Marking"),
    notes: cell(row, "Notes"),
  };
}

/** Sector adjustment rows; sector columns missing from the header are ignored. */
export function readSectorAdjustmentRows(
  content: string,
  source?: string,
): SectorAdjustmentRow[] {
  const rows: SectorAdjustmentRow[] = [];
  for (const row of parseCsvRows(content, source)) {
    const metric = cell(row, "Metric");
    if (!metric) continue;

    const cells: Record<SectorBucket, string | null> = {};
    for (const bucket of SECTOR_BUCKETS) {
      if (Object.hasOwn(row, bucket)) cells[bucket] = cell(row, bucket);
    }
    rows.push({ metric, cells, notes: cell(row, NOTES_COLUMN) });
  }
  return rows;
}

/**
 * Load the fundamentals checklist from a directory of CSV exports
 * (one `<Category>.csv` per category plus an optional
 * `Sector Adjustments.csv`). The returned spec is frozen.
 *
 * Throws ChecklistLoadError when the directory is missing or holds no
 * category file at all; a single missing category is logged and left empty.
 */
export async function loadChecklist(dir: string): Promise<ThresholdSpec> {
  if (!fs.existsSync(dir)) {
    throw new ChecklistLoadError(`Checklist directory not found: ${dir}`);
  }

  const spec = emptySpec();
  const missing: Category[] = [];

  for (const category of CATEGORIES) {
    const file = path.join(dir, categoryFileName(category));
    if (!fs.existsSync(file)) {
      missing.push(category);
      continue;
    }
    const content = await fsp.readFile(file, "utf-8");
    spec[category] = readCategoryRows(content, categoryFileName(category));
    logDebug(
      `Checklist ${category}: ${Object.keys(spec[category]).length} metrics`,
    );
  }

  if (missing.length === CATEGORIES.length) {
    throw new ChecklistLoadError(
      `No checklist category files in ${dir} (expected ${CATEGORIES.map(categoryFileName).join(", ")})`,
    );
  }
  for (const category of missing) {
    logWarn(`Checklist category file missing: ${categoryFileName(category)} (category left empty)`);
  }

  let result: ThresholdSpec = spec;
  const adjustmentsFile = path.join(dir, SECTOR_ADJUSTMENTS_FILE);
  if (fs.existsSync(adjustmentsFile)) {
    const rows = readSectorAdjustmentRows(
      await fsp.readFile(adjustmentsFile, "utf-8"),
      SECTOR_ADJUSTMENTS_FILE,
    );
    result = applySectorAdjustments(spec, rows);
    logDebug(`Sector adjustments: ${rows.length} rows`);
  }

  const total = CATEGORIES.reduce(
    (n, category) => n + Object.keys(result[category]).length,
    0,
  );
  logInfo(`Checklist loaded: ${total} metrics from ${dir}`);

  return freezeSpec(result);
}
