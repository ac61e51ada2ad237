import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  ChecklistLoadError,
  loadChecklist,
  readCategoryRows,
  readSectorAdjustmentRows,
} from "../src/data-sources/checklist-store.js";
import { DEFAULT_BUCKET } from "../src/domain/checklist/types.js";
import { CHECKLIST_FIXTURE_DIR, FIXTURES_DIR } from "./fixtures.js";

describe("readCategoryRows", () => {
  it("maps each metric row to a default-bucket entry", () => {
    const rows = readCategoryRows(
      "Metric,Green,Yellow,Red,Marking,Notes\n" +
        "Current Ratio,> 1.5,1-1.5,< 1,Higher is better,\n" +
        ",> 1,,,,\n",
    );
    expect(rows).toEqual({
      "Current Ratio": {
        [DEFAULT_BUCKET]: {
          greenText: "> 1.5",
          yellowText: "1-1.5",
          redText: "< 1",
          marking: "Higher is better",
          notes: null,
        },
      },
    });
  });
});

describe("readCategoryRows with an unquoted comma", () => {
  it("keeps the header columns and warns about the extra field", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    try {
      const rows = readCategoryRows(
        "Metric,Green,Yellow,Red,Marking,Notes\n" +
          "P/E (TTM),< 15,15-25,> 25,Lower is better,Normalize, then compare\n",
        "Valuation.csv",
      );
      expect(rows["P/E (TTM)"][DEFAULT_BUCKET]?.notes).toBe("Normalize");
      expect(errorSpy).toHaveBeenCalledWith(
        "[WARN] Valuation.csv: row 1 has 7 fields but the header has 6; " +
          "extra fields ignored (quote cells that contain commas)",
      );
    } finally {
      errorSpy.mockRestore();
    }
  });
});

describe("readSectorAdjustmentRows", () => {
  it("keeps known sector columns and the notes column", () => {
    const rows = readSectorAdjustmentRows(
      "Metric,REITs,Crypto,Notes (why/when)\n" +
        'P/FFO,"< 16 / 16-22 / > 22",< 1 / 1-2 / > 2,REIT multiples\n',
    );
    expect(rows).toEqual([
      {
        metric: "P/FFO",
        cells: { REITs: "< 16 / 16-22 / > 22" },
        notes: "REIT multiples",
      },
    ]);
  });
});

describe("loadChecklist", () => {
  let errorSpy: MockInstance<typeof console.error>;
  let tmpDir: string | undefined;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("loads every category sheet", async () => {
    const spec = await loadChecklist(CHECKLIST_FIXTURE_DIR);

    expect(Object.keys(spec.Valuation)).toEqual(["P/E (TTM)", "EV/EBITDA (TTM)"]);
    expect(Object.keys(spec.Risk)).toEqual([
      "Beta (5Y)",
      "Market Cap",
      "SBC % of Market Cap (TTM)",
    ]);
    expect(spec.Valuation["P/E (TTM)"][DEFAULT_BUCKET]).toEqual({
      greenText: "< 15",
      yellowText: "15-25",
      redText: "> 25",
      marking: "Lower is better",
      notes: "Use normalized earnings",
    });
    expect(spec.Valuation["EV/EBITDA (TTM)"][DEFAULT_BUCKET]?.notes).toBeNull();
  });

  it("merges sector adjustments onto matching metrics", async () => {
    const spec = await loadChecklist(CHECKLIST_FIXTURE_DIR);

    expect(spec.Valuation["P/E (TTM)"]["Software/Tech"]).toEqual({
      greenText: "< 30",
      yellowText: "30-45",
      redText: "> 45",
      marking: "Lower is better",
      notes: "Sector-normal multiples",
    });
    expect(spec.Valuation["P/E (TTM)"]["Financials (Banks)"]?.greenText).toBe("< 12");
    expect(spec.Risk["Market Cap"]["Financials (Banks)"]).toEqual({
      greenText: "> $50B",
      yellowText: "$5B-$50B",
      redText: "< $5B",
      marking: "Higher is better",
      notes: "Banks need scale",
    });
  });

  it("keeps guarded metrics on their default thresholds", async () => {
    const spec = await loadChecklist(CHECKLIST_FIXTURE_DIR);
    expect(Object.keys(spec.Risk["SBC % of Market Cap (TTM)"])).toEqual([DEFAULT_BUCKET]);
    expect(Object.keys(spec.Valuation["EV/EBITDA (TTM)"])).toEqual([DEFAULT_BUCKET]);
  });

  it("returns a frozen spec", async () => {
    const spec = await loadChecklist(CHECKLIST_FIXTURE_DIR);
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.Risk["Market Cap"])).toBe(true);
  });

  it("leaves a missing category empty and warns", async () => {
    const spec = await loadChecklist(path.join(FIXTURES_DIR, "partial-checklist"));

    expect(Object.keys(spec.Valuation)).toEqual(["P/E (TTM)"]);
    expect(spec.Growth).toEqual({});
    expect(errorSpy).toHaveBeenCalledWith(
      "[WARN] Checklist category file missing: Growth.csv (category left empty)",
    );
  });

  it("throws when the directory does not exist", async () => {
    const missing = path.join(FIXTURES_DIR, "no-such-checklist");
    await expect(loadChecklist(missing)).rejects.toThrow(ChecklistLoadError);
    await expect(loadChecklist(missing)).rejects.toThrow(
      `Checklist directory not found: ${missing}`,
    );
  });

  it("throws when the directory has no category files", async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "checklist-store-test-"));
    await expect(loadChecklist(tmpDir)).rejects.toThrow(/No checklist category files/);
  });
});
