import { describe, it, expect } from "vitest";
import {
  applySectorAdjustments,
  getThresholdSet,
  isHeadingRow,
  resolveSectorMode,
  splitAdjustmentCell,
  freezeSpec,
} from "../src/domain/checklist/sector-adjustments.js";
import { DEFAULT_BUCKET } from "../src/domain/checklist/types.js";
import { defaultOnly, makeEntry, makeSmallSpec, makeSpec } from "./fixtures.js";

describe("splitAdjustmentCell", () => {
  it("splits green / yellow / red on slashes", () => {
    expect(splitAdjustmentCell("< 30 / 30-45 / > 45")).toEqual({
      greenText: "< 30",
      yellowText: "30-45",
      redText: "> 45",
    });
  });

  it("rejects cells with fewer than three parts", () => {
    expect(splitAdjustmentCell("< 30 / 30-45")).toBeNull();
    expect(splitAdjustmentCell("")).toBeNull();
    expect(splitAdjustmentCell(null)).toBeNull();
  });
});

describe("isHeadingRow", () => {
  it("flags helper rows and blanks", () => {
    expect(isHeadingRow("How to use this sheet")).toBe(true);
    expect(isHeadingRow("Step 2: pick a sector")).toBe(true);
    expect(isHeadingRow("Sector ID")).toBe(true);
    expect(isHeadingRow("   ")).toBe(true);
  });

  it("passes metric rows through", () => {
    expect(isHeadingRow("P/E")).toBe(false);
    expect(isHeadingRow("Net Debt / EBITDA")).toBe(false);
  });
});

describe("applySectorAdjustments", () => {
  const base = makeSpec({
    Valuation: {
      "P/E (TTM)": defaultOnly(makeEntry("< 15", "15-25", "> 25", { marking: "Lower is better" })),
    },
    Risk: {
      "Market Cap": defaultOnly(makeEntry("> $10B", "$2B-$10B", "< $2B")),
      "SBC % of Market Cap (TTM)": defaultOnly(makeEntry("< 1%", "1-3%", "> 3%")),
    },
  });

  it("adds a sector entry with the default marking and the row's notes", () => {
    const spec = applySectorAdjustments(base, [
      {
        metric: "P/E",
        cells: { "Software/Tech": "< 30 / 30-45 / > 45", REITs: null },
        notes: "Sector-normal multiples",
      },
    ]);

    expect(spec.Valuation["P/E (TTM)"]["Software/Tech"]).toEqual({
      greenText: "< 30",
      yellowText: "30-45",
      redText: "> 45",
      marking: "Lower is better",
      notes: "Sector-normal multiples",
    });
    expect(Object.keys(spec.Valuation["P/E (TTM)"]).sort()).toEqual([
      DEFAULT_BUCKET,
      "Software/Tech",
    ]);
  });

  it("does not touch metrics guarded against the row label", () => {
    const spec = applySectorAdjustments(base, [
      {
        metric: "Market Cap",
        cells: { "Financials (Banks)": "> $50B / $5B-$50B / < $5B" },
        notes: null,
      },
    ]);

    expect(spec.Risk["Market Cap"]["Financials (Banks)"]?.greenText).toBe("> $50B");
    expect(Object.keys(spec.Risk["SBC % of Market Cap (TTM)"])).toEqual([DEFAULT_BUCKET]);
  });

  it("skips heading rows", () => {
    const spec = applySectorAdjustments(base, [
      { metric: "Notes", cells: { REITs: "a / b / c" }, notes: null },
    ]);
    expect(spec).toEqual(base);
  });

  it("leaves the input spec unchanged", () => {
    applySectorAdjustments(base, [
      { metric: "P/E", cells: { REITs: "< 20 / 20-30 / > 30" }, notes: null },
    ]);
    expect(Object.keys(base.Valuation["P/E (TTM)"])).toEqual([DEFAULT_BUCKET]);
  });
});

describe("getThresholdSet / resolveSectorMode", () => {
  const spec = makeSmallSpec();

  it("uses the sector entry when present", () => {
    expect(getThresholdSet(spec, "Valuation", "P/E (TTM)", "Software/Tech")?.greenText).toBe("< 30");
    expect(resolveSectorMode(spec, "Valuation", "P/E (TTM)", "Software/Tech")).toBe("Software/Tech");
  });

  it("falls back to the default bucket", () => {
    expect(getThresholdSet(spec, "Valuation", "P/E (TTM)", "REITs")?.greenText).toBe("< 15");
    expect(resolveSectorMode(spec, "Valuation", "P/E (TTM)", "REITs")).toBe(DEFAULT_BUCKET);
  });

  it("returns null for a metric not on the checklist", () => {
    expect(getThresholdSet(spec, "Valuation", "P/B", DEFAULT_BUCKET)).toBeNull();
  });
});

describe("freezeSpec", () => {
  it("freezes every level", () => {
    const spec = freezeSpec(makeSmallSpec());
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.Valuation)).toBe(true);
    expect(Object.isFrozen(spec.Valuation["P/E (TTM)"])).toBe(true);
    expect(Object.isFrozen(spec.Valuation["P/E (TTM)"][DEFAULT_BUCKET])).toBe(true);
  });
});
