import { describe, it, expect } from "vitest";
import { limitsText, scoreTicker } from "../src/domain/scoring/score-ticker.js";
import { ABERRANT_OUTLIER } from "../src/domain/scoring/outlier-guard.js";
import { DEFAULT_BUCKET } from "../src/domain/checklist/types.js";
import { allGreenValues, makeEntry, makeSmallSpec } from "./fixtures.js";

describe("limitsText", () => {
  it("lists the threshold texts that are present", () => {
    expect(limitsText(makeEntry("< 15", "15-25", "> 25"))).toBe("G:< 15 | Y:15-25 | R:> 25");
    expect(limitsText(makeEntry("> 10%", null, "< 3%"))).toBe("G:> 10% | R:< 3%");
    expect(limitsText(null)).toBe("");
  });
});

describe("scoreTicker", () => {
  const spec = makeSmallSpec();

  it("scores 100 everywhere when every metric is GREEN", () => {
    const card = scoreTicker({ ticker: "AAA", values: allGreenValues() }, spec);

    expect(card.sectorBucket).toBe(DEFAULT_BUCKET);
    expect(card.categories.Valuation.score).toEqual({
      rawScorePct: 100,
      coveragePct: 100,
      adjustedScorePct: 100,
    });
    expect(card.fundamentalRawPct).toBeCloseTo(100);
    expect(card.totalCoveragePct).toBeCloseTo(100);
    expect(card.fundamentalAdjustedPct).toBeCloseTo(100);
  });

  it("rates against the sector bucket when it has its own thresholds", () => {
    const values = { ...allGreenValues(), "P/E (TTM)": 28 };

    const tech = scoreTicker({ ticker: "TECH", sectorBucket: "Software/Tech", values }, spec);
    const pe = tech.categories.Valuation.metrics.find((m) => m.metric === "P/E (TTM)");
    expect(pe?.rating).toBe("GREEN");
    expect(pe?.sectorMode).toBe("Software/Tech");
    expect(pe?.limitsText).toBe("G:< 30 | Y:30-45 | R:> 45");

    const plain = scoreTicker({ ticker: "PLN", values }, spec);
    expect(plain.categories.Valuation.ratings["P/E (TTM)"]).toBe("RED");
    // P/E RED (1.3) + EV/EBITDA GREEN (1.6): 3.2 / 5.8
    expect(plain.categories.Valuation.score.rawScorePct).toBeCloseTo(55.172, 2);
  });

  it("suppresses an aberrant value to NA with a note and keeps the raw value", () => {
    const values = { ...allGreenValues(), "Operating Margin (TTM %)": 3500 };
    const card = scoreTicker({ ticker: "ODD", values }, spec);

    const om = card.categories.Profitability.metrics.find(
      (m) => m.metric === "Operating Margin (TTM %)",
    );
    expect(om).toMatchObject({
      rating: "NA",
      value: null,
      rawValue: 3500,
      points: null,
      weightedPoints: null,
      notes: `⚠ ${ABERRANT_OUTLIER}`,
    });
    // ROE (1.0) still GREEN, Operating Margin (1.4) excluded
    expect(card.categories.Profitability.score.rawScorePct).toBe(100);
    expect(card.categories.Profitability.score.coveragePct).toBeCloseTo(41.667, 2);
  });

  it("rates missing values NA and combines checklist and fetch notes", () => {
    const values = { ...allGreenValues(), "P/E (TTM)": null };
    const card = scoreTicker(
      { ticker: "GAP", values, notes: { "P/E (TTM)": "Stale quote" } },
      spec,
    );

    const pe = card.categories.Valuation.metrics.find((m) => m.metric === "P/E (TTM)");
    expect(pe).toMatchObject({
      rating: "NA",
      value: null,
      rawValue: null,
      weight: 1.3,
      notes: "Use normalized earnings\n⚠ Stale quote",
    });
  });

  it("reports weighted points for rated metrics", () => {
    const card = scoreTicker({ ticker: "AAA", values: allGreenValues() }, spec);
    const nd = card.categories["Balance Sheet"].metrics.find(
      (m) => m.metric === "Net Debt / EBITDA",
    );
    expect(nd?.points).toBe(2);
    expect(nd?.weightedPoints).toBeCloseTo(3.4);
  });

  it("leaves blended scores null with no data at all", () => {
    const card = scoreTicker({ ticker: "NONE", values: {} }, spec);
    expect(card.fundamentalRawPct).toBeNull();
    expect(card.fundamentalAdjustedPct).toBeNull();
    expect(card.totalCoveragePct).toBe(0);
  });
});
