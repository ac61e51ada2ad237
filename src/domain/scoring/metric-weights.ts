import type { Category } from "../checklist/types.js";

interface WeightRule {
  contains: string[];
  weight: number;
}

interface CategoryWeighting {
  rules: WeightRule[];
  fallback: number;
}

/**
 * Relative importance of checklist metrics within their category.
 * Rules are substring matches tried in order; the first hit wins.
 */
const CATEGORY_WEIGHTING: Record<Category, CategoryWeighting> = {
  Valuation: {
    rules: [
      { contains: ["EV/FCF", "FCF Yield", "EV/EBIT"], weight: 1.6 },
      { contains: ["EV/EBITDA", "P/E"], weight: 1.3 },
      { contains: ["P/S", "EV/Gross Profit"], weight: 1.1 },
    ],
    fallback: 1.0,
  },
  Profitability: {
    rules: [
      { contains: ["ROIC"], weight: 1.8 },
      { contains: ["Operating Margin", "FCF Margin"], weight: 1.4 },
      { contains: ["Gross Margin", "Net Margin"], weight: 1.2 },
      { contains: ["CFO / Net Income", "ROE"], weight: 1.0 },
    ],
    fallback: 1.0,
  },
  "Balance Sheet": {
    rules: [
      { contains: ["Net Debt / EBITDA", "Interest Coverage"], weight: 1.7 },
      { contains: ["Net Debt / FCF", "FCF / Interest"], weight: 1.4 },
      { contains: ["Current Ratio", "Quick Ratio"], weight: 1.0 },
      { contains: ["Cash / Total Assets"], weight: 0.8 },
    ],
    fallback: 1.0,
  },
  Growth: {
    rules: [
      { contains: ["FCF per Share CAGR", "Revenue per Share CAGR"], weight: 1.4 },
      { contains: ["Revenue CAGR"], weight: 1.2 },
    ],
    fallback: 0.9,
  },
  Risk: {
    rules: [
      { contains: ["Max Drawdown", "Realized Volatility"], weight: 1.4 },
      { contains: ["Worst Weekly Return"], weight: 1.3 },
      { contains: ["Avg Daily $ Volume"], weight: 1.2 },
      { contains: ["Beta"], weight: 1.0 },
      { contains: ["Short Interest", "Days to Cover"], weight: 0.9 },
      { contains: ["Market Cap"], weight: 0.7 },
    ],
    fallback: 1.0,
  },
};

export function metricWeight(category: Category, metric: string): number {
  const { rules, fallback } = CATEGORY_WEIGHTING[category];
  const hit = rules.find((rule) => rule.contains.some((s) => metric.includes(s)));
  return hit ? hit.weight : fallback;
}
