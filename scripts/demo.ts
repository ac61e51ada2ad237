/**
 * Demo: score a few synthetic tickers against the bundled checklist.
 * Usage: npx tsx scripts/demo.ts [mode]
 */
import { createScreeningContext } from '../src/context.js';
import { CATEGORIES } from '../src/domain/checklist/types.js';
import { reasonsText } from '../src/domain/gates/eligibility-gate.js';
import type { ScreeningInput } from '../src/domain/screening/screening-pipeline.js';
import { getErrorMessage } from '../src/core/logging.js';

// ── Tickers ─────────────────────────────────────────────────────────
const compounder: ScreeningInput = {
  ticker: 'QUAL', sectorBucket: 'Software/Tech',
  values: {
    'EV/FCF (TTM)': 22, 'FCF Yield (TTM %)': 4.5, 'EV/EBIT (TTM)': 18,
    'EV/EBITDA (TTM)': 15, 'P/E (TTM)': 28, 'P/S (TTM)': 6,
    'ROIC (TTM %)': 24, 'Operating Margin (TTM %)': 31, 'FCF Margin (TTM %)': 27,
    'Gross Margin (TTM %)': 78, 'ROE (TTM %)': 29, 'CFO / Net Income': 1.3,
    'Net Debt / EBITDA': -0.4, 'Interest Coverage (EBIT / Interest)': 40,
    'Net Debt / FCF': -0.5, 'Current Ratio': 2.1, 'Cash / Total Assets (%)': 22,
    'Revenue CAGR (3Y %)': 14, 'Revenue per Share CAGR (3Y %)': 15,
    'FCF per Share CAGR (3Y %)': 18, 'Share Count CAGR (3Y %)': -1.5,
    'Max Drawdown (5Y %)': -38, 'Realized Volatility (1Y %)': 27,
    'Worst Weekly Return (5Y %)': -11, 'Beta (5Y)': 1.05,
    'Avg Daily $ Volume': 900_000_000, 'Short Interest (% of Float)': 1.2,
    'Market Cap': 250_000_000_000,
  },
  reversalTotalScore: 55,
  downsideProtectionLabel: 'YELLOW',
};

const leveraged: ScreeningInput = {
  ticker: 'LEVR', sectorBucket: 'Industrials',
  values: {
    'EV/FCF (TTM)': 11, 'FCF Yield (TTM %)': 9, 'EV/EBITDA (TTM)': 7,
    'P/E (TTM)': 9, 'P/S (TTM)': 0.6,
    'ROIC (TTM %)': 7, 'Operating Margin (TTM %)': 8, 'Gross Margin (TTM %)': 24,
    'Net Debt / EBITDA': 4.8, 'Interest Coverage (EBIT / Interest)': 2.1,
    'Current Ratio': 0.9,
    'Revenue CAGR (3Y %)': 2, 'Share Count CAGR (3Y %)': 0.5,
    'Max Drawdown (5Y %)': -61, 'Beta (5Y)': 1.7,
    'Avg Daily $ Volume': 8_000_000, 'Market Cap': 1_400_000_000,
  },
  reversalTotalScore: 62,
  downsideProtectionLabel: 'RED',
};

// A bank with no P/B, P/E or ROE available
const thinBank: ScreeningInput = {
  ticker: 'BANK', sectorBucket: 'Financials (Banks)',
  values: {
    'P/S (TTM)': 2.5, 'Net Debt / EBITDA': null,
    'Beta (5Y)': 0.9, 'Market Cap': 40_000_000_000,
    // reported as a fraction upstream; suppressed as aberrant
    'Operating Margin (TTM %)': 3_500,
  },
  downsideProtectionLabel: 'GREEN',
};

const noData: ScreeningInput = { ticker: 'NODT', values: { 'P/E (TTM)': null } };

// ── Run ─────────────────────────────────────────────────────────────
async function main(): Promise<void> {
  const mode = process.argv[2];
  const { pipeline, config } = await createScreeningContext(
    mode ? { defaultMode: mode } : {},
  );

  console.log('═══════════════════════════════════════════════════════════');
  console.log(`  Fundamental Checklist Screen Demo (mode: ${pipeline.mode})`);
  console.log('  Ratings → Category Scores → Blend → Eligibility Gate');
  console.log('═══════════════════════════════════════════════════════════\n');

  const batch = pipeline.screenBatch([compounder, leveraged, thinBank, noData]);
  const outcomes = [
    ...batch.candidates,
    ...batch.filtered.map((f) => f.outcome),
  ];

  for (const { ticker, scorecard, eligibility, summary } of outcomes) {
    console.log(`┌─ ${ticker} (${scorecard.sectorBucket})`);
    for (const category of CATEGORIES) {
      const { score } = scorecard.categories[category];
      const adj = score.adjustedScorePct === null ? 'n/a' : score.adjustedScorePct.toFixed(1);
      console.log(`│    ${category.padEnd(14)} adj ${adj.padStart(5)}  coverage ${score.coveragePct.toFixed(0).padStart(3)}%`);
    }
    const fund = scorecard.fundamentalAdjustedPct;
    console.log(`│  Fundamental (adj): ${fund === null ? 'n/a' : fund.toFixed(1)}  →  ${eligibility.status} / ${eligibility.label}`);
    const reasons = reasonsText(eligibility, config.reasonsMaxItems);
    if (reasons) console.log(`│  Reasons: ${reasons}`);
    console.log(`│  ${summary.headline}: ${summary.justification}`);
    console.log(`└${'─'.repeat(58)}\n`);
  }

  for (const d of batch.dropped) console.log(`Dropped ${d.ticker}: ${d.reason}`);
  console.log(
    `\nPASS ${batch.stats.pass} · WATCH ${batch.stats.watch} · FAIL ${batch.stats.fail} · dropped ${batch.stats.dropped} · errors ${batch.stats.error}`,
  );
}

main().catch((err: unknown) => {
  console.error('Demo failed:', getErrorMessage(err));
  process.exitCode = 1;
});
