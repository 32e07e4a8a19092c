import type {
  BalancePhase,
  DailyBalancePoint,
  DailyFlow,
  DailyLedgerDay,
  ForecastDay,
  RiskDay,
  RiskSummary,
} from './types';

export const DEFAULT_TOP_K_DROPS = 10;

function balanceOf(p: DailyBalancePoint): { balance: number; phase: BalancePhase } | null {
  if (p.actualBalance !== null) return { balance: p.actualBalance, phase: 'actual' };
  if (p.forecastBalance !== null) return { balance: p.forecastBalance, phase: 'forecast' };
  return null;
}

/** Days whose balance is strictly below the threshold, in date order. */
export function detectRiskDays(points: readonly DailyBalancePoint[], threshold: number): readonly RiskDay[] {
  const out: RiskDay[] = [];
  for (const p of points) {
    const b = balanceOf(p);
    if (b && b.balance < threshold) out.push(Object.freeze({ date: p.date, ...b }));
  }
  return Object.freeze(out);
}

export function summarizeRisk(points: readonly DailyBalancePoint[], threshold: number): RiskSummary {
  const riskDays = detectRiskDays(points, threshold);

  let lowest: RiskDay | null = null;
  for (const p of points) {
    const b = balanceOf(p);
    // strict < keeps the earliest date on ties
    if (b && (!lowest || b.balance < lowest.balance)) lowest = Object.freeze({ date: p.date, ...b });
  }

  return Object.freeze({
    lowest,
    firstRiskDay: riskDays[0] ?? null,
    riskDayCount: riskDays.length,
    staysAboveThreshold: riskDays.length === 0,
  });
}

/** Historical flows from per-day ledger sums, then the forecast days' projected flows. */
export function dailyFlowsFromLedger(
  days: readonly DailyLedgerDay[],
  forecastDays: readonly ForecastDay[],
): readonly DailyFlow[] {
  return Object.freeze([
    ...days.map((d) =>
      Object.freeze({ date: d.date, netFlow: d.netFlow, balance: d.cumulativeBalance, phase: 'actual' as const }),
    ),
    ...forecastDays.map((d) =>
      Object.freeze({ date: d.date, netFlow: d.netFlow, balance: d.balance, phase: 'forecast' as const }),
    ),
  ]);
}

/** Flows as differences between consecutive balance points. */
export function flowsFromBalancePoints(
  points: readonly DailyBalancePoint[],
  openingBalance: number,
): readonly DailyFlow[] {
  const out: DailyFlow[] = [];
  let previous = openingBalance;
  for (const p of points) {
    const b = balanceOf(p);
    if (!b) continue;
    out.push(Object.freeze({ date: p.date, netFlow: b.balance - previous, balance: b.balance, phase: b.phase }));
    previous = b.balance;
  }
  return Object.freeze(out);
}

/** Days with the most negative net flow; ties go to the earlier date. */
export function rankBiggestDrops(flows: readonly DailyFlow[], topK = DEFAULT_TOP_K_DROPS): readonly DailyFlow[] {
  const drops = flows
    .filter((f) => f.netFlow < 0)
    .sort((a, b) => a.netFlow - b.netFlow || (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  return Object.freeze(drops.slice(0, Math.max(0, topK)));
}
