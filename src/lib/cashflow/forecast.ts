import { addDaysDateOnly, daysBetween } from '@/lib/date-only';
import { EmptyLedgerError } from './errors';
import { projectOccurrence } from './recurrence';
import type {
  DailyBalancePoint,
  ForecastDay,
  ForecastEvent,
  ForecastResult,
  ForecastWarning,
  NormalizedLedger,
  RecurringSeries,
  Transaction,
} from './types';

export const DEFAULT_HORIZON_DAYS = 90;
export const DEFAULT_MIN_TRANSACTIONS = 1;

export type ForecastParams = {
  ledger: NormalizedLedger;
  recurring: readonly RecurringSeries[];
  horizonDays?: number;
  /** Trailing window for the baseline; null means the full history. */
  baselineWindowDays?: number | null;
  minTransactions?: number;
  /** Leave recurring-series members out of the baseline, since they are projected explicitly. */
  excludeRecurringFromBaseline?: boolean;
};

function memberKey(t: Pick<Transaction, 'kind' | 'category' | 'counterparty' | 'date'>) {
  return `${t.kind}\u0000${t.category}\u0000${t.counterparty}\u0000${t.date}`;
}

/**
 * Mean net flow per calendar day over the window ending on the last
 * historical date.
 */
export function baselineNetFlow(params: {
  transactions: readonly Transaction[];
  firstDate: string;
  lastDate: string;
  windowDays?: number | null;
  exclude?: ReadonlySet<string>;
}) {
  const { transactions, firstDate, lastDate, windowDays, exclude } = params;

  const historyDays = daysBetween(firstDate, lastDate) + 1;
  const span = windowDays && windowDays > 0 ? Math.min(windowDays, historyDays) : historyDays;
  const windowStart = addDaysDateOnly(lastDate, -(span - 1));

  let sum = 0;
  for (const t of transactions) {
    if (t.date < windowStart || t.date > lastDate) continue;
    if (exclude?.has(memberKey(t))) continue;
    sum += t.netAmount;
  }
  return sum / span;
}

/** Signed recurring flows per date inside (after, end]. */
export function projectRecurring(
  recurring: readonly RecurringSeries[],
  after: string,
  end: string,
): Map<string, ForecastEvent[]> {
  const byDate = new Map<string, ForecastEvent[]>();
  for (const s of recurring) {
    const amount = s.kind === 'income' ? s.expectedAmount : -s.expectedAmount;
    for (let k = 1; ; k++) {
      const date = projectOccurrence(s.lastDate, s.step, k);
      if (date > end) break;
      if (date <= after) continue;
      const events = byDate.get(date) ?? [];
      events.push(Object.freeze({ seriesId: s.id, key: s.key, amount }));
      byDate.set(date, events);
    }
  }
  return byDate;
}

/**
 * Projects the ledger's closing balance forward one day at a time:
 * balance[d] = balance[d-1] + baseline + recurring flows due on d.
 */
export function forecastBalances(params: ForecastParams): ForecastResult {
  const {
    ledger,
    recurring,
    horizonDays = DEFAULT_HORIZON_DAYS,
    baselineWindowDays = null,
    minTransactions = DEFAULT_MIN_TRANSACTIONS,
    excludeRecurringFromBaseline = true,
  } = params;

  const { transactions, days } = ledger;
  if (!transactions.length || !days.length) throw new EmptyLedgerError();

  const firstDate = days[0].date;
  const lastDay = days[days.length - 1];
  const warnings: ForecastWarning[] = [];

  let baseline = 0;
  if (transactions.length < minTransactions) {
    warnings.push('sparse_history');
  } else {
    const exclude = new Set<string>();
    if (excludeRecurringFromBaseline) {
      for (const s of recurring) {
        for (const date of s.observedDates) {
          exclude.add(memberKey({ kind: s.kind, category: s.category, counterparty: s.counterparty, date }));
        }
      }
    }
    baseline = baselineNetFlow({
      transactions,
      firstDate,
      lastDate: lastDay.date,
      windowDays: baselineWindowDays,
      exclude,
    });
  }

  const end = addDaysDateOnly(lastDay.date, horizonDays);
  const recurringByDate = projectRecurring(recurring, lastDay.date, end);

  const forecastDays: ForecastDay[] = [];
  let balance = lastDay.cumulativeBalance;
  for (let d = 1; d <= horizonDays; d++) {
    const date = addDaysDateOnly(lastDay.date, d);
    const events = recurringByDate.get(date) ?? [];
    const recurringFlow = events.reduce((s, e) => s + e.amount, 0);
    const netFlow = baseline + recurringFlow;
    balance += netFlow;
    forecastDays.push(
      Object.freeze({
        date,
        baselineFlow: baseline,
        recurringFlow,
        netFlow,
        balance,
        events: Object.freeze(events),
      }),
    );
  }

  const points: DailyBalancePoint[] = [
    ...days.map((day) =>
      Object.freeze({ date: day.date, actualBalance: day.cumulativeBalance, forecastBalance: null }),
    ),
    ...forecastDays.map((day) =>
      Object.freeze({ date: day.date, actualBalance: null, forecastBalance: day.balance }),
    ),
  ];

  return Object.freeze({
    startBalance: lastDay.cumulativeBalance,
    baselineNetFlow: baseline,
    points: Object.freeze(points),
    forecastDays: Object.freeze(forecastDays),
    warnings: Object.freeze(warnings),
  });
}
