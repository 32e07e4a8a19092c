import {
  addDaysDateOnly,
  addMonthsOnDayDateOnly,
  dayOfMonthDateOnly,
  daysBetween,
  daysInMonthDateOnly,
} from '@/lib/date-only';
import type { Cadence, RecurrenceStep, RecurringSeries, Transaction, TransactionKind } from './types';

type CadenceBucket = {
  cadence: Cadence;
  days: number;
  // Calendar months per step, for series that keep their day of month
  months: number | null;
};

export const CADENCE_BUCKETS: readonly CadenceBucket[] = [
  { cadence: 'weekly', days: 7, months: null },
  { cadence: 'biweekly', days: 14, months: null },
  { cadence: 'monthly', days: 30, months: 1 },
  { cadence: 'quarterly', days: 90, months: 3 },
  { cadence: 'annual', days: 365, months: 12 },
];

export type RecurrenceOptions = {
  spreadThreshold?: number;
  toleranceDays?: number;
  detectIncome?: boolean;
};

export const DEFAULT_SPREAD_THRESHOLD = 0.2;
export const DEFAULT_TOLERANCE_DAYS = 3;

// Two-point series carry half the confidence of an equally regular longer one.
const TWO_OCCURRENCE_PENALTY = 0.5;

export function seriesKey(category: string, counterparty: string) {
  return counterparty ? `${category} / ${counterparty}` : category;
}

/** Identity of a group; unlike the display key it cannot collide. */
export function seriesId(kind: TransactionKind, category: string, counterparty: string) {
  return JSON.stringify([kind, category, counterparty]);
}

/** Tolerance in days around a bucket; widens proportionally beyond a month. */
export function bucketTolerance(bucketDays: number, toleranceDays: number) {
  return toleranceDays * Math.max(1, bucketDays / 30);
}

export function matchCadence(meanGap: number, toleranceDays = DEFAULT_TOLERANCE_DAYS) {
  let best: CadenceBucket | null = null;
  for (const b of CADENCE_BUCKETS) {
    const distance = Math.abs(meanGap - b.days);
    if (distance > bucketTolerance(b.days, toleranceDays)) continue;
    if (!best || distance < Math.abs(meanGap - best.days)) best = b;
  }
  return best;
}

/**
 * The common day of month of `dates`, allowing short months to clamp it to
 * their last day (Jan 31, Feb 29, Mar 31 keep day 31). Null when it varies.
 */
export function stableDayOfMonth(dates: readonly string[]) {
  const days = dates.map(dayOfMonthDateOnly);
  const anchor = Math.max(...days);
  const stable = dates.every((d, i) => days[i] === anchor || days[i] === daysInMonthDateOnly(d));
  return stable ? anchor : null;
}

function recurrenceStep(bucket: CadenceBucket, dates: readonly string[], meanGap: number): RecurrenceStep {
  const dayOfMonth = bucket.months === null ? null : stableDayOfMonth(dates);
  if (bucket.months !== null && dayOfMonth !== null) {
    return { unit: 'months', size: bucket.months, dayOfMonth };
  }
  return { unit: 'days', size: Math.max(1, Math.round(meanGap)) };
}

/** The k-th projected occurrence after `from`. */
export function projectOccurrence(from: string, step: RecurrenceStep, k: number) {
  // Always step from the anchor so month-end clamping does not drift
  return step.unit === 'days'
    ? addDaysDateOnly(from, step.size * k)
    : addMonthsOnDayDateOnly(from, step.size * k, step.dayOfMonth);
}

export function median(values: readonly number[]) {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function mean(values: readonly number[]) {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/** Population standard deviation divided by the mean. */
export function relativeSpread(gaps: readonly number[]) {
  const m = mean(gaps);
  if (m <= 0) return Infinity;
  const variance = gaps.reduce((s, g) => s + (g - m) ** 2, 0) / gaps.length;
  return Math.sqrt(variance) / m;
}

/**
 * Monotonic in both inputs: more occurrences raise it, more spread lowers it.
 * Spread at the threshold halves the regularity score.
 */
export function confidenceScore(occurrences: number, spread: number, spreadThreshold: number) {
  const countScore = occurrences / (occurrences + 1);
  const regularity =
    spreadThreshold > 0 ? Math.min(1, Math.max(0, 1 - spread / (2 * spreadThreshold))) : 1;
  const penalty = occurrences === 2 ? TWO_OCCURRENCE_PENALTY : 1;
  return countScore * regularity * penalty;
}

type Group = {
  kind: TransactionKind;
  category: string;
  counterparty: string;
  items: Transaction[];
};

function groupTransactions(transactions: readonly Transaction[], kinds: readonly TransactionKind[]) {
  const groups = new Map<string, Group>();
  for (const t of transactions) {
    if (!kinds.includes(t.kind)) continue;
    const id = seriesId(t.kind, t.category, t.counterparty);
    const g: Group = groups.get(id) ?? {
      kind: t.kind,
      category: t.category,
      counterparty: t.counterparty,
      items: [],
    };
    g.items.push(t);
    groups.set(id, g);
  }
  return [...groups.values()];
}

function evaluateGroup(g: Group, spreadThreshold: number, toleranceDays: number): RecurringSeries | null {
  if (g.items.length < 2) return null;

  const dates = g.items.map((t) => t.date).sort();
  const gaps: number[] = [];
  for (let i = 1; i < dates.length; i++) gaps.push(daysBetween(dates[i - 1], dates[i]));

  const meanGap = mean(gaps);
  const bucket = matchCadence(meanGap, toleranceDays);
  if (!bucket) return null;

  const spread = relativeSpread(gaps);
  if (dates.length >= 3 && spread > spreadThreshold) return null;

  const lastDate = dates[dates.length - 1];
  const step = recurrenceStep(bucket, dates, meanGap);
  return Object.freeze({
    id: seriesId(g.kind, g.category, g.counterparty),
    key: seriesKey(g.category, g.counterparty),
    category: g.category,
    counterparty: g.counterparty,
    kind: g.kind,
    cadence: bucket.cadence,
    periodDays: Math.round(meanGap * 10) / 10,
    expectedAmount: median(g.items.map((t) => t.amount)),
    confidence: confidenceScore(dates.length, dates.length >= 3 ? spread : 0, spreadThreshold),
    observedDates: Object.freeze(dates),
    step: Object.freeze(step),
    lastDate,
    nextExpectedDate: projectOccurrence(lastDate, step, 1),
  });
}

/**
 * Finds expense (and optionally income) groups that repeat on a weekly,
 * biweekly, monthly, quarterly or annual rhythm.
 *
 * Sorted by confidence, then expected amount (both descending), then key.
 */
export function detectRecurringSeries(
  transactions: readonly Transaction[],
  options: RecurrenceOptions = {},
): readonly RecurringSeries[] {
  const spreadThreshold = options.spreadThreshold ?? DEFAULT_SPREAD_THRESHOLD;
  const toleranceDays = options.toleranceDays ?? DEFAULT_TOLERANCE_DAYS;
  const kinds: TransactionKind[] = options.detectIncome ? ['expense', 'income'] : ['expense'];

  const series: RecurringSeries[] = [];
  for (const g of groupTransactions(transactions, kinds)) {
    const s = evaluateGroup(g, spreadThreshold, toleranceDays);
    if (s) series.push(s);
  }

  series.sort(
    (a, b) =>
      b.confidence - a.confidence ||
      b.expectedAmount - a.expectedAmount ||
      (a.key < b.key ? -1 : a.key > b.key ? 1 : 0) ||
      (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
  );
  return Object.freeze(series);
}
