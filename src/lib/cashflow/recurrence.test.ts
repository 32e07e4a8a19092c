import { describe, expect, it } from 'vitest';
import { normalizeTransactions } from './normalize';
import {
  confidenceScore,
  detectRecurringSeries,
  matchCadence,
  median,
  projectOccurrence,
  relativeSpread,
  stableDayOfMonth,
} from './recurrence';
import type { RawRow } from './types';

function expenses(dates: string[], amount: number | number[], category: string, vendor = ''): RawRow[] {
  return dates.map((date, i) => ({
    date,
    type: 'expense',
    amount: String(Array.isArray(amount) ? amount[i] : amount),
    category,
    client_or_vendor: vendor,
  }));
}

function detect(rows: RawRow[], options?: Parameters<typeof detectRecurringSeries>[1]) {
  return detectRecurringSeries(normalizeTransactions(rows).transactions, options);
}

describe('detectRecurringSeries', () => {
  it('finds an exact 30-day series with high confidence', () => {
    const dates = ['2024-01-01', '2024-01-31', '2024-03-01', '2024-03-31', '2024-04-30', '2024-05-30'];
    const series = detect(expenses(dates, 250, 'Software', 'Acme'));

    expect(series).toHaveLength(1);
    expect(series[0].key).toBe('Software / Acme');
    expect(series[0].cadence).toBe('monthly');
    expect(series[0].periodDays).toBe(30);
    expect(series[0].expectedAmount).toBe(250);
    expect(series[0].confidence).toBeGreaterThan(0.8);
    expect(series[0].confidence).toBeCloseTo(6 / 7, 10);
    expect(series[0].observedDates).toEqual(dates);
  });

  it('detects monthly rent across months of different length', () => {
    const rows: RawRow[] = [
      { date: '2024-01-01', type: 'income', amount: '5000' },
      ...expenses(['2024-01-05', '2024-02-05', '2024-03-05'], 1200, 'Rent'),
    ];
    const series = detect(rows);

    expect(series).toHaveLength(1);
    expect(series[0]).toMatchObject({
      key: 'Rent',
      kind: 'expense',
      cadence: 'monthly',
      periodDays: 30,
      expectedAmount: 1200,
      step: { unit: 'months', size: 1, dayOfMonth: 5 },
      lastDate: '2024-03-05',
      nextExpectedDate: '2024-04-05',
    });
  });

  it('steps a 28-day billing cycle by its own period', () => {
    const series = detect(expenses(['2024-01-01', '2024-01-29', '2024-02-26', '2024-03-25'], 60, 'Hosting'));

    expect(series).toHaveLength(1);
    expect(series[0]).toMatchObject({
      cadence: 'monthly',
      periodDays: 28,
      step: { unit: 'days', size: 28 },
      nextExpectedDate: '2024-04-22',
    });
  });

  it('keeps series apart whose display keys coincide', () => {
    const rows = [
      ...expenses(['2024-01-03', '2024-02-03', '2024-03-03'], 30, 'A / B'),
      ...expenses(['2024-01-03', '2024-02-03', '2024-03-03'], 30, 'A', 'B'),
    ];
    const series = detect(rows);

    expect(series.map((s) => s.key)).toEqual(['A / B', 'A / B']);
    expect(new Set(series.map((s) => s.id)).size).toBe(2);
    expect(series.map((s) => s.id)).toEqual(['["expense","A / B",""]', '["expense","A","B"]']);
  });

  it('uses the median so one outlier does not move the amount', () => {
    const series = detect(expenses(['2024-01-10', '2024-02-10', '2024-03-10'], [100, 900, 100], 'Payroll'));
    expect(series[0].expectedAmount).toBe(100);
  });

  it('ignores irregular gaps and gaps outside every cadence', () => {
    // gaps 9, 41, 10: mean 20 sits between biweekly and monthly
    expect(detect(expenses(['2024-01-01', '2024-01-10', '2024-02-20', '2024-03-01'], 50, 'Supplies'))).toEqual([]);
  });

  it('applies the spread threshold', () => {
    // gaps 25, 35, 30: relative spread ~0.136
    const rows = expenses(['2024-01-01', '2024-01-26', '2024-03-01', '2024-03-31'], 80, 'Utilities');

    expect(detect(rows)).toHaveLength(1);
    expect(detect(rows, { spreadThreshold: 0.1 })).toEqual([]);
  });

  it('reports two occurrences only on a cadence, at reduced confidence', () => {
    const weekly = detect(expenses(['2024-01-01', '2024-01-08'], 40, 'Cleaning'));
    expect(weekly).toHaveLength(1);
    expect(weekly[0].cadence).toBe('weekly');
    expect(weekly[0].confidence).toBeCloseTo((2 / 3) * 0.5, 10);

    expect(detect(expenses(['2024-01-01', '2024-01-21'], 40, 'Cleaning'))).toEqual([]);
    expect(detect(expenses(['2024-01-01'], 40, 'Cleaning'))).toEqual([]);
  });

  it('groups by vendor within a category', () => {
    const rows = [
      ...expenses(['2024-01-03', '2024-02-03', '2024-03-03'], 30, 'Software', 'Mailer'),
      ...expenses(['2024-01-20', '2024-02-02', '2024-03-28'], 45, 'Software', 'Storage'),
    ];
    expect(detect(rows).map((s) => s.key)).toEqual(['Software / Mailer']);
  });

  it('scans income only when asked', () => {
    const rows: RawRow[] = ['2024-01-15', '2024-02-15', '2024-03-15'].map((date) => ({
      date,
      type: 'income',
      amount: '3000',
      category: 'Retainer',
      client_or_vendor: 'Globex',
    }));

    expect(detect(rows)).toEqual([]);
    const series = detect(rows, { detectIncome: true });
    expect(series).toHaveLength(1);
    expect(series[0].kind).toBe('income');
  });

  it('orders by confidence, then by amount', () => {
    const rows = [
      ...expenses(['2024-01-01', '2024-02-01', '2024-03-01'], 100, 'A'),
      ...expenses(['2024-01-02', '2024-02-02', '2024-03-02'], 500, 'B'),
      ...expenses(['2024-01-01', '2024-01-08', '2024-01-15', '2024-01-22'], 20, 'C'),
    ];
    // C has four exact weekly gaps and ranks first; A and B tie on confidence
    expect(detect(rows).map((s) => s.key)).toEqual(['C', 'B', 'A']);
  });
});

describe('recurrence helpers', () => {
  it('matches cadences with a tolerance that widens for long periods', () => {
    expect(matchCadence(8)?.cadence).toBe('weekly');
    expect(matchCadence(33)?.cadence).toBe('monthly');
    expect(matchCadence(88)?.cadence).toBe('quarterly');
    expect(matchCadence(360)?.cadence).toBe('annual');
    expect(matchCadence(45)).toBeNull();
  });

  it('scores confidence monotonically', () => {
    expect(confidenceScore(4, 0.1, 0.2)).toBeGreaterThan(confidenceScore(3, 0.1, 0.2));
    expect(confidenceScore(3, 0.05, 0.2)).toBeGreaterThan(confidenceScore(3, 0.15, 0.2));
    expect(confidenceScore(3, 0, 0)).toBeCloseTo(0.75, 10);
  });

  it('projects monthly steps from the anchor date', () => {
    const monthEnd = { unit: 'months', size: 1, dayOfMonth: 31 } as const;
    expect(projectOccurrence('2024-01-31', monthEnd, 1)).toBe('2024-02-29');
    expect(projectOccurrence('2024-01-31', monthEnd, 2)).toBe('2024-03-31');
    expect(projectOccurrence('2024-02-29', monthEnd, 1)).toBe('2024-03-31');
    expect(projectOccurrence('2024-01-01', { unit: 'days', size: 14 }, 2)).toBe('2024-01-29');
  });

  it('keeps a day of month only when every date lands on it', () => {
    expect(stableDayOfMonth(['2024-01-05', '2024-02-05', '2024-03-05'])).toBe(5);
    expect(stableDayOfMonth(['2024-01-31', '2024-02-29', '2024-03-31'])).toBe(31);
    expect(stableDayOfMonth(['2024-01-01', '2024-01-29', '2024-02-26'])).toBeNull();
  });

  it('computes median and relative spread', () => {
    expect(median([3, 1, 2, 10])).toBe(2.5);
    expect(relativeSpread([30, 30, 30])).toBe(0);
    expect(relativeSpread([20, 40])).toBeCloseTo(1 / 3, 10);
  });
});
