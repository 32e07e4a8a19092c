import { z } from 'zod';
import { toDateOnly } from '@/lib/date-only';
import { DEFAULT_HORIZON_DAYS, DEFAULT_MIN_TRANSACTIONS } from './forecast';
import { DEFAULT_GRACE_PERIOD_DAYS } from './lateness';
import { DEFAULT_SPREAD_THRESHOLD, DEFAULT_TOLERANCE_DAYS } from './recurrence';
import { DEFAULT_TOP_K_DROPS } from './risk';

export const DateOnly = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Invalid date')
  .refine((v) => toDateOnly(v) === v, 'Invalid date');

export const AnalysisConfigSchema = z.object({
  forecastHorizonDays: z.number().int().min(1).max(730).default(DEFAULT_HORIZON_DAYS),

  // No default: risk detection only runs when the user sets a floor
  riskThreshold: z.number().finite().nullish(),

  recurrenceSpreadThreshold: z.number().min(0).max(1).default(DEFAULT_SPREAD_THRESHOLD),
  periodToleranceDays: z.number().min(0).max(30).default(DEFAULT_TOLERANCE_DAYS),
  detectRecurringIncome: z.boolean().default(false),

  gracePeriodDays: z.number().int().min(0).default(DEFAULT_GRACE_PERIOD_DAYS),
  topKDrops: z.number().int().min(1).max(100).default(DEFAULT_TOP_K_DROPS),

  startingBalance: z.number().finite().default(0),
  baselineWindowDays: z.number().int().min(1).nullish(),
  minTransactions: z.number().int().min(0).default(DEFAULT_MIN_TRANSACTIONS),
  // false: the baseline is the plain historical mean, recurring payments included
  excludeRecurringFromBaseline: z.boolean().default(true),

  analysisDate: DateOnly,
});

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type AnalysisConfig = z.output<typeof AnalysisConfigSchema>;

/** Fills defaults; throws a ZodError on invalid values. */
export function resolveConfig(input: AnalysisConfigInput): AnalysisConfig {
  return AnalysisConfigSchema.parse(input);
}
