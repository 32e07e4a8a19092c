import { logger } from '@/lib/logger';
import { resolveConfig, type AnalysisConfig, type AnalysisConfigInput } from './config';
import { INVOICE_COLUMNS, TRANSACTION_COLUMNS, readCsv } from './csv';
import { isCashflowError, toErrorInfo, type CashflowErrorInfo } from './errors';
import { forecastBalances } from './forecast';
import { analyzeLateness } from './lateness';
import { normalizeInvoices, normalizeTransactions } from './normalize';
import { detectRecurringSeries } from './recurrence';
import { dailyFlowsFromLedger, detectRiskDays, rankBiggestDrops, summarizeRisk } from './risk';
import type {
  DailyFlow,
  ForecastResult,
  LatenessReport,
  NormalizedLedger,
  RawRow,
  RecurringSeries,
  RiskDay,
  RiskSummary,
} from './types';

export type InvoiceBranch =
  | ({ status: 'ok' } & LatenessReport)
  | { status: 'failed'; error: CashflowErrorInfo }
  | { status: 'skipped' };

export type AnalysisReport = {
  config: AnalysisConfig;
  ledger: NormalizedLedger;
  recurring: readonly RecurringSeries[];
  forecast: ForecastResult;
  risk: { threshold: number; riskDays: readonly RiskDay[]; summary: RiskSummary } | null;
  biggestDrops: readonly DailyFlow[];
  invoices: InvoiceBranch;
};

/** Invoice analysis runs on its own; a bad invoices file never aborts the forecast. */
export function analyzeInvoiceRows(
  loadRows: () => readonly RawRow[],
  params: { analysisDate: string; gracePeriodDays: number },
): InvoiceBranch {
  try {
    const invoices = normalizeInvoices(loadRows());
    return { status: 'ok', ...analyzeLateness(invoices, params) };
  } catch (e) {
    if (!isCashflowError(e)) throw e;
    logger.warn('Invoice analysis skipped', { action: 'analyzeInvoices', code: e.code, message: e.message });
    return { status: 'failed', error: toErrorInfo(e) };
  }
}

/**
 * Runs the full pipeline over already-read rows.
 * Transaction errors propagate; invoice errors are reported in the result.
 */
export function analyzeLedger(params: {
  transactionRows: readonly RawRow[];
  invoiceRows?: (() => readonly RawRow[]) | readonly RawRow[] | null;
  config: AnalysisConfigInput;
}): AnalysisReport {
  const config = resolveConfig(params.config);

  const ledger = normalizeTransactions(params.transactionRows, { startingBalance: config.startingBalance });

  const recurring = detectRecurringSeries(ledger.transactions, {
    spreadThreshold: config.recurrenceSpreadThreshold,
    toleranceDays: config.periodToleranceDays,
    detectIncome: config.detectRecurringIncome,
  });

  const forecast = forecastBalances({
    ledger,
    recurring,
    horizonDays: config.forecastHorizonDays,
    baselineWindowDays: config.baselineWindowDays ?? null,
    minTransactions: config.minTransactions,
    excludeRecurringFromBaseline: config.excludeRecurringFromBaseline,
  });

  const threshold = config.riskThreshold ?? null;
  const risk =
    threshold === null
      ? null
      : {
          threshold,
          riskDays: detectRiskDays(forecast.points, threshold),
          summary: summarizeRisk(forecast.points, threshold),
        };

  const biggestDrops = rankBiggestDrops(dailyFlowsFromLedger(ledger.days, forecast.forecastDays), config.topKDrops);

  const { invoiceRows } = params;
  const invoices: InvoiceBranch = invoiceRows
    ? analyzeInvoiceRows(typeof invoiceRows === 'function' ? invoiceRows : () => invoiceRows, {
        analysisDate: config.analysisDate,
        gracePeriodDays: config.gracePeriodDays,
      })
    : { status: 'skipped' };

  logger.debug('Analysis complete', {
    action: 'analyzeLedger',
    transactions: ledger.transactions.length,
    recurring: recurring.length,
    riskDays: risk?.riskDays.length ?? null,
    invoices: invoices.status,
  });

  return { config, ledger, recurring, forecast, risk, biggestDrops, invoices };
}

/** Same as analyzeLedger, starting from uploaded CSV text. */
export function runAnalysis(params: {
  transactionsCsv: string;
  invoicesCsv?: string | null;
  config: AnalysisConfigInput;
}): AnalysisReport {
  const { invoicesCsv } = params;
  return analyzeLedger({
    transactionRows: readCsv(params.transactionsCsv, TRANSACTION_COLUMNS),
    // CSV errors in the invoices file stay inside the invoice branch
    invoiceRows: invoicesCsv?.trim() ? () => readCsv(invoicesCsv, INVOICE_COLUMNS) : null,
    config: params.config,
  });
}
