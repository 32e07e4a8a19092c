import { eachDateOnly, toDateOnly } from '@/lib/date-only';
import { parseMoney } from '@/lib/money';
import {
  DuplicateInvoiceIdError,
  InvalidAmountError,
  InvalidInvoiceDateRangeError,
  InvalidKindError,
  MalformedDateError,
  NegativeAmountError,
} from './errors';
import type {
  DailyLedgerDay,
  Invoice,
  NormalizedLedger,
  RawRow,
  Transaction,
  TransactionKind,
} from './types';

export const DEFAULT_CATEGORY = 'Uncategorized';
export const UNKNOWN_CLIENT = 'Unknown client';

function cell(row: RawRow, column: string) {
  return (row[column] ?? '').trim();
}

function requireDate(row: RawRow, rowIndex: number, column: string) {
  const raw = cell(row, column);
  const date = toDateOnly(raw);
  if (!date) throw new MalformedDateError(rowIndex, column, raw);
  return date;
}

function requireAmount(row: RawRow, rowIndex: number) {
  const raw = cell(row, 'amount');
  const amount = parseMoney(raw);
  if (!Number.isFinite(amount)) throw new InvalidAmountError(rowIndex, raw);
  if (amount < 0) throw new NegativeAmountError(rowIndex, amount);
  return amount;
}

function parseKind(row: RawRow, rowIndex: number): TransactionKind {
  const raw = cell(row, 'type');
  const kind = raw.toLowerCase();
  if (kind !== 'income' && kind !== 'expense') throw new InvalidKindError(rowIndex, raw);
  return kind;
}

export function toTransaction(row: RawRow, rowIndex: number): Transaction {
  const date = requireDate(row, rowIndex, 'date');
  const kind = parseKind(row, rowIndex);
  const amount = requireAmount(row, rowIndex);

  return Object.freeze({
    rowIndex,
    date,
    kind,
    amount,
    // 0 - amount would give -0 for a zero expense
    netAmount: kind === 'income' ? amount : amount === 0 ? 0 : -amount,
    category: cell(row, 'category') || DEFAULT_CATEGORY,
    counterparty: cell(row, 'client_or_vendor'),
    notes: cell(row, 'notes'),
  });
}

/**
 * Validates raw transaction rows and builds the sorted ledger plus a gap-free
 * daily series of net flow and cumulative balance.
 *
 * The first invalid row aborts the whole file; rows are never skipped.
 */
export function normalizeTransactions(
  rows: readonly RawRow[],
  params: { startingBalance?: number } = {},
): NormalizedLedger {
  const startingBalance = params.startingBalance ?? 0;

  const transactions = rows
    .map((row, i) => toTransaction(row, i))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : a.rowIndex - b.rowIndex));

  const netByDate = new Map<string, number>();
  for (const t of transactions) {
    netByDate.set(t.date, (netByDate.get(t.date) ?? 0) + t.netAmount);
  }

  const days: DailyLedgerDay[] = [];
  if (transactions.length) {
    const first = transactions[0].date;
    const last = transactions[transactions.length - 1].date;
    let running = startingBalance;
    for (const date of eachDateOnly(first, last)) {
      const netFlow = netByDate.get(date) ?? 0;
      running += netFlow;
      days.push(Object.freeze({ date, netFlow, cumulativeBalance: running }));
    }
  }

  return Object.freeze({
    startingBalance,
    transactions: Object.freeze(transactions),
    days: Object.freeze(days),
  });
}

export function toInvoice(row: RawRow, rowIndex: number): Invoice {
  const invoiceId = cell(row, 'invoice_id') || `#${rowIndex + 1}`;
  const issueDate = requireDate(row, rowIndex, 'issue_date');
  const dueDate = requireDate(row, rowIndex, 'due_date');
  const paidDate = cell(row, 'paid_date') ? requireDate(row, rowIndex, 'paid_date') : null;
  const amount = requireAmount(row, rowIndex);

  if (dueDate < issueDate) {
    throw new InvalidInvoiceDateRangeError(rowIndex, invoiceId, issueDate, dueDate);
  }

  return Object.freeze({
    rowIndex,
    invoiceId,
    client: cell(row, 'client') || UNKNOWN_CLIENT,
    issueDate,
    dueDate,
    paidDate,
    amount,
  });
}

/** Validates invoice rows; keeps input order. */
export function normalizeInvoices(rows: readonly RawRow[]): readonly Invoice[] {
  const seen = new Map<string, number>();
  const invoices = rows.map((row, i) => {
    const invoice = toInvoice(row, i);
    const firstRow = seen.get(invoice.invoiceId);
    if (firstRow !== undefined) throw new DuplicateInvoiceIdError(i, invoice.invoiceId, firstRow);
    seen.set(invoice.invoiceId, i);
    return invoice;
  });
  return Object.freeze(invoices);
}
