import Papa from 'papaparse';
import { CsvFormatError, MissingColumnsError } from './errors';
import type { RawRow } from './types';

export const TRANSACTION_COLUMNS = ['date', 'type', 'amount'] as const;

export const INVOICE_COLUMNS = [
  'invoice_id',
  'client',
  'issue_date',
  'due_date',
  'paid_date',
  'amount',
] as const;

// Field-count mismatches are tolerated: a short row simply has blank cells.
const TOLERATED_ERROR_CODES = new Set(['TooFewFields', 'TooManyFields', 'UndetectableDelimiter']);

/**
 * Parses CSV text with a header row into raw string rows.
 * Headers are matched case-insensitively; blank lines are skipped.
 */
export function readCsv(text: string, requiredColumns: readonly string[]): RawRow[] {
  const parsed = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (h) => h.trim().toLowerCase(),
  });

  const fatal = parsed.errors.find((e) => !TOLERATED_ERROR_CODES.has(e.code));
  if (fatal) throw new CsvFormatError(fatal.message, fatal.row ?? null);

  const fields = parsed.meta.fields ?? [];
  const missing = requiredColumns.filter((c) => !fields.includes(c));
  if (missing.length) throw new MissingColumnsError(missing);

  return parsed.data;
}
