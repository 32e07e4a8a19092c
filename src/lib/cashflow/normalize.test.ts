import { describe, expect, it } from 'vitest';
import {
  DuplicateInvoiceIdError,
  InvalidAmountError,
  InvalidInvoiceDateRangeError,
  InvalidKindError,
  MalformedDateError,
  NegativeAmountError,
} from './errors';
import { DEFAULT_CATEGORY, UNKNOWN_CLIENT, normalizeInvoices, normalizeTransactions } from './normalize';
import type { RawRow } from './types';

const rows: RawRow[] = [
  { date: '2024-01-05', type: 'Expense', amount: '100', category: 'Rent', client_or_vendor: 'Landlord' },
  { date: '2024-01-01', type: 'INCOME', amount: '500' },
  { date: '2024-01-05', type: 'income', amount: '50', notes: 'refund' },
];

describe('normalizeTransactions', () => {
  it('sorts by date and keeps input order on ties', () => {
    const ledger = normalizeTransactions(rows);

    expect(ledger.transactions.map((t) => t.rowIndex)).toEqual([1, 0, 2]);
    expect(ledger.transactions.map((t) => t.netAmount)).toEqual([500, -100, 50]);
    expect(ledger.transactions[0].category).toBe(DEFAULT_CATEGORY);
    expect(ledger.transactions[0].counterparty).toBe('');
    expect(ledger.transactions[1]).toEqual({
      rowIndex: 0,
      date: '2024-01-05',
      kind: 'expense',
      amount: 100,
      netAmount: -100,
      category: 'Rent',
      counterparty: 'Landlord',
      notes: '',
    });
  });

  it('builds a gap-free cumulative balance from the starting balance', () => {
    const ledger = normalizeTransactions(rows, { startingBalance: 1000 });

    expect(ledger.days).toHaveLength(5);
    expect(ledger.days[0]).toEqual({ date: '2024-01-01', netFlow: 500, cumulativeBalance: 1500 });
    expect(ledger.days[2]).toEqual({ date: '2024-01-03', netFlow: 0, cumulativeBalance: 1500 });
    expect(ledger.days[4]).toEqual({ date: '2024-01-05', netFlow: -50, cumulativeBalance: 1450 });
  });

  it('does not touch its input', () => {
    const frozen = Object.freeze(rows.map((r) => Object.freeze({ ...r })));
    expect(() => normalizeTransactions(frozen)).not.toThrow();
    expect(frozen[0].type).toBe('Expense');
  });

  it('returns an empty ledger for no rows', () => {
    const ledger = normalizeTransactions([]);
    expect(ledger.transactions).toEqual([]);
    expect(ledger.days).toEqual([]);
  });

  it('rejects a bad date with the row index', () => {
    const bad = [rows[0], { date: '31/31/2024', type: 'income', amount: '1' }];
    try {
      normalizeTransactions(bad);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedDateError);
      if (e instanceof MalformedDateError) {
        expect(e.rowIndex).toBe(1);
        expect(e.field).toBe('date');
        expect(e.message).toBe('Row 2: cannot parse date "31/31/2024"');
      }
    }
  });

  it('rejects dates before year 1000 instead of mis-sorting them', () => {
    const early = [
      { date: '2024-01-01', type: 'income', amount: '1' },
      { date: '0999-12-31', type: 'income', amount: '1' },
    ];
    expect(() => normalizeTransactions(early)).toThrow('Row 2: cannot parse date "0999-12-31"');
    expect(() => normalizeTransactions([{ date: '0024-01-01', type: 'income', amount: '1' }])).toThrow(
      MalformedDateError,
    );
  });

  it('rejects unknown types, bad amounts and negative magnitudes', () => {
    expect(() => normalizeTransactions([{ date: '2024-01-01', type: 'transfer', amount: '1' }])).toThrow(
      InvalidKindError,
    );
    expect(() => normalizeTransactions([{ date: '2024-01-01', type: 'income', amount: 'ten' }])).toThrow(
      InvalidAmountError,
    );
    expect(() => normalizeTransactions([{ date: '2024-01-01', type: 'expense', amount: '-20' }])).toThrow(
      NegativeAmountError,
    );
  });
});

describe('normalizeInvoices', () => {
  const invoice = (overrides: Partial<Record<string, string>>): RawRow => ({
    invoice_id: 'INV-1',
    client: 'Northwind',
    issue_date: '2024-01-01',
    due_date: '2024-01-31',
    paid_date: '',
    amount: '800',
    ...overrides,
  });

  it('reads paid and outstanding invoices', () => {
    const invoices = normalizeInvoices([
      invoice({ paid_date: '2024-02-15' }),
      invoice({ invoice_id: '', client: '' }),
    ]);

    expect(invoices[0].paidDate).toBe('2024-02-15');
    expect(invoices[1]).toEqual({
      rowIndex: 1,
      invoiceId: '#2',
      client: UNKNOWN_CLIENT,
      issueDate: '2024-01-01',
      dueDate: '2024-01-31',
      paidDate: null,
      amount: 800,
    });
  });

  it('rejects a due date before the issue date', () => {
    expect(() => normalizeInvoices([invoice({ due_date: '2023-12-31' })])).toThrow(InvalidInvoiceDateRangeError);
  });

  it('rejects a repeated invoice id', () => {
    try {
      normalizeInvoices([invoice({}), invoice({ invoice_id: 'INV-2' }), invoice({})]);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DuplicateInvoiceIdError);
      if (e instanceof DuplicateInvoiceIdError) {
        expect(e.rowIndex).toBe(2);
        expect(e.firstRowIndex).toBe(0);
        expect(e.invoiceId).toBe('INV-1');
      }
    }
  });

  it('rejects a malformed paid date', () => {
    expect(() => normalizeInvoices([invoice({ paid_date: 'soon' })])).toThrow(MalformedDateError);
  });
});
