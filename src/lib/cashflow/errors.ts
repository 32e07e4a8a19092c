export type CashflowErrorCode =
  | 'MALFORMED_DATE'
  | 'INVALID_KIND'
  | 'INVALID_AMOUNT'
  | 'NEGATIVE_AMOUNT'
  | 'EMPTY_LEDGER'
  | 'INVALID_INVOICE_DATE_RANGE'
  | 'DUPLICATE_INVOICE_ID'
  | 'MISSING_COLUMNS'
  | 'CSV_FORMAT';

export class CashflowError extends Error {
  readonly code: CashflowErrorCode;

  constructor(code: CashflowErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A rejected input row. `rowIndex` is the 0-based data row (header excluded). */
export class LedgerValidationError extends CashflowError {
  readonly rowIndex: number;
  readonly field: string;

  constructor(code: CashflowErrorCode, rowIndex: number, field: string, message: string) {
    super(code, `Row ${rowIndex + 1}: ${message}`);
    this.rowIndex = rowIndex;
    this.field = field;
  }
}

export class MalformedDateError extends LedgerValidationError {
  readonly value: string;

  constructor(rowIndex: number, field: string, value: string) {
    super('MALFORMED_DATE', rowIndex, field, `cannot parse ${field} "${value}"`);
    this.value = value;
  }
}

export class InvalidKindError extends LedgerValidationError {
  readonly value: string;

  constructor(rowIndex: number, value: string) {
    super('INVALID_KIND', rowIndex, 'type', `type must be income or expense, got "${value}"`);
    this.value = value;
  }
}

export class InvalidAmountError extends LedgerValidationError {
  readonly value: string;

  constructor(rowIndex: number, value: string) {
    super('INVALID_AMOUNT', rowIndex, 'amount', `amount "${value}" is not a number`);
    this.value = value;
  }
}

export class NegativeAmountError extends LedgerValidationError {
  readonly value: number;

  constructor(rowIndex: number, value: number) {
    super(
      'NEGATIVE_AMOUNT',
      rowIndex,
      'amount',
      `amount ${value} is negative; use the type column for direction`,
    );
    this.value = value;
  }
}

export class InvalidInvoiceDateRangeError extends LedgerValidationError {
  readonly invoiceId: string;

  constructor(rowIndex: number, invoiceId: string, issueDate: string, dueDate: string) {
    super(
      'INVALID_INVOICE_DATE_RANGE',
      rowIndex,
      'due_date',
      `invoice ${invoiceId} is due ${dueDate}, before its issue date ${issueDate}`,
    );
    this.invoiceId = invoiceId;
  }
}

export class DuplicateInvoiceIdError extends LedgerValidationError {
  readonly invoiceId: string;
  readonly firstRowIndex: number;

  constructor(rowIndex: number, invoiceId: string, firstRowIndex: number) {
    super(
      'DUPLICATE_INVOICE_ID',
      rowIndex,
      'invoice_id',
      `invoice id ${invoiceId} already used in row ${firstRowIndex + 1}`,
    );
    this.invoiceId = invoiceId;
    this.firstRowIndex = firstRowIndex;
  }
}

export class EmptyLedgerError extends CashflowError {
  constructor() {
    super('EMPTY_LEDGER', 'No transactions to forecast from');
  }
}

export class MissingColumnsError extends CashflowError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super('MISSING_COLUMNS', `Missing required columns: ${missing.join(', ')}`);
    this.missing = missing;
  }
}

export class CsvFormatError extends CashflowError {
  readonly rowIndex: number | null;

  constructor(message: string, rowIndex: number | null) {
    super('CSV_FORMAT', rowIndex === null ? message : `Row ${rowIndex + 1}: ${message}`);
    this.rowIndex = rowIndex;
  }
}

export function isCashflowError(e: unknown): e is CashflowError {
  return e instanceof CashflowError;
}

/** Plain JSON shape of a pipeline error, as returned by the API. */
export type CashflowErrorInfo = {
  error: string;
  code: CashflowErrorCode;
  rowIndex: number | null;
};

export function toErrorInfo(e: CashflowError): CashflowErrorInfo {
  let rowIndex: number | null = null;
  if (e instanceof LedgerValidationError || e instanceof CsvFormatError) rowIndex = e.rowIndex;
  return { error: e.message, code: e.code, rowIndex };
}
