export type TransactionKind = 'income' | 'expense';

/** A CSV row as read from an upload: header -> raw cell text. */
export type RawRow = Readonly<Record<string, string | undefined>>;

export type Transaction = Readonly<{
  rowIndex: number;
  date: string;             // YYYY-MM-DD
  kind: TransactionKind;
  amount: number;           // magnitude, >= 0
  netAmount: number;        // signed, INCOME +, EXPENSE -
  category: string;
  counterparty: string;
  notes: string;
}>;

export type DailyLedgerDay = Readonly<{
  date: string;
  netFlow: number;
  cumulativeBalance: number;
}>;

export type NormalizedLedger = Readonly<{
  startingBalance: number;
  transactions: readonly Transaction[];
  days: readonly DailyLedgerDay[];   // every calendar day, first..last transaction date
}>;

export type DailyBalancePoint = Readonly<{
  date: string;
  actualBalance: number | null;
  forecastBalance: number | null;
}>;

export type Cadence = 'weekly' | 'biweekly' | 'monthly' | 'quarterly' | 'annual';

/** Calendar months keep the observed day of month; anything else steps by the rounded mean gap. */
export type RecurrenceStep =
  | Readonly<{ unit: 'days'; size: number }>
  | Readonly<{ unit: 'months'; size: number; dayOfMonth: number }>;

export type RecurringSeries = Readonly<{
  id: string;               // unambiguous (kind, category, counterparty) identity
  key: string;              // display label
  category: string;
  counterparty: string;
  kind: TransactionKind;
  cadence: Cadence;
  periodDays: number;       // mean observed gap
  expectedAmount: number;   // median magnitude
  confidence: number;       // 0..1
  observedDates: readonly string[];
  step: RecurrenceStep;
  lastDate: string;
  nextExpectedDate: string;
}>;

export type ForecastEvent = Readonly<{
  seriesId: string;
  key: string;
  amount: number;           // signed
}>;

export type ForecastDay = Readonly<{
  date: string;
  baselineFlow: number;
  recurringFlow: number;
  netFlow: number;
  balance: number;
  events: readonly ForecastEvent[];
}>;

export type ForecastWarning = 'sparse_history';

export type ForecastResult = Readonly<{
  startBalance: number;
  baselineNetFlow: number;
  points: readonly DailyBalancePoint[];
  forecastDays: readonly ForecastDay[];
  warnings: readonly ForecastWarning[];
}>;

export type BalancePhase = 'actual' | 'forecast';

export type RiskDay = Readonly<{
  date: string;
  balance: number;
  phase: BalancePhase;
}>;

export type DailyFlow = Readonly<{
  date: string;
  netFlow: number;
  balance: number;
  phase: BalancePhase;
}>;

export type RiskSummary = Readonly<{
  lowest: RiskDay | null;
  firstRiskDay: RiskDay | null;
  riskDayCount: number;
  staysAboveThreshold: boolean;
}>;

export type Invoice = Readonly<{
  rowIndex: number;
  invoiceId: string;
  client: string;
  issueDate: string;
  dueDate: string;
  paidDate: string | null;
  amount: number;
}>;

export type LatenessRecord = Readonly<{
  invoiceId: string;
  client: string;
  dueDate: string;
  paidDate: string;
  amount: number;
  delayDays: number;        // negative = paid early
}>;

export type OutstandingInvoice = Readonly<{
  invoiceId: string;
  client: string;
  dueDate: string;
  amount: number;
  daysOutstanding: number;  // analysisDate - dueDate
}>;

export type ClientLatenessStat = Readonly<{
  client: string;
  invoiceCount: number;
  paidCount: number;
  meanDelayDays: number | null;
  maxDelayDays: number | null;
  lateCount: number;
  outstandingCount: number;
  outstandingAmount: number;
}>;

export type LatenessReport = Readonly<{
  gracePeriodDays: number;
  analysisDate: string;
  records: readonly LatenessRecord[];
  outstanding: readonly OutstandingInvoice[];
  clients: readonly ClientLatenessStat[];
  latePayers: readonly ClientLatenessStat[];
}>;
