import { daysBetween } from '@/lib/date-only';
import type {
  ClientLatenessStat,
  Invoice,
  LatenessRecord,
  LatenessReport,
  OutstandingInvoice,
} from './types';

export const DEFAULT_GRACE_PERIOD_DAYS = 0;

type ClientAcc = {
  client: string;
  invoiceCount: number;
  delays: number[];
  outstandingCount: number;
  outstandingAmount: number;
};

function compareClients(a: ClientLatenessStat, b: ClientLatenessStat) {
  if (a.lateCount !== b.lateCount) return b.lateCount - a.lateCount;
  if (a.meanDelayDays !== b.meanDelayDays) {
    if (a.meanDelayDays === null) return 1;
    if (b.meanDelayDays === null) return -1;
    return b.meanDelayDays - a.meanDelayDays;
  }
  return a.client < b.client ? -1 : a.client > b.client ? 1 : 0;
}

/**
 * Splits invoices into paid (with a delay against the due date) and
 * outstanding, then aggregates per client, worst payers first.
 */
export function analyzeLateness(
  invoices: readonly Invoice[],
  params: { analysisDate: string; gracePeriodDays?: number },
): LatenessReport {
  const { analysisDate, gracePeriodDays = DEFAULT_GRACE_PERIOD_DAYS } = params;

  const records: LatenessRecord[] = [];
  const outstanding: OutstandingInvoice[] = [];
  const byClient = new Map<string, ClientAcc>();

  for (const inv of invoices) {
    const acc: ClientAcc = byClient.get(inv.client) ?? {
      client: inv.client,
      invoiceCount: 0,
      delays: [],
      outstandingCount: 0,
      outstandingAmount: 0,
    };
    acc.invoiceCount += 1;
    byClient.set(inv.client, acc);

    if (inv.paidDate !== null) {
      const delayDays = daysBetween(inv.dueDate, inv.paidDate);
      acc.delays.push(delayDays);
      records.push(
        Object.freeze({
          invoiceId: inv.invoiceId,
          client: inv.client,
          dueDate: inv.dueDate,
          paidDate: inv.paidDate,
          amount: inv.amount,
          delayDays,
        }),
      );
    } else {
      acc.outstandingCount += 1;
      acc.outstandingAmount += inv.amount;
      outstanding.push(
        Object.freeze({
          invoiceId: inv.invoiceId,
          client: inv.client,
          dueDate: inv.dueDate,
          amount: inv.amount,
          daysOutstanding: daysBetween(inv.dueDate, analysisDate),
        }),
      );
    }
  }

  const clients = [...byClient.values()]
    .map((acc): ClientLatenessStat => {
      const paid = acc.delays.length;
      return Object.freeze({
        client: acc.client,
        invoiceCount: acc.invoiceCount,
        paidCount: paid,
        meanDelayDays: paid ? acc.delays.reduce((s, d) => s + d, 0) / paid : null,
        maxDelayDays: paid ? Math.max(...acc.delays) : null,
        lateCount: acc.delays.filter((d) => d > gracePeriodDays).length,
        outstandingCount: acc.outstandingCount,
        outstandingAmount: acc.outstandingAmount,
      });
    })
    .sort(compareClients);

  return Object.freeze({
    gracePeriodDays,
    analysisDate,
    records: Object.freeze(records),
    outstanding: Object.freeze(outstanding),
    clients: Object.freeze(clients),
    latePayers: Object.freeze(clients.filter((c) => c.lateCount > 0)),
  });
}
