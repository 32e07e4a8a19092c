import { NextResponse } from 'next/server';
import { z } from 'zod';
import { formatDateOnly } from '@/lib/date-only';
import { logger } from '@/lib/logger';
import { DateOnly } from '@/lib/cashflow/config';
import { INVOICE_COLUMNS, readCsv } from '@/lib/cashflow/csv';
import { isCashflowError, toErrorInfo } from '@/lib/cashflow/errors';
import { analyzeLateness, DEFAULT_GRACE_PERIOD_DAYS } from '@/lib/cashflow/lateness';
import { normalizeInvoices } from '@/lib/cashflow/normalize';

const LatenessRequestSchema = z.object({
  invoicesCsv: z.string().min(1),
  gracePeriodDays: z.number().int().min(0).default(DEFAULT_GRACE_PERIOD_DAYS),
  analysisDate: DateOnly.optional(),
});

export async function POST(req: Request) {
  const body = await req.json().catch(() => null);
  const parsed = LatenessRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: 'Invalid input', issues: parsed.error.issues }, { status: 400 });
  }

  const p = parsed.data;

  try {
    const invoices = normalizeInvoices(readCsv(p.invoicesCsv, INVOICE_COLUMNS));
    const report = analyzeLateness(invoices, {
      gracePeriodDays: p.gracePeriodDays,
      analysisDate: p.analysisDate ?? formatDateOnly(new Date()),
    });
    return NextResponse.json(report);
  } catch (e) {
    if (isCashflowError(e)) return NextResponse.json(toErrorInfo(e), { status: 422 });
    logger.error('Invoice analysis failed', e, { route: '/api/analysis/invoices' });
    return NextResponse.json({ error: 'Internal error' }, { status: 500 });
  }
}
