import { NextResponse } from 'next/server';
import { z } from 'zod';
import { formatDateOnly } from '@/lib/date-only';
import { logger } from '@/lib/logger';
import { AnalysisConfigSchema } from '@/lib/cashflow/config';
import { isCashflowError, toErrorInfo } from '@/lib/cashflow/errors';
import { runAnalysis } from '@/lib/cashflow/pipeline';

// analysisDate is optional on the wire; the route fills in today
const ConfigBodySchema = AnalysisConfigSchema.partial({ analysisDate: true });

const AnalysisRequestSchema = z.object({
  transactionsCsv: z.string().min(1, 'transactionsCsv is required'),
  invoicesCsv: z.string().nullish(),
  config: ConfigBodySchema.default({}),
});

export async function POST(req: Request) {
  const body = await req.json().catch(() => null);
  const parsed = AnalysisRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: 'Invalid input', issues: parsed.error.issues }, { status: 400 });
  }

  const { transactionsCsv, invoicesCsv, config } = parsed.data;

  try {
    const report = runAnalysis({
      transactionsCsv,
      invoicesCsv,
      config: { ...config, analysisDate: config.analysisDate ?? formatDateOnly(new Date()) },
    });
    return NextResponse.json(report);
  } catch (e) {
    if (isCashflowError(e)) return NextResponse.json(toErrorInfo(e), { status: 422 });
    logger.error('Analysis failed', e, { route: '/api/analysis' });
    return NextResponse.json({ error: 'Internal error' }, { status: 500 });
  }
}
