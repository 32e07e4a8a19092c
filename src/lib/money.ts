export function parseMoney(input: string | null | undefined): number {
  // Accepts "1234.56", "1,234.56", "1.234,56", "$ 1 200" (best-effort).
  const s = (input ?? '').trim();
  if (!s) return NaN;

  // Strip spaces and currency symbols, keep sign, digits and separators
  const x = s.replace(/[\s$€£¥]/g, '');
  if (!/^[-+]?[\d.,]+$/.test(x)) return NaN;

  const lastComma = x.lastIndexOf(',');
  const lastDot = x.lastIndexOf('.');

  // Both present: whichever comes last is the decimal separator
  if (lastComma >= 0 && lastDot >= 0) {
    return lastComma > lastDot
      ? Number(x.replace(/\./g, '').replace(',', '.'))
      : Number(x.replace(/,/g, ''));
  }

  // Only commas: "12,50" is a decimal, "1,200" / "1,200,000" are thousands
  if (lastComma >= 0) {
    return /^[-+]?\d+,\d{1,2}$/.test(x) ? Number(x.replace(',', '.')) : Number(x.replace(/,/g, ''));
  }

  return Number(x);
}
