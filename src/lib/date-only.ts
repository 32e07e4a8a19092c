import { addDays, addMonths, differenceInCalendarDays, getDaysInMonth, isValid, parse, setDate } from 'date-fns';

// Input formats accepted from uploaded CSV files, tried in order.
const INPUT_FORMATS = ['yyyy-MM-dd', 'yyyy/MM/dd', 'MM/dd/yyyy', 'dd.MM.yyyy'] as const;

const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/;

// Years below this do not survive new Date(y, ...) or an unpadded format
const MIN_YEAR = 1000;

export function parseDateOnly(ymd: string) {
  // ymd: "YYYY-MM-DD" -> local Date at 12:00 to avoid DST edge cases
  const [y, m, d] = ymd.split('-').map(Number);
  return new Date(y, (m ?? 1) - 1, d ?? 1, 12, 0, 0, 0);
}

export function formatDateOnly(d: Date) {
  // local date -> "YYYY-MM-DD"
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/**
 * Parses a user-supplied date cell into "YYYY-MM-DD".
 * Returns null when the value matches none of the accepted formats, or
 * names a year before 1000.
 */
export function toDateOnly(value: string | null | undefined): string | null {
  const s = (value ?? '').trim();
  if (!s) return null;

  // ISO timestamps: only the date part counts
  const ts = ISO_TIMESTAMP.exec(s);
  const candidate = ts ? ts[1] : s;

  const reference = new Date(2000, 0, 1, 12, 0, 0, 0);
  for (const fmt of INPUT_FORMATS) {
    if (candidate.length !== fmt.length) continue;
    const parsed = parse(candidate, fmt, reference);
    if (!isValid(parsed)) continue;
    return parsed.getFullYear() >= MIN_YEAR ? formatDateOnly(parsed) : null;
  }
  return null;
}

export function addDaysDateOnly(ymd: string, days: number) {
  return formatDateOnly(addDays(parseDateOnly(ymd), days));
}

export function addMonthsDateOnly(ymd: string, months: number) {
  // date-fns clamps Jan 31 + 1 month to the last day of February
  return formatDateOnly(addMonths(parseDateOnly(ymd), months));
}

/** Adds whole months, then moves to `dayOfMonth`, clamped to the month's last day. */
export function addMonthsOnDayDateOnly(ymd: string, months: number, dayOfMonth: number) {
  const d = addMonths(parseDateOnly(ymd), months);
  return formatDateOnly(setDate(d, Math.min(dayOfMonth, getDaysInMonth(d))));
}

export function dayOfMonthDateOnly(ymd: string) {
  return parseDateOnly(ymd).getDate();
}

export function daysInMonthDateOnly(ymd: string) {
  return getDaysInMonth(parseDateOnly(ymd));
}

/** Calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string) {
  return differenceInCalendarDays(parseDateOnly(to), parseDateOnly(from));
}

export function eachDateOnly(start: string, endInclusive: string): string[] {
  const out: string[] = [];
  const total = daysBetween(start, endInclusive);
  for (let i = 0; i <= total; i++) out.push(addDaysDateOnly(start, i));
  return out;
}
