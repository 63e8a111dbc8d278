// Calendar months are handled as "YYYY-MM" strings and days as "YYYY-MM-DD",
// so nothing here depends on the process time zone except `today` itself.

const MONTH_RE = /^(\d{4})-(\d{1,2})$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function formatMonth(year: number, month: number): string {
  return `${year.toString().padStart(4, "0")}-${month.toString().padStart(2, "0")}`;
}

export function formatDate(date: Date): string {
  const day = date.getDate().toString().padStart(2, "0");
  return `${formatMonth(date.getFullYear(), date.getMonth() + 1)}-${day}`;
}

export function currentMonth(today: Date = new Date()): string {
  return formatMonth(today.getFullYear(), today.getMonth() + 1);
}

export function isValidDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match.map(Number);
  const date = new Date(Date.UTC(y, m - 1, d));
  return (
    date.getUTCFullYear() === y &&
    date.getUTCMonth() === m - 1 &&
    date.getUTCDate() === d
  );
}

/**
 * Reads a `?month=YYYY-MM` parameter. Anything missing or malformed falls
 * back to the month containing `today`.
 */
export function parseMonthParam(
  value: string | null | undefined,
  today: Date = new Date()
): string {
  const match = value ? MONTH_RE.exec(value.trim()) : null;
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    if (year >= 1 && month >= 1 && month <= 12) {
      return formatMonth(year, month);
    }
  }
  return currentMonth(today);
}

/** Shifts a "YYYY-MM" month by `k` months, crossing year boundaries. */
export function addMonth(month: string, k: number): string {
  const [year, m] = month.split("-").map(Number);
  const index = year * 12 + (m - 1) + k;
  return formatMonth(Math.floor(index / 12), (index % 12) + 1);
}

/** Half-open day range `[start, end)` covering the month. */
export function monthBounds(month: string): { start: string; end: string } {
  return {
    start: `${month}-01`,
    end: `${addMonth(month, 1)}-01`,
  };
}

export function monthOf(date: string): string {
  return date.slice(0, 7);
}

/**
 * Normalizes "YYYY-MM" or "YYYY-MM-DD" to the first day of that month, or
 * returns null when the value is neither.
 */
export function firstDayOfMonth(value: string): string | null {
  const trimmed = value.trim();
  if (isValidDate(trimmed)) {
    return `${monthOf(trimmed)}-01`;
  }
  const match = MONTH_RE.exec(trimmed);
  if (!match) return null;
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return `${formatMonth(Number(match[1]), month)}-01`;
}
