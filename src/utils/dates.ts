// Calendar helpers. Ledger dates are calendar days, handled in UTC.

const DAY_MS = 24 * 60 * 60 * 1000;

export const startOfUtcDay = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

export const addDays = (date: Date, days: number): Date => new Date(startOfUtcDay(date).getTime() + days * DAY_MS);

/** YYYY-MM-DD */
export const toIsoDate = (date: Date): string => startOfUtcDay(date).toISOString().slice(0, 10);

/** YYYY-MM */
export const toMonthKey = (date: Date): string => toIsoDate(date).slice(0, 7);

export const parseIsoDate = (value: string): Date => new Date(`${value}T00:00:00.000Z`);

/**
 * Whole days from `from` to `to`, ignoring time of day. Negative when `to` is earlier.
 */
export const daysBetween = (from: Date, to: Date): number =>
  Math.round((startOfUtcDay(to).getTime() - startOfUtcDay(from).getTime()) / DAY_MS);

export const startOfUtcMonth = (year: number, monthIndex: number): Date => new Date(Date.UTC(year, monthIndex, 1));

export const endOfUtcMonth = (year: number, monthIndex: number): Date => new Date(Date.UTC(year, monthIndex + 1, 0));

/**
 * First day of every calendar month touched by the inclusive range.
 */
export const monthsInRange = (from: Date, to: Date): Date[] => {
  const months: Date[] = [];
  let cursor = startOfUtcMonth(from.getUTCFullYear(), from.getUTCMonth());
  const last = startOfUtcMonth(to.getUTCFullYear(), to.getUTCMonth());
  while (cursor.getTime() <= last.getTime()) {
    months.push(cursor);
    cursor = startOfUtcMonth(cursor.getUTCFullYear(), cursor.getUTCMonth() + 1);
  }
  return months;
};

/**
 * Inclusive day-granular range check.
 */
export const isWithinDays = (date: Date, from?: Date, to?: Date): boolean => {
  const day = startOfUtcDay(date).getTime();
  if (from && day < startOfUtcDay(from).getTime()) return false;
  if (to && day > startOfUtcDay(to).getTime()) return false;
  return true;
};
