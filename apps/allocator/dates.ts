import { InvalidDateError } from '../../packages/shared/errors';

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

/** Parses a plain `YYYY-MM-DD` date as UTC midnight; rejects impossible dates. */
export function parseIsoDate(value: string, label = 'date'): Date {
  const match = ISO_DATE_RE.exec(value.trim());
  if (!match) {
    throw new InvalidDateError(`Invalid ${label} "${value}". Use YYYY-MM-DD format.`);
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (formatIsoDate(date) !== value.trim()) {
    throw new InvalidDateError(`Invalid ${label} "${value}". No such calendar day.`);
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function daysInclusive(start: Date, end: Date): number {
  return Math.round((end.getTime() - start.getTime()) / DAY_MS) + 1;
}

export function weekdayName(date: Date): string {
  return WEEKDAYS[date.getUTCDay()];
}

export function parseDateRange(startDate: string, endDate: string) {
  const start = parseIsoDate(startDate, 'start date');
  const end = parseIsoDate(endDate, 'end date');
  if (end.getTime() < start.getTime()) {
    throw new InvalidDateError(`End date ${endDate} is before start date ${startDate}.`);
  }
  return { start, end };
}
