import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { InvalidWindowError } from '../errors/log-window.error.js';
import { CURRENT } from '../config.js';

dayjs.extend(utc);

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

/**
 * Month number (1-12) for a full English month name, or for "current".
 */
export function resolveMonth(selection: string, nowMs: number): number {
  const normalized = selection.trim().toLowerCase();
  if (normalized === CURRENT) {
    return dayjs.utc(nowMs).month() + 1;
  }

  const index = MONTH_NAMES.indexOf(normalized);
  if (index === -1) {
    throw new InvalidWindowError({
      message: `Unknown month: ${selection}`,
      metadata: { month: selection },
    });
  }
  return index + 1;
}

/**
 * Day of month for a numeric selection or "current".
 * Days past the end of the month are rejected rather than rolled over.
 */
export function resolveDay(selection: string, year: number, month: number, nowMs: number): number {
  const normalized = selection.trim().toLowerCase();
  const daysInMonth = dayjs.utc(Date.UTC(year, month - 1, 1)).daysInMonth();

  let day: number;
  if (normalized === CURRENT) {
    day = dayjs.utc(nowMs).date();
  } else {
    day = /^\d{1,2}$/.test(normalized) ? Number(normalized) : NaN;
  }

  if (!Number.isInteger(day) || day < 1 || day > daysInMonth) {
    throw new InvalidWindowError({
      message: `Invalid day ${selection} for ${MONTH_NAMES[month - 1]} ${year} (1-${daysInMonth})`,
      metadata: { day: selection, month, year },
    });
  }
  return day;
}

export function resolveCalendarDate(monthSelection: string, daySelection: string, nowMs: number): CalendarDate {
  const year = dayjs.utc(nowMs).year();
  const month = resolveMonth(monthSelection, nowMs);
  const day = resolveDay(daySelection, year, month, nowMs);
  return { year, month, day };
}

/**
 * 23:59:59.000 UTC on the given date, in epoch milliseconds.
 */
export function endOfDayUtcMs(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day, 23, 59, 59);
}

export function formatCalendarDate(date: CalendarDate): string {
  return dayjs.utc(Date.UTC(date.year, date.month - 1, date.day)).format('YYYY-MM-DD');
}

/**
 * UTC timestamp with millisecond precision, e.g. 2024-03-14T09:26:53.589Z.
 */
export function formatTimestamp(ms: number): string {
  return dayjs.utc(ms).format('YYYY-MM-DDTHH:mm:ss.SSS[Z]');
}
