import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import type { CalendarDate } from '../types.js';
import { ConfigurationError } from '../errors.js';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

const DATE_FORMAT = 'YYYY-MM-DD';

/**
 * Validates a user-supplied `YYYY-MM-DD` date. Strict parsing rejects
 * impossible calendar days such as 2024-02-30.
 */
export function parseCalendarDate(raw: string, label: string): CalendarDate {
  const trimmed = raw.trim();
  const parsed = dayjs.utc(trimmed, DATE_FORMAT, true);
  if (!parsed.isValid()) {
    throw new ConfigurationError(`Invalid ${label} date "${raw}" (expected ${DATE_FORMAT})`);
  }
  return parsed.format(DATE_FORMAT);
}

/** UTC calendar date of a unix timestamp, or null when the timestamp is unusable. */
export function toCalendarDate(unixSeconds: number): CalendarDate | null {
  if (!Number.isSafeInteger(unixSeconds)) return null;
  const date = dayjs.unix(unixSeconds).utc();
  // Outside 0000–9999 the string form stops sorting as a date
  if (!date.isValid() || date.year() < 0 || date.year() > 9999) return null;
  return date.format(DATE_FORMAT);
}

export function validateDateRange(from: CalendarDate | null, to: CalendarDate | null): void {
  if (from && to && from > to) {
    throw new ConfigurationError(`Start date ${from} must not be after end date ${to}`);
  }
}
