/**
 * Calendar-date helpers. Dates are ISO strings (YYYY-MM-DD) evaluated in UTC so
 * day counts never drift with the host timezone.
 */

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import type { IsoDate } from '../../shared/lending-types';

dayjs.extend(utc);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const d = dayjs.utc(value);
  return d.isValid() && d.format('YYYY-MM-DD') === value;
}

export function toIsoDate(value: Date | IsoDate): IsoDate {
  return dayjs.utc(value).format('YYYY-MM-DD');
}

export function addMonths(isoDate: IsoDate, months: number): IsoDate {
  // dayjs clamps to the last day of shorter months
  return dayjs.utc(isoDate).add(months, 'month').format('YYYY-MM-DD');
}

/**
 * First day of the month `months` months after the month containing `isoDate`.
 */
export function firstOfMonthAfter(isoDate: IsoDate, months: number): IsoDate {
  return dayjs.utc(isoDate).startOf('month').add(months, 'month').format('YYYY-MM-DD');
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return dayjs.utc(to).diff(dayjs.utc(from), 'day');
}

export function compareDates(a: IsoDate, b: IsoDate): number {
  // ISO calendar dates sort lexicographically
  return a < b ? -1 : a > b ? 1 : 0;
}
