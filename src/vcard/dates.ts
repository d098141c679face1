import type { DateTimeValue, DateValue } from '../types/contact.js';

/** Year used for dates stored without a year (`--MM-DD`). */
export const NO_YEAR = 1900;

const YEARLESS = /^--(\d{2})-?(\d{2})$/;
const DATE_BASIC = /^(\d{4})(\d{2})(\d{2})$/;
const DATE_EXTENDED = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_BASIC = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z|[+-]\d{2}:?\d{2})?$/;
const DATETIME_EXTENDED = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(Z|[+-]\d{2}:?\d{2})?$/;

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1] ?? 0;
}

/** "+0200" and "+02:00" become "+02:00"; "Z" and a zero offset mean no offset. */
function normalizeOffset(raw: string | undefined): string | undefined | null {
  if (!raw || raw === 'Z') return undefined;
  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(raw);
  if (!match) return null;
  const [, sign, hours, minutes] = match;
  if (Number(hours) > 23 || Number(minutes) > 59) return null;
  if (hours === '00' && minutes === '00') return undefined;
  return `${sign}${hours}:${minutes}`;
}

function build(parts: (string | undefined)[], offsetRaw?: string): DateTimeValue | undefined {
  const [year, month, day, hour, minute, second] = parts.map(part => Number(part ?? '0'));
  if (year === undefined || month === undefined || day === undefined) return undefined;
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined;
  const h = hour ?? 0;
  const m = minute ?? 0;
  const s = second ?? 0;
  if (h > 23 || m > 59 || s > 59) return undefined;
  const offset = normalizeOffset(offsetRaw);
  if (offset === null) return undefined;
  const value: DateTimeValue = { year, month, day, hour: h, minute: m, second: s };
  if (offset) value.offset = offset;
  return value;
}

/**
 * Parse the date forms vCards use: `--MMDD`, `--MM-DD`, `YYYYMMDD`,
 * `YYYY-MM-DD` and date-times in basic or extended form with an optional
 * `Z` or UTC offset. Returns undefined for anything else.
 */
export function parseDate(input: string): DateTimeValue | undefined {
  const text = input.trim();
  const yearless = YEARLESS.exec(text);
  if (yearless) return build([String(NO_YEAR), yearless[1], yearless[2]]);
  const date = DATE_BASIC.exec(text) ?? DATE_EXTENDED.exec(text);
  if (date) return build([date[1], date[2], date[3]]);
  const dateTime = DATETIME_BASIC.exec(text) ?? DATETIME_EXTENDED.exec(text);
  if (dateTime) return build(dateTime.slice(1, 7), dateTime[7]);
  return undefined;
}

export function hasTime(date: DateTimeValue): boolean {
  return date.hour !== 0 || date.minute !== 0 || date.second !== 0;
}

export function isYearless(date: DateTimeValue): boolean {
  return date.year === NO_YEAR && !hasTime(date);
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function isoDate(date: DateTimeValue, separator: string): string {
  return [pad(date.year, 4), pad(date.month), pad(date.day)].join(separator);
}

function isoTime(date: DateTimeValue, separator: string): string {
  return [pad(date.hour), pad(date.minute), pad(date.second)].join(separator);
}

/** Render a date as a BDAY/ANNIVERSARY value for the given vCard version. */
export function formatVCardDate(date: DateTimeValue, version: string): string {
  const v4 = version === '4.0';
  if (v4 && isYearless(date)) {
    return `--${pad(date.month)}${pad(date.day)}`;
  }
  if (date.offset || hasTime(date)) {
    const stamp = v4
      ? `${isoDate(date, '')}T${isoTime(date, '')}`
      : `${isoDate(date, '-')}T${isoTime(date, ':')}`;
    return stamp + (date.offset ?? 'Z');
  }
  return isoDate(date, v4 ? '' : '-');
}

/** ISO form used in the editable template. */
export function formatTemplateDate(date: DateTimeValue, version: string): string {
  if (version === '4.0' && isYearless(date)) {
    return `--${pad(date.month)}-${pad(date.day)}`;
  }
  if (date.offset || hasTime(date)) {
    return `${isoDate(date, '-')}T${isoTime(date, ':')}${date.offset ?? ''}`;
  }
  return isoDate(date, '-');
}

/** Human readable form; localized through Intl when asked to. */
export function formatDisplayDate(date: DateValue | undefined, localize: boolean): string {
  if (date === undefined) return '';
  if (typeof date === 'string') return date;
  if (isYearless(date)) {
    return `--${pad(date.month)}-${pad(date.day)}`;
  }
  const local = new Date(date.year, date.month - 1, date.day, date.hour, date.minute, date.second);
  if (date.offset || hasTime(date)) {
    if (localize) {
      return new Intl.DateTimeFormat(undefined, { dateStyle: 'medium', timeStyle: 'medium' }).format(local);
    }
    return `${isoDate(date, '-')}T${isoTime(date, ':')}${date.offset ?? ''}`;
  }
  if (localize) {
    return new Intl.DateTimeFormat(undefined, { dateStyle: 'medium' }).format(local);
  }
  return isoDate(date, '-');
}
