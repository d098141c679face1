import { describe, it, expect } from 'vitest';
import {
  formatDisplayDate, formatTemplateDate, formatVCardDate, isYearless, parseDate,
} from '../../src/vcard/dates.js';

describe('parseDate', () => {
  it('should parse basic and extended dates', () => {
    const expected = { year: 1990, month: 5, day: 15, hour: 0, minute: 0, second: 0 };
    expect(parseDate('19900515')).toEqual(expected);
    expect(parseDate('1990-05-15')).toEqual(expected);
  });

  it('should parse dates without year as year 1900', () => {
    const date = parseDate('--05-17');
    expect(date).toEqual({ year: 1900, month: 5, day: 17, hour: 0, minute: 0, second: 0 });
    expect(date && isYearless(date)).toBe(true);
    expect(parseDate('--0517')).toEqual(date);
  });

  it('should keep a non-zero UTC offset', () => {
    expect(parseDate('20200102T030405+0200')).toEqual({
      year: 2020, month: 1, day: 2, hour: 3, minute: 4, second: 5, offset: '+02:00',
    });
  });

  it('should treat Z and a zero offset as no offset', () => {
    expect(parseDate('2020-01-02T03:04:05Z')?.offset).toBeUndefined();
    expect(parseDate('2020-01-02T03:04:05+00:00')?.offset).toBeUndefined();
  });

  it('should return undefined for invalid dates', () => {
    expect(parseDate('2020-02-30')).toBeUndefined();
    expect(parseDate('2020-01-01T25:00:00')).toBeUndefined();
    expect(parseDate('tomorrow')).toBeUndefined();
  });
});

describe('formatVCardDate', () => {
  const date = { year: 1990, month: 5, day: 15, hour: 0, minute: 0, second: 0 };

  it('should use the extended form for 3.0 and the basic form for 4.0', () => {
    expect(formatVCardDate(date, '3.0')).toBe('1990-05-15');
    expect(formatVCardDate(date, '4.0')).toBe('19900515');
  });

  it('should write the time of day with its offset', () => {
    const stamp = { ...date, hour: 10, minute: 20, second: 30 };
    expect(formatVCardDate(stamp, '3.0')).toBe('1990-05-15T10:20:30Z');
    expect(formatVCardDate({ ...stamp, offset: '+02:00' }, '4.0')).toBe('19900515T102030+02:00');
  });

  it('should write dates without year only for 4.0', () => {
    const yearless = { ...date, year: 1900 };
    expect(formatVCardDate(yearless, '4.0')).toBe('--0515');
    expect(formatVCardDate(yearless, '3.0')).toBe('1900-05-15');
  });
});

describe('formatTemplateDate', () => {
  it('should use the dashed form for dates without year', () => {
    const yearless = { year: 1900, month: 5, day: 17, hour: 0, minute: 0, second: 0 };
    expect(formatTemplateDate(yearless, '4.0')).toBe('--05-17');
    expect(formatTemplateDate(yearless, '3.0')).toBe('1900-05-17');
  });
});

describe('formatDisplayDate', () => {
  it('should show free text and missing dates as given', () => {
    expect(formatDisplayDate('first spring', false)).toBe('first spring');
    expect(formatDisplayDate(undefined, false)).toBe('');
  });

  it('should show ISO dates unless localized', () => {
    expect(formatDisplayDate({ year: 2001, month: 2, day: 3, hour: 0, minute: 0, second: 0 }, false)).toBe('2001-02-03');
  });
});
