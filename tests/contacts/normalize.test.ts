import { describe, it, expect } from 'vitest';
import { nationalDigits, normalizeEmail, normalizePhone } from '../../src/contacts/normalize.js';

describe('normalizePhone', () => {
  it('should normalize US phone with parens and dashes', () => {
    expect(normalizePhone('(555) 123-4567')).toBe('+15551234567');
  });

  it('should normalize US phone with dashes only', () => {
    expect(normalizePhone('555-123-4567')).toBe('+15551234567');
  });

  it('should normalize phone with dots', () => {
    expect(normalizePhone('555.123.4567')).toBe('+15551234567');
  });

  it('should keep already-E.164 phones unchanged', () => {
    expect(normalizePhone('+15551234567')).toBe('+15551234567');
  });

  it('should normalize UK phone number', () => {
    expect(normalizePhone('+44 20 7946 0958')).toBe('+442079460958');
  });

  it('should use the given default country', () => {
    expect(normalizePhone('030 1234567', 'DE')).toBe('+49301234567');
  });

  it('should return stripped version for unparseable numbers', () => {
    expect(normalizePhone('ext 123')).toBe('ext123');
  });

  it('should handle empty string', () => {
    expect(normalizePhone('')).toBe('');
  });
});

describe('nationalDigits', () => {
  it('should drop the country code and formatting', () => {
    expect(nationalDigits('+1 (555) 123-4567')).toBe('5551234567');
    expect(nationalDigits('555-123-4567')).toBe('5551234567');
  });

  it('should fall back to the digits of the input', () => {
    expect(nationalDigits('ext 123')).toBe('123');
  });
});

describe('normalizeEmail', () => {
  it('should lowercase emails', () => {
    expect(normalizeEmail('John@Example.COM')).toBe('john@example.com');
  });

  it('should trim whitespace', () => {
    expect(normalizeEmail('  jane@test.com  ')).toBe('jane@test.com');
  });
});
