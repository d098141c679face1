import { describe, it, expect } from 'vitest';
import { formatLabelledField, getField, getFieldValue, isFieldName } from '../../src/contacts/fields.js';
import { ValidationError } from '../../src/utils/errors.js';
import { makeContact } from '../helpers.js';

const contact = makeContact({
  'First name': 'Jane',
  'Last name': 'Doe',
  Phone: { cell: '0123456789', 'home, pref': '555' },
  Email: { work: ['jane@example.com', 'doe@example.com'] },
  Birthday: '1990-05-15',
  Address: { home: { Street: 'Main St 1', City: 'Springfield' } },
});

describe('formatLabelledField', () => {
  const field = { home: ['b', 'a'], 'work, pref': ['c'] };

  it('should pick the first matching preferred type', () => {
    expect(formatLabelledField(field, ['home'])).toBe('home: a');
    expect(formatLabelledField(field, ['fax', 'work'])).toBe('work, pref: c');
  });

  it('should fall back to preferred and then all types', () => {
    expect(formatLabelledField(field, [])).toBe('work, pref: c');
    expect(formatLabelledField({ home: ['x'] }, [])).toBe('home: x');
    expect(formatLabelledField({}, ['pref'])).toBe('');
  });
});

describe('getField', () => {
  it('should read top-level fields', () => {
    expect(getField(contact, 'formatted_name')).toBe('Jane Doe');
    expect(getField(contact, 'Last Name')).toBe('Doe');
    expect(getField(contact, 'birthday')).toBe('1990-05-15');
    expect(getField(contact, 'phone')).toBe('home, pref: 555');
  });

  it('should walk dotted paths', () => {
    expect(getField(contact, 'emails.work.1')).toBe('jane@example.com');
    expect(getField(contact, 'post_addresses.home.0.city')).toBe('Springfield');
    expect(getField(contact, 'emails.home.0')).toBe('');
  });

  it('should flatten structured values', () => {
    expect(getField(contact, 'emails')).toBe('work: doe@example.com, jane@example.com');
  });

  it('should use the configured type preference', () => {
    const context = { preferredPhoneNumberType: ['cell'], preferredEmailAddressType: ['pref'] };
    expect(getFieldValue(contact, 'phone', context)).toBe('cell: 0123456789');
  });

  it('should reject unknown fields', () => {
    expect(() => getField(contact, 'shoe_size')).toThrow(ValidationError);
    expect(() => getField(contact, 'shoe_size')).toThrow('Unknown field: shoe_size');
    expect(isFieldName('emails')).toBe(true);
    expect(isFieldName('toString')).toBe(false);
  });
});
