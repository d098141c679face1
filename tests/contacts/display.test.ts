import { describe, it, expect } from 'vitest';
import { displayLines } from '../../src/contacts/display.js';
import { makeContact } from '../helpers.js';

describe('displayLines', () => {
  it('should put a single value on the header line', () => {
    expect(displayLines('Nickname', ['Bob'], 4)).toEqual(['    Nickname: Bob']);
  });

  it('should list several values', () => {
    expect(displayLines('Nickname', ['Bob', { label: 'Work', value: 'Bobby' }], 0)).toEqual([
      'Nickname: ',
      '    - Bob',
      '    - Work: Bobby',
    ]);
  });

  it('should indent multi-line values', () => {
    expect(displayLines('Note', ['a\nb'], 4)).toEqual(['    Note: \n        a\n        b']);
  });
});

describe('prettyContact', () => {
  const contact = makeContact({
    'First name': 'Jane',
    'Last name': 'Doe',
    Organisation: 'Acme',
    Phone: { cell: '0123456789' },
    Email: { work: 'jane@example.com' },
    Birthday: '1990-05-15',
    Note: 'met at conference',
  });

  it('should render a read-only summary', () => {
    expect(contact.pretty(false)).toBe([
      'Name: Jane Doe',
      'Full name: Jane Doe',
      'Organisation: Acme',
      'Kind: individual',
      'General:',
      '    Birthday: 1990-05-15',
      'Phone',
      '    cell: 0123456789',
      'E-Mail',
      '    work: jane@example.com',
      'Miscellaneous',
      '    Note: met at conference',
      '',
    ].join('\n'));
  });

  it('should show the address book and UID when verbose', () => {
    const lines = contact.pretty().split('\n');
    expect(lines[3]).toBe('Address book: ');
    expect(lines).toContain(`    UID: ${contact.uid}`);
  });
});
