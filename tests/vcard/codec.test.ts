import { describe, it, expect } from 'vitest';
import { decodeVCard, encodeVCard, repairVCard } from '../../src/vcard/codec.js';
import { VCardDocument } from '../../src/vcard/document.js';
import { ValidationError, VCardParseError } from '../../src/utils/errors.js';
import { vcard } from '../helpers.js';

describe('decodeVCard', () => {
  it('should decode a minimal card', () => {
    const doc = decodeVCard(vcard('VERSION:3.0', 'FN:Test'));
    expect(doc.formattedName).toBe('Test');
    expect(doc.version).toBe('3.0');
    expect(doc.uid).toBe('');
    expect(doc.phoneNumbers).toEqual({});
    expect(doc.emails).toEqual({});
    expect(doc.postAddresses).toEqual({});
  });

  it('should decode structured and list fields', () => {
    const doc = decodeVCard(vcard(
      'VERSION:3.0',
      'FN:Jane Doe',
      'N:Doe;Jane;;;',
      'ORG:Acme;R&D',
      'CATEGORIES:friends,work',
      'ADR;TYPE=home:;;Main St 1;Springfield;;12345;',
    ));
    expect(doc.lastNames).toEqual(['Doe']);
    expect(doc.firstNames).toEqual(['Jane']);
    expect(doc.organisations).toEqual([['Acme', 'R&D']]);
    expect(doc.categories).toEqual([['friends', 'work']]);
    expect(doc.postAddresses.home?.[0]?.city).toBe('Springfield');
  });

  it('should unescape text values', () => {
    const doc = decodeVCard(vcard('VERSION:3.0', 'FN:A', 'NOTE:line one\\nline two\\, done'));
    expect(doc.notes).toEqual(['line one\nline two, done']);
  });

  it('should unfold folded lines', () => {
    const doc = decodeVCard(['BEGIN:VCARD', 'VERSION:3.0', 'FN:Jane', ' t Doe', 'END:VCARD'].join('\r\n'));
    expect(doc.formattedName).toBe('Janet Doe');
  });

  it('should treat bare parameters as types', () => {
    const doc = decodeVCard(vcard('VERSION:3.0', 'FN:A', 'TEL;HOME:123'));
    expect(doc.phoneNumbers).toEqual({ HOME: ['123'] });
  });

  it('should read quoted parameter values with commas', () => {
    const doc = decodeVCard(vcard('VERSION:4.0', 'FN:A', 'EMAIL;TYPE="home,work":a@b.c'));
    expect(doc.first('EMAIL')?.params.get('TYPE')).toEqual(['home,work']);
  });

  it('should use the fallback version for cards without VERSION', () => {
    const doc = decodeVCard(vcard('FN:A'), { fallbackVersion: '4.0' });
    expect(doc.version).toBe('4.0');
  });

  it('should keep the first of duplicate singleton fields', () => {
    const doc = decodeVCard(vcard('VERSION:3.0', 'FN:First', 'FN:Second'));
    expect(doc.formattedName).toBe('First');
    expect(doc.getAll('FN')).toHaveLength(1);
  });

  it('should repair broken instant messaging tags', () => {
    const doc = decodeVCard(vcard('VERSION:3.0', 'FN:A', 'X-messaging/aim-All:jane'));
    expect(doc.first('X-AIM')?.value).toEqual({ kind: 'text', text: 'jane' });
  });

  it('should reject malformed cards', () => {
    expect(() => decodeVCard('VERSION:3.0\r\nFN:A\r\n')).toThrow('missing BEGIN:VCARD');
    expect(() => decodeVCard('BEGIN:VCARD\r\nFN:A\r\n')).toThrow('missing END:VCARD');
    expect(() => decodeVCard(vcard('VERSION:3.0', 'no colon here'))).toThrow(VCardParseError);
    expect(() => decodeVCard(vcard('VERSION:3.0', 'BEGIN:VCARD'))).toThrow('nested vCard objects are not supported');
  });

  it('should report the line of a parse error', () => {
    expect(() => decodeVCard(vcard('VERSION:3.0', 'FN:A', 'bad line'))).toThrow('line 4: content line without value: bad line');
  });

  it('should ignore a byte order mark', () => {
    expect(decodeVCard(`\uFEFF${vcard('VERSION:3.0', 'FN:A')}`).formattedName).toBe('A');
  });
});

describe('repairVCard', () => {
  it('should map vendor tags to X- fields', () => {
    expect(repairVCard('X-messaging/xmpp-All:a\r\nX-messaging/skype-All:b')).toBe('X-JABBER:a\r\nX-SKYPE:b');
  });
});

describe('encodeVCard', () => {
  it('should write VERSION first and end with CRLF', () => {
    const doc = VCardDocument.create('3.0');
    doc.uid = 'abc';
    doc.formattedName = 'Test';
    expect(encodeVCard(doc)).toBe('BEGIN:VCARD\r\nVERSION:3.0\r\nUID:abc\r\nFN:Test\r\nEND:VCARD\r\n');
  });

  it('should reproduce a card it decoded', () => {
    const text = vcard(
      'VERSION:3.0',
      'UID:test-uid',
      'FN:Jane Doe',
      'N:Doe;Jane;;;',
      'item1.EMAIL;TYPE=X-Private:jane@example.com',
      'item1.X-ABLABEL:Private',
      'NOTE:a\\, b',
      'TEL;TYPE=cell,pref:+1 555 0100',
      'URL:https://example.com/a;b',
    );
    expect(encodeVCard(decodeVCard(text))).toBe(text);
  });

  it('should keep line breaks in text values and type labels on one content line', () => {
    const doc = VCardDocument.create('3.0');
    doc.formattedName = 'A';
    doc.addNote('first\r\nsecond');
    doc.addEmail('a\r\nb', 'a@b.c');
    const text = encodeVCard(doc);
    expect(text).toContain('\r\nNOTE:first\\nsecond\r\n');
    expect(text).toContain('\r\nitememail1.EMAIL;TYPE="X-a^nb":a@b.c\r\n');
    const decoded = decodeVCard(text);
    expect(decoded.notes).toEqual(['first\nsecond']);
    expect(decoded.emails).toEqual({ 'a\nb': ['a@b.c'] });
  });

  it('should reject line breaks in values written without escaping', () => {
    const doc = VCardDocument.create('3.0');
    expect(() => doc.addPhoneNumber('home', '12\n34')).toThrow(ValidationError);
    expect(() => doc.addWebpage({ work: 'http://a\nb' })).toThrow(ValidationError);
    expect(() => { doc.uid = 'a\rb'; }).toThrow(ValidationError);
    expect(doc.phoneNumbers).toEqual({});
    expect(doc.webpages).toEqual([]);
    expect(doc.uid).toBe('');
  });

  it('should fold long lines', () => {
    const doc = VCardDocument.create('3.0');
    doc.formattedName = 'x'.repeat(80);
    const lines = encodeVCard(doc).split('\r\n');
    expect(lines[2]).toBe(`FN:${'x'.repeat(72)}`);
    expect(lines[3]).toBe(` ${'x'.repeat(8)}`);
  });
});
