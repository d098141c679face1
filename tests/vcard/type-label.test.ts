import { describe, it, expect } from 'vitest';
import { checkTypes, parseTypes, typeKey, typesOf, vocabularyFor } from '../../src/vcard/type-label.js';

describe('parseTypes', () => {
  const phone3 = vocabularyFor('phone', '3.0');

  it('should split standard types, custom labels and preference', () => {
    expect(parseTypes(['home', 'pref', 'Mobile'], phone3)).toEqual({
      standardTypes: ['home', 'X-Mobile'],
      customTypes: ['Mobile'],
      pref: 1,
    });
  });

  it('should add up pref weights', () => {
    expect(parseTypes(['pref', 'pref=3'], phone3).pref).toBe(4);
  });

  it('should keep X- tokens as custom labels without the prefix', () => {
    expect(parseTypes(['x-Boat'], phone3)).toEqual({ standardTypes: ['x-Boat'], customTypes: ['Boat'], pref: 0 });
  });

  it('should match the vocabulary case-insensitively and keep the spelling', () => {
    expect(parseTypes(['HOME', 'HOME'], phone3).standardTypes).toEqual(['HOME']);
  });

  it('should use the version 4.0 vocabulary', () => {
    expect(parseTypes(['text'], vocabularyFor('phone', '4.0')).customTypes).toEqual([]);
    expect(parseTypes(['text'], phone3).customTypes).toEqual(['text']);
  });
});

describe('checkTypes', () => {
  const email3 = vocabularyFor('email', '3.0');

  it('should reject an empty type set', () => {
    expect(() => checkTypes(parseTypes([''], email3), 'Email', 'email address', 'a@b.c'))
      .toThrow('Error: label for email address a@b.c is missing.');
  });

  it('should reject two custom labels', () => {
    expect(() => checkTypes(parseTypes(['foo', 'bar'], email3), 'Email', 'email address', 'a@b.c'))
      .toThrow('Error: email address a@b.c got more than one custom label: foo, bar');
  });

  it('should accept a bare preference', () => {
    expect(() => checkTypes(parseTypes(['pref'], email3), 'Email', 'email address', 'a@b.c')).not.toThrow();
  });
});

describe('typesOf', () => {
  it('should list the label, the types and the preference', () => {
    const params = new Map([['TYPE', ['X-Boat', 'voice', 'pref']]]);
    expect(typeKey(typesOf(params, 'Boat', 'voice'))).toBe('Boat, voice, pref');
  });

  it('should report the PREF weight of version 4.0', () => {
    const params = new Map([['TYPE', ['work']], ['PREF', ['2']]]);
    expect(typesOf(params, '', 'internet')).toEqual(['work', 'pref=2']);
  });

  it('should fall back to the default type', () => {
    expect(typesOf(new Map(), '', 'internet')).toEqual(['internet']);
  });
});

describe('parseTypes after typesOf', () => {
  it('should give back the stored 3.0 types, label and pref token', () => {
    const phone3 = vocabularyFor('phone', '3.0');
    const stored = parseTypes(['Boat', 'voice', 'pref'], phone3);
    const params = new Map([['TYPE', [...stored.standardTypes, 'pref']]]);
    expect(parseTypes(typesOf(params, 'Boat', 'voice'), phone3)).toEqual(stored);
    expect(stored).toEqual({ standardTypes: ['X-Boat', 'voice'], customTypes: ['Boat'], pref: 1 });
  });

  it('should give back the stored 4.0 types and PREF weight', () => {
    const email4 = vocabularyFor('email', '4.0');
    const stored = parseTypes(['Private', 'home', 'pref=2'], email4);
    const params = new Map([['TYPE', stored.standardTypes], ['PREF', [String(stored.pref)]]]);
    expect(parseTypes(typesOf(params, 'Private', 'internet'), email4)).toEqual(stored);
    expect(stored).toEqual({ standardTypes: ['X-Private', 'home'], customTypes: ['Private'], pref: 2 });
  });

  it('should give back plain standard types', () => {
    const address3 = vocabularyFor('address', '3.0');
    const stored = parseTypes(['work', 'postal'], address3);
    const params = new Map([['TYPE', stored.standardTypes]]);
    expect(parseTypes(typesOf(params, '', 'home'), address3)).toEqual(stored);
  });
});
