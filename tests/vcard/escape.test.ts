import { describe, it, expect } from 'vitest';
import {
  escapeText, foldLine, quoteParamValue, splitEscaped, unescapeText, unfoldLines, unquoteParamValue,
} from '../../src/vcard/escape.js';

describe('text escaping', () => {
  it('should escape separators, backslashes and newlines', () => {
    expect(escapeText('a,b;c\\d\ne')).toBe('a\\,b\\;c\\\\d\\ne');
  });

  it('should unescape what it escaped', () => {
    expect(unescapeText('a\\,b\\;c\\\\d\\ne\\Nf')).toBe('a,b;c\\d\ne\nf');
  });

  it('should split on unescaped separators only', () => {
    expect(splitEscaped('a\\,b,c', ',')).toEqual(['a\\,b', 'c']);
    expect(splitEscaped(';;Main St', ';')).toEqual(['', '', 'Main St']);
  });
});

describe('parameter quoting', () => {
  it('should quote values with separators', () => {
    expect(quoteParamValue('a,b')).toBe('"a,b"');
    expect(quoteParamValue('home')).toBe('home');
  });

  it('should caret-encode double quotes', () => {
    expect(quoteParamValue('say "hi"')).toBe('"say ^\'hi^\'"');
    expect(unquoteParamValue('"say ^\'hi^\'"')).toBe('say "hi"');
  });

  it('should caret-encode every kind of line break', () => {
    expect(quoteParamValue('a\r\nb\rc\nd')).toBe('"a^nb^nc^nd"');
    expect(unquoteParamValue('"a^nb"')).toBe('a\nb');
  });
});

describe('line folding', () => {
  it('should fold lines longer than 75 octets', () => {
    const folded = foldLine('x'.repeat(80));
    expect(folded).toBe(`${'x'.repeat(75)}\r\n ${'x'.repeat(5)}`);
  });

  it('should not split multi-byte characters', () => {
    const folded = foldLine('ä'.repeat(40));
    expect(folded.split('\r\n ')).toEqual(['ä'.repeat(37), 'ä'.repeat(3)]);
  });

  it('should unfold continuation lines and keep line numbers', () => {
    expect(unfoldLines('A:1\r\n 23\r\nB:2\r\n')).toEqual([
      { line: 'A:123', number: 1 },
      { line: 'B:2', number: 3 },
    ]);
  });
});
