/** Escape a TEXT value or one component of a list or structured value (RFC 6350 §3.4). */
export function escapeText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/\r?\n/g, '\\n')
    .replace(/,/g, '\\,')
    .replace(/;/g, '\\;');
}

export function unescapeText(value: string): string {
  return value.replace(/\\([\\nN,;])/g, (_, c: string) => (c === 'n' || c === 'N' ? '\n' : c));
}

/** Split on an unescaped separator; the parts keep their escapes. */
export function splitEscaped(value: string, separator: ',' | ';'): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    if (ch === '\\' && i + 1 < value.length) {
      current += ch + value.charAt(i + 1);
      i++;
    } else if (ch === separator) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

/** Split on a separator outside double quotes. */
export function splitUnquoted(value: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const ch of value) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === separator && !inQuotes) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

/** Quote a parameter value when it holds separators; `"` and line breaks use RFC 6868 carets. */
export function quoteParamValue(value: string): string {
  const encoded = /["\r\n^]/.test(value)
    ? value.replace(/\^/g, '^^').replace(/\r\n?|\n/g, '^n').replace(/"/g, "^'")
    : value;
  return /[;:,]/.test(encoded) || encoded !== value ? `"${encoded}"` : encoded;
}

export function unquoteParamValue(value: string): string {
  const inner = value.length >= 2 && value.startsWith('"') && value.endsWith('"')
    ? value.slice(1, -1)
    : value;
  return inner.replace(/\^(\^|n|')/g, (_, c: string) => (c === 'n' ? '\n' : c === "'" ? '"' : '^'));
}

const MAX_LINE_OCTETS = 75;

function utf8Length(codePoint: number): number {
  if (codePoint > 0xffff) return 4;
  if (codePoint > 0x7ff) return 3;
  if (codePoint > 0x7f) return 2;
  return 1;
}

/** RFC 6350 line folding: lines longer than 75 octets are folded with CRLF + space. */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) return line;
  const result: string[] = [];
  let current = '';
  let octets = 0;
  let limit = MAX_LINE_OCTETS;
  // iterating by code point never splits a surrogate pair
  for (const ch of line) {
    const size = utf8Length(ch.codePointAt(0) ?? 0);
    if (octets + size > limit) {
      result.push(current);
      current = '';
      octets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += ch;
    octets += size;
  }
  if (current) result.push(current);
  return result.join('\r\n ');
}

/** Unfold continuation lines; keeps the line number each logical line started on. */
export function unfoldLines(text: string): { line: string; number: number }[] {
  const raw = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const result: { line: string; number: number }[] = [];
  raw.forEach((line, index) => {
    const last = result[result.length - 1];
    if ((line.startsWith(' ') || line.startsWith('\t')) && last) {
      last.line += line.slice(1);
    } else if (line.length > 0) {
      result.push({ line, number: index + 1 });
    }
  });
  return result;
}
