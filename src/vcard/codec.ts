/**
 * vCard 3.0 / 4.0 wire format (RFC 2426, RFC 6350).
 *
 * Decoding is strict: one BEGIN:VCARD … END:VCARD block whose content lines
 * all carry a valid `[group.]NAME` and a colon. Cards written by clients that
 * emit the broken `X-messaging/…-All` instant-messaging tags are repaired and
 * parsed once more before giving up.
 */

import type { ParamMap, Property, PropertyValue } from '../types/vcard.js';
import { DEFAULT_VERSION, listValue, structuredValue, textValue } from '../types/vcard.js';
import { VCardParseError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  escapeText, foldLine, quoteParamValue, splitEscaped, splitUnquoted, unescapeText, unfoldLines,
  unquoteParamValue,
} from './escape.js';
import { Field, SINGLETON_FIELDS, VCardDocument } from './document.js';

export interface DecodeOptions {
  /** Version assumed when the card has no VERSION line. */
  fallbackVersion?: string;
}

/** Number of components of the structured fields. */
const STRUCTURED_FIELDS: Readonly<Record<string, number>> = { N: 5, ADR: 7 };

/** Separator of the list-valued fields. */
const LIST_FIELDS: Readonly<Record<string, ',' | ';'>> = { ORG: ';', CATEGORIES: ',' };

/** Standard fields whose value is escaped text; every X- field is treated the same way. */
const TEXT_FIELDS: ReadonlySet<string> = new Set([
  'FN', 'NOTE', 'TITLE', 'ROLE', 'NICKNAME', 'EMAIL', 'BDAY', 'ANNIVERSARY',
]);

const NAME_TOKEN = /^(?:([A-Za-z0-9-]+)\.)?([A-Za-z0-9-]+)$/;
const PARAM_NAME = /^[A-Za-z0-9-]+$/;

/** Vendor tags some clients write instead of the X- instant-messaging fields. */
const MESSENGER_REPAIRS: readonly (readonly [string, string])[] = [
  ['aim', 'X-AIM'],
  ['gadu', 'X-GADUGADU'],
  ['groupwise', 'X-GROUPWISE'],
  ['icq', 'X-ICQ'],
  ['xmpp', 'X-JABBER'],
  ['msn', 'X-MSN'],
  ['yahoo', 'X-YAHOO'],
  ['skype', 'X-SKYPE'],
  ['irc', 'X-IRC'],
  ['sip', 'X-SIP'],
];

function isTextField(name: string): boolean {
  return TEXT_FIELDS.has(name) || name.startsWith('X-');
}

function decodeValue(name: string, raw: string): PropertyValue {
  const components = STRUCTURED_FIELDS[name];
  if (components !== undefined) {
    const parts = splitEscaped(raw, ';').map(part => splitEscaped(part, ',').map(unescapeText));
    while (parts.length < components) parts.push(['']);
    return structuredValue(parts);
  }
  const separator = LIST_FIELDS[name];
  if (separator !== undefined) {
    return listValue(splitEscaped(raw, separator).map(unescapeText));
  }
  return textValue(isTextField(name) ? unescapeText(raw) : raw);
}

function encodeValue(name: string, value: PropertyValue): string {
  switch (value.kind) {
    case 'structured':
      return value.parts.map(part => part.map(escapeText).join(',')).join(';');
    case 'list':
      return value.items.map(escapeText).join(LIST_FIELDS[name] ?? ',');
    case 'text':
      return isTextField(name) ? escapeText(value.text) : value.text;
  }
}

/** Index of the first colon outside a quoted parameter value. */
function valueSeparator(line: string): number {
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (ch === '"') inQuotes = !inQuotes;
    else if (ch === ':' && !inQuotes) return i;
  }
  return -1;
}

function parseParams(tokens: readonly string[], number: number): ParamMap {
  const params: ParamMap = new Map();
  const append = (name: string, values: string[]) => {
    params.set(name, [...(params.get(name) ?? []), ...values]);
  };
  for (const token of tokens) {
    if (!token.trim()) continue;
    const eq = token.indexOf('=');
    if (eq === -1) {
      // vCard 2.1 style bare type, e.g. TEL;HOME:…
      if (!PARAM_NAME.test(token.trim())) {
        throw new VCardParseError(`invalid parameter "${token}"`, number);
      }
      append('TYPE', [token.trim()]);
      continue;
    }
    const name = token.slice(0, eq).trim();
    if (!PARAM_NAME.test(name)) {
      throw new VCardParseError(`invalid parameter name "${name}"`, number);
    }
    const values = splitUnquoted(token.slice(eq + 1), ',').map(value => unquoteParamValue(value.trim()));
    append(name.toUpperCase(), values);
  }
  return params;
}

function parseContentLine(line: string, number: number): Property {
  const colon = valueSeparator(line);
  if (colon === -1) {
    throw new VCardParseError(`content line without value: ${line.slice(0, 40)}`, number);
  }
  const [nameToken = '', ...paramTokens] = splitUnquoted(line.slice(0, colon), ';');
  const match = NAME_TOKEN.exec(nameToken.trim());
  const name = match?.[2];
  if (!match || name === undefined) {
    throw new VCardParseError(`invalid property name "${nameToken}"`, number);
  }
  const upper = name.toUpperCase();
  const group = match[1];
  const params = parseParams(paramTokens, number);
  const value = decodeValue(upper, line.slice(colon + 1));
  return group === undefined ? { name: upper, params, value } : { group, name: upper, params, value };
}

function isMarker(line: string, marker: 'BEGIN' | 'END'): boolean {
  return new RegExp(`^${marker}:VCARD\\s*$`, 'i').test(line);
}

/** Parse exactly one card; throws on the first malformed line. */
function parseStrict(text: string): Property[] {
  const lines = unfoldLines(text.replace(/^\uFEFF/, ''));
  const [first] = lines;
  if (!first || !isMarker(first.line, 'BEGIN')) {
    throw new VCardParseError('missing BEGIN:VCARD', first?.number);
  }
  const properties: Property[] = [];
  for (const { line, number } of lines.slice(1)) {
    if (isMarker(line, 'END')) {
      const trailing = lines.find(entry => entry.number > number);
      if (trailing) throw new VCardParseError('unexpected content after END:VCARD', trailing.number);
      return properties;
    }
    if (isMarker(line, 'BEGIN')) {
      throw new VCardParseError('nested vCard objects are not supported', number);
    }
    properties.push(parseContentLine(line, number));
  }
  throw new VCardParseError('missing END:VCARD');
}

/** Rewrite the known broken instant-messaging tags. */
export function repairVCard(text: string): string {
  return MESSENGER_REPAIRS.reduce(
    (result, [service, field]) => result.replace(new RegExp(`X-messaging/${service}-All`, 'gi'), field),
    text,
  );
}

/** Drop every occurrence of a singleton field after its first. */
function dropDuplicateSingletons(properties: readonly Property[]): Property[] {
  const seen = new Set<string>();
  return properties.filter(prop => {
    if (!SINGLETON_FIELDS.includes(prop.name)) return true;
    if (seen.has(prop.name)) {
      logger.debug(`Dropping duplicate ${prop.name} field`);
      return false;
    }
    seen.add(prop.name);
    return true;
  });
}

export function decodeVCard(text: string, options: DecodeOptions = {}): VCardDocument {
  let properties: Property[];
  try {
    properties = parseStrict(text);
  } catch (error) {
    if (!(error instanceof VCardParseError)) throw error;
    const repaired = repairVCard(text);
    if (repaired === text) throw error;
    logger.debug(`Retrying vCard parse after repairing messenger fields: ${error.message}`);
    properties = parseStrict(repaired);
  }
  return new VCardDocument(dropDuplicateSingletons(properties), options.fallbackVersion ?? DEFAULT_VERSION);
}

function encodeParams(params: ParamMap): string {
  let result = '';
  for (const [name, values] of params) {
    result += `;${name}`;
    if (values.length > 0) result += `=${values.map(quoteParamValue).join(',')}`;
  }
  return result;
}

function encodeProperty(prop: Property): string {
  const group = prop.group ? `${prop.group}.` : '';
  return `${group}${prop.name}${encodeParams(prop.params)}:${encodeValue(prop.name, prop.value)}`;
}

/**
 * Serialize with CRLF line endings and folded lines: VERSION first, the
 * other fields in insertion order, each singleton once.
 */
export function encodeVCard(document: VCardDocument): string {
  const lines = ['BEGIN:VCARD', `${Field.Version}:${document.version}`];
  const seen = new Set<string>();
  for (const prop of document.properties) {
    if (prop.name === Field.Version) continue;
    if (SINGLETON_FIELDS.includes(prop.name)) {
      if (seen.has(prop.name)) continue;
      seen.add(prop.name);
    }
    lines.push(encodeProperty(prop));
  }
  lines.push('END:VCARD');
  return `${lines.map(foldLine).join('\r\n')}\r\n`;
}
