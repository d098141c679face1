import type { ParamMap, VCardVersion } from '../types/vcard.js';
import { ValidationError } from '../utils/errors.js';

export type TypedField = 'phone' | 'email' | 'address';

/** TYPE values each vCard version defines for the typed fields. */
export const TYPE_VOCABULARY: Readonly<Record<VCardVersion, Readonly<Record<TypedField, readonly string[]>>>> = {
  '3.0': {
    phone: ['bbs', 'car', 'cell', 'fax', 'home', 'isdn', 'msg', 'modem', 'pager', 'pcs', 'video', 'voice', 'work'],
    email: ['home', 'internet', 'work', 'x400'],
    address: ['dom', 'intl', 'home', 'parcel', 'postal', 'work'],
  },
  '4.0': {
    phone: ['text', 'voice', 'fax', 'cell', 'video', 'pager', 'textphone', 'home', 'work'],
    email: ['home', 'internet', 'work'],
    address: ['home', 'work'],
  },
};

/** Type reported for an occurrence that carries none. */
export const DEFAULT_TYPES: Readonly<Record<TypedField, string>> = {
  phone: 'voice',
  email: 'internet',
  address: 'home',
};

/** Anything but 4.0 validates against the 3.0 vocabulary. */
export function vocabularyFor(field: TypedField, version: string): readonly string[] {
  return TYPE_VOCABULARY[version === '4.0' ? '4.0' : '3.0'][field];
}

export interface ParsedTypes {
  /** Tokens to write into the TYPE parameter, in input order without duplicates. */
  standardTypes: string[];
  /** Labels the vocabulary does not know; at most one can be stored. */
  customTypes: string[];
  /** Preference weight; 0 means not preferred. */
  pref: number;
}

const PREF_WEIGHT = /^pref=(\d{1,2})$/i;

/**
 * Sort type tokens into standard types, custom labels and a preference
 * weight. Custom labels are also kept in `standardTypes` as `X-` tokens so
 * clients that ignore labels still see a valid TYPE.
 */
export function parseTypes(types: readonly string[], vocabulary: readonly string[]): ParsedTypes {
  const standardTypes: string[] = [];
  const customTypes: string[] = [];
  let pref = 0;
  const pushStandard = (token: string) => {
    if (!standardTypes.includes(token)) standardTypes.push(token);
  };

  for (const raw of types) {
    const token = raw.trim();
    if (!token) continue;
    const lower = token.toLowerCase();
    const weight = PREF_WEIGHT.exec(token);
    if (vocabulary.includes(lower)) {
      pushStandard(token);
    } else if (lower === 'pref') {
      pref += 1;
    } else if (weight) {
      pref += Number.parseInt(weight[1] ?? '0', 10);
    } else if (lower.startsWith('x-')) {
      customTypes.push(token.slice(2));
      pushStandard(token);
    } else {
      customTypes.push(token);
      pushStandard(`X-${token}`);
    }
  }
  return { standardTypes, customTypes, pref };
}

/**
 * Reject type sets that cannot be stored: no type at all, or more than one
 * custom label.
 */
export function checkTypes(parsed: ParsedTypes, field: string, description: string, value: string): void {
  const { standardTypes, customTypes, pref } = parsed;
  if (standardTypes.length === 0 && customTypes.length === 0 && pref === 0) {
    throw new ValidationError(field, `Error: label for ${description} ${value} is missing.`);
  }
  if (customTypes.length > 1) {
    throw new ValidationError(
      field,
      `Error: ${description} ${value} got more than one custom label: ${customTypes.join(', ')}`,
    );
  }
}

/**
 * Recover the type list of a stored occurrence: its group label first, then
 * the TYPE tokens, then the preference. Falls back to the default type.
 */
export function typesOf(params: ParamMap, label: string, defaultType: string): string[] {
  const typeList: string[] = [];
  const customLabel = label.trim();
  if (customLabel) typeList.push(customLabel);

  const tokens = params.get('TYPE') ?? [];
  for (const raw of tokens) {
    const token = raw.trim();
    const lower = token.toLowerCase();
    if (!token || lower === 'pref') continue;
    if (!lower.startsWith('x-')) {
      typeList.push(token);
    } else if (!typeList.some(existing => existing.toLowerCase() === lower.slice(2))) {
      typeList.push(token.slice(2));
    }
  }

  const weight = params.get('PREF')?.[0]?.trim() ?? '';
  if (/^\d+$/.test(weight)) {
    typeList.push(`pref=${Number.parseInt(weight, 10)}`);
  } else if (tokens.some(token => token.trim().toLowerCase() === 'pref') && !typeList.includes('pref')) {
    typeList.push('pref');
  }

  return typeList.length > 0 ? typeList : [defaultType];
}

/** The key under which an occurrence is listed, e.g. "home, pref". */
export function typeKey(types: readonly string[]): string {
  return types.join(', ');
}
