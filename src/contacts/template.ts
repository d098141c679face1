import type { DateValue, Labelled, PostAddress, StrList, TypedValues } from '../types/contact.js';
import { isLabelled } from '../types/contact.js';
import type { VCardDocument } from '../vcard/document.js';
import { formatTemplateDate } from '../vcard/dates.js';
import { ADDRESS_KEYS, CanonicalKey } from './structured-text.js';

/** A value of the editable form: a scalar, a list or a mapping. */
export type TemplateNode = string | readonly TemplateNode[] | { readonly [key: string]: TemplateNode };

type Entry = readonly [string, TemplateNode];

export interface TemplateOptions {
  privateObjects: readonly string[];
}

const INDENT = 4;

const PLAIN_UNSAFE_START = /^[-?:,[\]{}#&*!|>'"%@`\s]/;
const CONTROL = /[\u0000-\u0008\u000b-\u001f\u007f]/;

/** Render a single-line scalar, quoting it when a plain scalar would read back differently. */
export function formatScalar(value: string): string {
  if (CONTROL.test(value) || value.includes('\n') || value.includes('\t')) return JSON.stringify(value);
  if (value === '') return "''";
  if (
    PLAIN_UNSAFE_START.test(value) ||
    /\s$/.test(value) ||
    value.includes(': ') ||
    value.includes(' #') ||
    value.endsWith(':')
  ) {
    return `'${value.replace(/'/g, "''")}'`;
  }
  return value;
}

/** Multi-line text that a `|-` literal block reproduces exactly. */
function fitsLiteralBlock(value: string): boolean {
  return (
    value.includes('\n') &&
    !CONTROL.test(value) &&
    !/^\s/.test(value) &&
    !/\s$/.test(value) &&
    !value.split('\n').some(line => line.length > 0 && line.trim() === '')
  );
}

function isList(node: TemplateNode): node is readonly TemplateNode[] {
  return Array.isArray(node);
}

function entry(key: string, value: TemplateNode): Entry {
  return [key, value];
}

function pad(indent: number): string {
  return ' '.repeat(indent);
}

function emitText(head: string, value: string, contentIndent: number, lines: string[]): void {
  if (!fitsLiteralBlock(value)) {
    lines.push(`${head} ${formatScalar(value)}`);
    return;
  }
  lines.push(`${head} |-`);
  for (const line of value.split('\n')) lines.push(line ? pad(contentIndent) + line : '');
}

function emitValue(head: string, value: TemplateNode, keyIndent: number, lines: string[]): void {
  if (value === '' || (isList(value) && value.length === 0)) {
    lines.push(head);
  } else if (typeof value === 'string') {
    emitText(head, value, keyIndent + INDENT, lines);
  } else if (isList(value)) {
    lines.push(head);
    emitSequence(value, keyIndent + INDENT, lines);
  } else {
    lines.push(head);
    emitMapping(Object.entries(value), keyIndent + INDENT, lines);
  }
}

function emitSequence(items: readonly TemplateNode[], indent: number, lines: string[]): void {
  for (const item of items) {
    if (typeof item === 'string') {
      emitText(`${pad(indent)}-`, item, indent + INDENT, lines);
    } else if (isList(item)) {
      lines.push(`${pad(indent)}-`);
      emitSequence(item, indent + INDENT, lines);
    } else {
      emitMapping(Object.entries(item), indent + 2, lines, true);
    }
  }
}

/** Keys padded to the longest key, so the colons line up. */
function emitMapping(entries: readonly Entry[], indent: number, lines: string[], inSequence = false): void {
  const keys = entries.map(([key]) => formatScalar(key));
  const width = Math.max(0, ...keys.map(key => key.length));
  entries.forEach(([, value], index) => {
    const lead = inSequence && index === 0 ? `${pad(indent - 2)}- ` : pad(indent);
    emitValue(`${lead}${(keys[index] ?? '').padEnd(width)} :`, value, indent, lines);
  });
}

/** A one-element list becomes its element. */
function collapse(values: readonly TemplateNode[]): TemplateNode {
  const [first] = values;
  return values.length === 1 && typeof first === 'string' ? first : values;
}

function strList(value: StrList): TemplateNode {
  return typeof value === 'string' ? value : collapse(value);
}

function labelled<T>(item: Labelled<T>, convert: (value: T) => TemplateNode): TemplateNode {
  return isLabelled(item) ? { [item.label]: convert(item.value) } : convert(item);
}

function labelledList<T>(items: readonly Labelled<T>[], convert: (value: T) => TemplateNode): TemplateNode {
  return collapse(items.map(item => labelled(item, convert)));
}

function typed<T>(values: TypedValues<T>, defaults: readonly string[], convert: (value: T) => TemplateNode, empty: TemplateNode): TemplateNode {
  const types = Object.keys(values).sort((a, b) => {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    if (left === right) return 0;
    return left < right ? -1 : 1;
  });
  if (types.length === 0) return Object.fromEntries(defaults.map(type => entry(type, empty)));
  return Object.fromEntries(types.map(type => entry(type, collapse((values[type] ?? []).map(convert)))));
}

function addressNode(address: PostAddress): TemplateNode {
  return Object.fromEntries(ADDRESS_KEYS.map(([key, field]) => entry(key, strList(address[field]))));
}

function dateNode(date: DateValue | undefined, version: string): TemplateNode {
  if (date === undefined) return '';
  return typeof date === 'string' ? `text= ${date}` : formatTemplateDate(date, version);
}

/**
 * Categories keep one nested list per CATEGORIES line when there are
 * several, so that the lines are split the same way when read back.
 */
function categoriesNode(categories: readonly (readonly string[])[]): TemplateNode {
  const [only] = categories;
  if (categories.length === 1 && only) return collapse(only);
  return categories.map(group => [...group]);
}

/** Render the document as the editable form read back by parseStructuredText. */
export function toTemplate(document: VCardDocument, options: TemplateOptions): string {
  const emptyAddress = Object.fromEntries(ADDRESS_KEYS.map(([key]) => entry(key, '')));
  const sections: (readonly [string, readonly Entry[]])[] = [
    ['name', [
      [CanonicalKey.FormattedName, document.formattedName],
      [CanonicalKey.Prefix, collapse(document.namePrefixes)],
      [CanonicalKey.FirstName, collapse(document.firstNames)],
      [CanonicalKey.Additional, collapse(document.additionalNames)],
      [CanonicalKey.LastName, collapse(document.lastNames)],
      [CanonicalKey.Suffix, collapse(document.nameSuffixes)],
      [CanonicalKey.Nickname, labelledList(document.nicknames, value => value)],
    ]],
    ['organisation, title and role', [
      [CanonicalKey.Organisation, labelledList(document.organisations, collapse)],
      [CanonicalKey.Title, labelledList(document.titles, value => value)],
      [CanonicalKey.Role, labelledList(document.roles, value => value)],
    ]],
    ['phone numbers by type, e.g. "home, pref" or a custom label', [
      [CanonicalKey.Phone, typed(document.phoneNumbers, ['cell', 'home'], value => value, '')],
    ]],
    ['email addresses by type', [
      [CanonicalKey.Email, typed(document.emails, ['home', 'work'], value => value, '')],
    ]],
    ['post addresses by type', [
      [CanonicalKey.Address, typed(document.postAddresses, ['home'], addressNode, emptyAddress)],
    ]],
  ];
  if (options.privateObjects.length > 0) {
    const privateObjects = document.privateObjects(options.privateObjects);
    sections.push(['private objects', [
      [CanonicalKey.Private, Object.fromEntries(options.privateObjects.map(name => entry(
        name,
        labelledList(privateObjects[name] ?? [], value => value),
      )))],
    ]]);
  }
  sections.push(
    ['dates: yyyy-mm-dd, yyyy-mm-ddTHH:MM:SS; vCard 4.0 also --mm-dd and text= <free text>', [
      [CanonicalKey.Anniversary, dateNode(document.anniversary, document.version)],
      [CanonicalKey.Birthday, dateNode(document.birthday, document.version)],
    ]],
    ['categories', [[CanonicalKey.Categories, categoriesNode(document.categories)]]],
    ['note', [[CanonicalKey.Note, labelledList(document.notes, value => value)]]],
    ['webpages', [[CanonicalKey.Webpage, labelledList(document.webpages, value => value)]]],
  );

  const lines: string[] = [];
  sections.forEach(([comment, entries], index) => {
    if (index > 0) lines.push('');
    lines.push(`# ${comment}`);
    emitMapping(entries, 0, lines);
  });
  return `${lines.join('\n')}\n`;
}
