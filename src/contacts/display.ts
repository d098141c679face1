import type { Labelled } from '../types/contact.js';
import { formatDisplayDate } from '../vcard/dates.js';
import { listToString } from '../vcard/field-codec.js';
import type { Contact } from './contact.js';

type DisplayItem = Labelled<string | readonly string[]> | readonly string[];
type DisplayValue = string | readonly DisplayItem[];

/** Indent continuation lines of values that span several lines or contain ": ". */
function indentMultiline(input: string | readonly string[], indentation: number): string {
  const text = typeof input === 'string' ? input : listToString(input, '');
  if (!text.includes('\n') && !text.includes(': ')) return text.trim();
  return ['', ...text.split('\n').map(line => ' '.repeat(indentation) + line.trim())].join('\n');
}

/**
 * Render one display entry. Single-element lists collapse into the header
 * line; labelled items become `- label: value`.
 */
export function displayLines(name: string, value: DisplayValue, indentation: number): string[] {
  const pad = ' '.repeat(indentation);
  let current: DisplayValue = value;
  if (typeof current !== 'string' && current.length === 1) {
    const [only] = current;
    if (typeof only === 'string') {
      current = only;
    } else if (only !== undefined && isStringList(only) && only.length === 1 && only[0] !== undefined) {
      current = only[0];
    }
  }
  if (typeof current === 'string') {
    return [`${pad}${name}: ${indentMultiline(current, indentation + 4)}`];
  }
  const lines = [`${pad}${name}: `];
  const itemPad = ' '.repeat(indentation + 4);
  for (const outer of current) {
    let item: DisplayItem = outer;
    if (isStringList(item) && item.length === 1 && item[0] !== undefined) item = item[0];
    if (typeof item === 'string') {
      lines.push(`${itemPad}- ${indentMultiline(item, indentation + 8)}`);
    } else if (isStringList(item)) {
      lines.push(`${itemPad}- `);
      for (const inner of item) {
        lines.push(`${' '.repeat(indentation + 8)}- ${indentMultiline(inner, indentation + 12)}`);
      }
    } else {
      lines.push(...displayLines(`- ${item.label}`, item.value, indentation + 4));
    }
  }
  return lines;
}

function isStringList(item: DisplayItem): item is readonly string[] {
  return Array.isArray(item);
}

function byLowerKey(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/** Human readable, read-only rendering of a contact. */
export function prettyContact(contact: Contact, verbose = true): string {
  const document = contact.document;
  const localize = contact.options.localizeDates;
  const strings: string[] = [`Name: ${document.formattedName}`];

  if (document.firstNames.length > 0 || document.lastNames.length > 0) {
    const names = [
      ...document.namePrefixes,
      ...document.firstNames,
      ...document.additionalNames,
      ...document.lastNames,
      ...document.nameSuffixes,
    ];
    strings.push(`Full name: ${names.join(' ')}`);
  }
  const organisations = document.organisations;
  if (organisations.length > 0) strings.push(...displayLines('Organisation', organisations, 0));

  if (verbose) strings.push(`Address book: ${contact.location?.addressBook ?? ''}`);
  strings.push(`Kind: ${document.kind}`);

  const { anniversary, birthday, nicknames, roles, titles } = document;
  if (birthday !== undefined || anniversary !== undefined || nicknames.length > 0 || roles.length > 0 || titles.length > 0) {
    strings.push('General:');
    if (anniversary) strings.push(`    Anniversary: ${formatDisplayDate(anniversary, localize)}`);
    if (birthday) strings.push(`    Birthday: ${formatDisplayDate(birthday, localize)}`);
    if (nicknames.length > 0) strings.push(...displayLines('Nickname', nicknames, 4));
    if (roles.length > 0) strings.push(...displayLines('Role', roles, 4));
    if (titles.length > 0) strings.push(...displayLines('Title', titles, 4));
  }

  const typedSections = [
    ['Phone', document.phoneNumbers],
    ['E-Mail', document.emails],
    ['Address', document.formattedPostAddresses()],
  ] as const;
  for (const [title, values] of typedSections) {
    const types = Object.keys(values).sort(byLowerKey);
    if (types.length === 0) continue;
    strings.push(title);
    for (const type of types) strings.push(...displayLines(type, values[type] ?? [], 4));
  }

  const privateObjects = document.privateObjects(contact.options.privateObjects);
  if (Object.keys(privateObjects).length > 0) {
    strings.push('Private:');
    for (const name of contact.options.privateObjects) {
      const values = privateObjects[name];
      if (values) strings.push(...displayLines(name, values, 4));
    }
  }

  const { categories, webpages, notes, uid } = document;
  if (categories.length > 0 || webpages.length > 0 || notes.length > 0 || (verbose && uid)) {
    strings.push('Miscellaneous');
    if (verbose && uid) strings.push(`    UID: ${uid}`);
    if (categories.length > 0) strings.push(...displayLines('Categories', categories, 4));
    if (webpages.length > 0) strings.push(...displayLines('Webpage', webpages, 4));
    if (notes.length > 0) strings.push(...displayLines('Note', notes, 4));
  }
  return `${strings.join('\n')}\n`;
}
