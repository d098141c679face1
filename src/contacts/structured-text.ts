import { parse, YAMLParseError } from 'yaml';
import type { CanonicalDict, DateValue } from '../types/contact.js';
import { VCardDocument, Field, type FieldInput } from '../vcard/document.js';
import { parseDate } from '../vcard/dates.js';
import { ValidationError } from '../utils/errors.js';

/** Canonical keys of the editable contact form. */
export const CanonicalKey = {
  FormattedName: 'Formatted name',
  Prefix: 'Prefix',
  FirstName: 'First name',
  Additional: 'Additional',
  LastName: 'Last name',
  Suffix: 'Suffix',
  Nickname: 'Nickname',
  Organisation: 'Organisation',
  Title: 'Title',
  Role: 'Role',
  Phone: 'Phone',
  Email: 'Email',
  Address: 'Address',
  Private: 'Private',
  Anniversary: 'Anniversary',
  Birthday: 'Birthday',
  Categories: 'Categories',
  Note: 'Note',
  Webpage: 'Webpage',
} as const;

/** Address component keys in form order, with the field each fills. */
export const ADDRESS_KEYS = [
  ['Box', 'box'],
  ['Extended', 'extended'],
  ['Street', 'street'],
  ['Code', 'code'],
  ['City', 'city'],
  ['Region', 'region'],
  ['Country', 'country'],
] as const;

export interface UpdateOptions {
  privateObjects: readonly string[];
}

type Mapping = Readonly<Record<string, unknown>>;

function isMapping(value: unknown): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Empty strings, lists and mappings count as absent, like a blank form field. */
function isBlank(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  return isMapping(value) && Object.keys(value).length === 0;
}

/** Replace the nulls of empty YAML nodes with empty strings. */
function fromYaml(value: unknown): unknown {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.map(fromYaml);
  if (isMapping(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]): [string, unknown] => [key, fromYaml(entry)]));
  }
  return value;
}

/**
 * Parse the editable form into a canonical dict. Every scalar stays a
 * string so numbers like 0123 keep their leading zero.
 */
export function parseStructuredText(text: string): CanonicalDict {
  let data: unknown;
  try {
    data = parse(text, { schema: 'failsafe', uniqueKeys: true });
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ValidationError('contact', error.message);
    }
    throw error;
  }
  const contact = fromYaml(data);
  if (!isMapping(contact) || isBlank(contact)) {
    throw new ValidationError('contact', 'Error: Found no contact information');
  }
  return contact;
}

/** One labelled-field input item, as accepted by the document adders. */
function asFieldInput(key: string, value: unknown): FieldInput {
  if (typeof value === 'string' || Array.isArray(value) || isMapping(value)) return value;
  throw new ValidationError(key, `${key} must be a string or a list of strings`);
}

function setStringList(data: CanonicalDict, key: string, add: (value: FieldInput) => void): void {
  const value = data[key];
  if (isBlank(value)) return;
  if (typeof value === 'string') {
    add(value);
  } else if (Array.isArray(value)) {
    for (const item of value) {
      if (!isBlank(item)) add(asFieldInput(key, item));
    }
  } else {
    throw new ValidationError(key, `${key} must be a string or a list of strings`);
  }
}

function setTyped(
  data: CanonicalDict,
  key: string,
  description: string,
  noun: string,
  add: (type: string, value: unknown) => void,
): void {
  const section = data[key];
  if (isBlank(section)) return;
  if (!isMapping(section)) {
    throw new ValidationError(key, `Error: missing type value for ${description} field`);
  }
  for (const [type, entries] of Object.entries(section)) {
    const list = typeof entries === 'string' ? [entries] : entries;
    if (!Array.isArray(list)) {
      throw new ValidationError(key, `Error: got no ${noun} or list of ${noun}s for the ${description} type ${type}`);
    }
    for (const entry of list) {
      if (!isBlank(entry)) add(type, entry);
    }
  }
}

function requireString(key: string, value: unknown, description: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(key, `Error: ${description} must be a string.`);
  }
  return value;
}

function setAddresses(document: VCardDocument, data: CanonicalDict): void {
  const section = data[CanonicalKey.Address];
  if (isBlank(section)) return;
  if (!isMapping(section)) {
    throw new ValidationError(CanonicalKey.Address, 'Error: missing type value for post address field');
  }
  for (const [type, entries] of Object.entries(section)) {
    const list = isMapping(entries) ? [entries] : entries;
    if (!Array.isArray(list)) {
      throw new ValidationError(CanonicalKey.Address, `Error: got no address or list of addresses for the post address type ${type}`);
    }
    for (const entry of list) {
      if (!isMapping(entry)) {
        throw new ValidationError(CanonicalKey.Address, `Error: one of the ${type} type address list items does not contain an address`);
      }
      if (ADDRESS_KEYS.every(([name]) => isBlank(entry[name]))) continue;
      const address = Object.fromEntries(ADDRESS_KEYS.map(([name, field]): [string, unknown] => [field, entry[name] ?? '']));
      document.addPostAddress(type, address);
    }
  }
}

function setCategories(document: VCardDocument, data: CanonicalDict): void {
  const categories = data[CanonicalKey.Categories];
  if (isBlank(categories)) return;
  if (typeof categories === 'string') {
    document.addCategory([categories]);
  } else if (Array.isArray(categories)) {
    // a flat list is one CATEGORIES line; nested lists are one line each
    if (categories.every(item => typeof item === 'string')) {
      document.addCategory(categories);
      return;
    }
    for (const item of categories) {
      if (isBlank(item)) continue;
      document.addCategory(typeof item === 'string' ? [item] : item);
    }
  } else {
    throw new ValidationError(CanonicalKey.Categories, 'Error: category must be a string or a list of strings');
  }
}

function parseFormDate(document: VCardDocument, key: string, value: string): DateValue | undefined {
  if (/^text\s*=.*$/s.test(value)) {
    if (document.version !== '4.0') {
      throw new ValidationError(key, `Error: Free text format for ${key.toLowerCase()} only usable with vcard version 4.0.`);
    }
    const text = value.split(/text\s*=/).map(part => part.trim()).filter(Boolean).join(', ');
    return text || undefined;
  }
  if (/^--\d\d-?\d\d$/.test(value) && document.version !== '4.0') {
    throw new ValidationError(
      key,
      `Error: ${key} format --mm-dd and --mmdd only usable with vcard version 4.0. You may use 1900 as placeholder, if the year is unknown.`,
    );
  }
  const date = parseDate(value);
  if (!date) {
    throw new ValidationError(
      key,
      `Error: Wrong ${key.toLowerCase()} format or invalid date\nUse format yyyy-mm-dd or yyyy-mm-ddTHH:MM:SS`,
    );
  }
  return date;
}

function setDate(document: VCardDocument, data: CanonicalDict, key: string, assign: (date: DateValue) => void): void {
  const value = data[key];
  if (isBlank(value)) return;
  const date = parseFormDate(document, key, requireString(key, value, key));
  if (date !== undefined) assign(date);
}

function setPrivateObjects(document: VCardDocument, data: CanonicalDict, supported: readonly string[]): void {
  const section = data[CanonicalKey.Private];
  if (isBlank(section)) return;
  if (!isMapping(section)) {
    throw new ValidationError(CanonicalKey.Private, 'Error: private objects must consist of a key : value pair.');
  }
  for (const [key, entries] of Object.entries(section)) {
    if (!supported.includes(key)) {
      throw new ValidationError(
        CanonicalKey.Private,
        `Error: private object key ${key} was changed.\nSupported private keys: ${supported.join(', ')}`,
      );
    }
    const list = typeof entries === 'string' ? [entries] : entries;
    if (!Array.isArray(list)) {
      throw new ValidationError(CanonicalKey.Private, `Error: got no value or list of values for the private object ${key}`);
    }
    for (const entry of list) {
      if (!isBlank(entry)) document.addPrivateObject(key, asFieldInput(key, entry));
    }
  }
}

/**
 * Replace every field category of the document with the dict's content.
 * The update runs on a copy, so a rejected dict leaves the input untouched.
 */
export function applyUpdate(source: VCardDocument, data: CanonicalDict, options: UpdateOptions): VCardDocument {
  if (isBlank(data[CanonicalKey.FirstName]) && isBlank(data[CanonicalKey.LastName]) && isBlank(data[CanonicalKey.Organisation])) {
    throw new ValidationError('contact', 'Error: You must either enter a name or an organisation');
  }
  const document = source.clone();
  document.updateRevision();

  document.deleteField(Field.Name);
  document.addName(
    data[CanonicalKey.Prefix] ?? '',
    data[CanonicalKey.FirstName] ?? '',
    data[CanonicalKey.Additional] ?? '',
    data[CanonicalKey.LastName] ?? '',
    data[CanonicalKey.Suffix] ?? '',
  );
  if (CanonicalKey.FormattedName in data) {
    document.formattedName = requireString(CanonicalKey.FormattedName, data[CanonicalKey.FormattedName], 'Formatted name');
  }
  if (!document.formattedName) document.formattedName = '';

  document.deleteField(Field.Nickname);
  setStringList(data, CanonicalKey.Nickname, value => document.addNickname(value));

  document.deleteField(Field.Organisation);
  document.deleteField(Field.ShowAs);
  setStringList(data, CanonicalKey.Organisation, value => document.addOrganisation(value));

  document.deleteField(Field.Role);
  setStringList(data, CanonicalKey.Role, value => document.addRole(value));

  document.deleteField(Field.Title);
  setStringList(data, CanonicalKey.Title, value => document.addTitle(value));

  document.deleteField(Field.Phone);
  setTyped(data, CanonicalKey.Phone, 'phone number', 'number', (type, number) => {
    document.addPhoneNumber(type, requireString(CanonicalKey.Phone, number, 'phone number'));
  });

  document.deleteField(Field.Email);
  setTyped(data, CanonicalKey.Email, 'email address', 'email', (type, email) => {
    document.addEmail(type, requireString(CanonicalKey.Email, email, 'email address'));
  });

  document.deleteField(Field.Address);
  setAddresses(document, data);

  document.deleteField(Field.Categories);
  setCategories(document, data);

  document.deleteField(Field.Url);
  setStringList(data, CanonicalKey.Webpage, value => document.addWebpage(value));

  document.deleteField(Field.Anniversary);
  document.deleteField(Field.LegacyAnniversary);
  setDate(document, data, CanonicalKey.Anniversary, date => {
    document.anniversary = date;
  });

  document.deleteField(Field.Birthday);
  setDate(document, data, CanonicalKey.Birthday, date => {
    document.birthday = date;
  });

  for (const name of options.privateObjects) document.deleteField(`X-${name.toUpperCase()}`);
  setPrivateObjects(document, data, options.privateObjects);

  document.deleteField(Field.Note);
  setStringList(data, CanonicalKey.Note, value => document.addNote(value));

  return document;
}
