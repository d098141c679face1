import type { CountryCode } from 'libphonenumber-js';
import type { Contact } from './contact.js';
import { getFieldValue, isFieldName, FIELD_NAMES, type FieldName, type FieldValue } from './fields.js';
import { nationalDigits, normalizePhone } from './normalize.js';
import { ValidationError } from '../utils/errors.js';

/**
 * A predicate over contacts. `matchesText` runs on the raw vCard text
 * before parsing and must not reject anything `matches` would accept.
 */
export interface ContactFilter {
  matches(contact: Contact): boolean;
  matchesText(text: string): boolean;
  toString(): string;
}

/** Matches everything. */
export class AnyFilter implements ContactFilter {
  matches(): boolean {
    return true;
  }

  matchesText(): boolean {
    return true;
  }

  toString(): string {
    return 'ALL';
  }
}

/** Matches nothing. */
export class NullFilter implements ContactFilter {
  matches(): boolean {
    return false;
  }

  matchesText(): boolean {
    return false;
  }

  toString(): string {
    return 'NONE';
  }
}

/** Case-insensitive substring of the contact's display text. */
export class TermFilter implements ContactFilter {
  protected readonly term: string;

  constructor(term: string) {
    this.term = term.toLowerCase();
  }

  matches(contact: Contact): boolean {
    return this.matchesText(contact.pretty());
  }

  matchesText(text: string): boolean {
    return text.toLowerCase().includes(this.term);
  }

  toString(): string {
    return this.term;
  }
}

function isList(value: FieldValue): value is readonly FieldValue[] {
  return Array.isArray(value);
}

/** Substring of one field; for mappings both keys and values are searched. */
export class FieldFilter extends TermFilter {
  private readonly field: FieldName;

  constructor(field: string, term: string) {
    super(term);
    if (!isFieldName(field)) {
      throw new ValidationError(field, `Unknown field: ${field}. Known fields: ${FIELD_NAMES.join(', ')}`);
    }
    this.field = field;
  }

  matches(contact: Contact): boolean {
    return this.matchValue(getFieldValue(contact, this.field));
  }

  private matchValue(value: FieldValue): boolean {
    if (typeof value === 'string') return this.matchesText(value);
    if (isList(value)) return value.some(item => this.matchValue(item));
    return Object.entries(value).some(([key, entry]) => this.matchesText(key) || this.matchValue(entry));
  }

  toString(): string {
    return `${this.field}:${this.term}`;
  }
}

/** Any spelling of the name: both name orders, FN and nicknames. */
export class NameFilter extends TermFilter {
  private readonly fields: FieldFilter[];

  constructor(term: string) {
    super(term);
    this.fields = [new FieldFilter('formatted_name', term), new FieldFilter('nicknames', term)];
  }

  matches(contact: Contact): boolean {
    const { document } = contact;
    return (
      this.matchesText(document.firstNameLastName()) ||
      this.matchesText(document.lastNameFirstName()) ||
      this.fields.some(filter => filter.matches(contact))
    );
  }

  toString(): string {
    return `name:${this.term}`;
  }
}

/**
 * Phone numbers compared after normalisation, so that "+49 30 1234567"
 * matches "030/1234567" when the default country is Germany.
 */
export class PhoneFilter implements ContactFilter {
  private readonly normalized: string;
  private readonly digits: string;

  constructor(
    private readonly number: string,
    private readonly defaultCountry: CountryCode = 'US',
  ) {
    this.normalized = normalizePhone(number, defaultCountry);
    this.digits = nationalDigits(number, defaultCountry);
  }

  matches(contact: Contact): boolean {
    if (!this.digits) return false;
    return Object.values(contact.document.phoneNumbers).some(numbers => numbers.some(candidate => (
      normalizePhone(candidate, this.defaultCountry) === this.normalized ||
      nationalDigits(candidate, this.defaultCountry).includes(this.digits)
    )));
  }

  matchesText(text: string): boolean {
    return this.digits !== '' && text.replace(/\D/g, '').includes(this.digits);
  }

  toString(): string {
    return `phone:${this.number}`;
  }
}

/** All filters must match. */
export class AndFilter implements ContactFilter {
  readonly filters: readonly ContactFilter[];

  constructor(...filters: ContactFilter[]) {
    this.filters = filters;
  }

  matches(contact: Contact): boolean {
    return this.filters.every(filter => filter.matches(contact));
  }

  matchesText(text: string): boolean {
    return this.filters.every(filter => filter.matchesText(text));
  }

  toString(): string {
    return this.filters.map(String).join(' ');
  }
}

/** At least one filter must match. */
export class OrFilter implements ContactFilter {
  readonly filters: readonly ContactFilter[];

  constructor(...filters: ContactFilter[]) {
    this.filters = filters;
  }

  matches(contact: Contact): boolean {
    return this.filters.some(filter => filter.matches(contact));
  }

  matchesText(text: string): boolean {
    return this.filters.some(filter => filter.matchesText(text));
  }

  toString(): string {
    return this.filters.map(String).join(' | ');
  }
}

/** Combine with AND, dropping AnyFilters and short-circuiting on NullFilter. */
export function allOf(...filters: ContactFilter[]): ContactFilter {
  if (filters.some(filter => filter instanceof NullFilter)) return new NullFilter();
  const parts = filters
    .filter(filter => !(filter instanceof AnyFilter))
    .flatMap(filter => (filter instanceof AndFilter ? [...filter.filters] : [filter]));
  const [only] = parts;
  if (parts.length === 0 || !only) return new AnyFilter();
  return parts.length === 1 ? only : new AndFilter(...parts);
}

/** Combine with OR, dropping NullFilters and short-circuiting on AnyFilter. */
export function anyOf(...filters: ContactFilter[]): ContactFilter {
  if (filters.some(filter => filter instanceof AnyFilter)) return new AnyFilter();
  const parts = filters
    .filter(filter => !(filter instanceof NullFilter))
    .flatMap(filter => (filter instanceof OrFilter ? [...filter.filters] : [filter]));
  const [only] = parts;
  if (parts.length === 0 || !only) return new NullFilter();
  return parts.length === 1 ? only : new OrFilter(...parts);
}

/**
 * Parse a search term: `field:value`, `name:value`, `phone:value`, or a
 * plain term matched against the whole contact.
 */
export function parseFilter(query: string, defaultCountry?: CountryCode): ContactFilter {
  const colon = query.indexOf(':');
  if (colon > 0) {
    const field = query.slice(0, colon).toLowerCase();
    const term = query.slice(colon + 1);
    if (field === 'name') return new NameFilter(term);
    if (field === 'phone') return new PhoneFilter(term, defaultCountry);
    if (isFieldName(field)) return new FieldFilter(field, term);
  }
  return new TermFilter(query);
}
