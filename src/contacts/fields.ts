import type { DateValue, Labelled, PostAddress, TypedValues } from '../types/contact.js';
import { POST_ADDRESS_FIELDS, isLabelled } from '../types/contact.js';
import { formatDisplayDate } from '../vcard/dates.js';
import { ValidationError } from '../utils/errors.js';
import type { Contact } from './contact.js';

/** A field value as it is walked by a dotted path. */
export type FieldValue = string | readonly FieldValue[] | { readonly [key: string]: FieldValue };

export interface FieldContext {
  /** Type preference for the `phone` column, most preferred first. */
  preferredPhoneNumberType: readonly string[];
  preferredEmailAddressType: readonly string[];
}

const DEFAULT_CONTEXT: FieldContext = {
  preferredPhoneNumberType: ['pref'],
  preferredEmailAddressType: ['pref'],
};

function byLower(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * The entry shown in list views for a typed field: the first value of the
 * first type (alphabetically) matching the most preferred label, falling
 * back to types containing "pref" and then to all types.
 */
export function formatLabelledField(field: TypedValues<string>, preferred: readonly string[]): string {
  const types = Object.keys(field);
  if (types.length === 0) return '';
  let keys: string[] = [];
  for (const pref of preferred) {
    keys = types.filter(type => type.toLowerCase().includes(pref.toLowerCase()));
    if (keys.length > 0) break;
  }
  if (keys.length === 0) {
    const preferredTypes = types.filter(type => type.toLowerCase().includes('pref'));
    keys = preferredTypes.length > 0 ? preferredTypes : types;
  }
  const [firstKey = ''] = [...keys].sort(byLower);
  const [firstValue = ''] = [...(field[firstKey] ?? [])].sort();
  return `${firstKey}: ${firstValue}`;
}

function labelledValues<T>(items: readonly Labelled<T>[], convert: (value: T) => FieldValue): FieldValue {
  return items.map(item => (isLabelled(item) ? { [item.label]: convert(item.value) } : convert(item)));
}

function typedValues<T>(values: TypedValues<T>, convert: (value: T) => FieldValue): FieldValue {
  return Object.fromEntries(
    Object.entries(values).map(([type, list]): [string, FieldValue] => [type, list.map(convert)]),
  );
}

function address(value: PostAddress): FieldValue {
  return Object.fromEntries(POST_ADDRESS_FIELDS.map((field): [string, FieldValue] => [field, value[field]]));
}

function date(value: DateValue | undefined, contact: Contact): FieldValue {
  return formatDisplayDate(value, contact.options.localizeDates);
}

type Accessor = (contact: Contact, context: FieldContext) => FieldValue;

/** Every field a list or show view can ask for. */
const ACCESSORS = {
  name: contact => contact.document.formattedName,
  formatted_name: contact => contact.document.formattedName,
  first_name: contact => contact.document.firstName,
  last_name: contact => contact.document.lastName,
  first_name_last_name: contact => contact.document.firstNameLastName(),
  last_name_first_name: contact => contact.document.lastNameFirstName(),
  uid: contact => contact.uid,
  version: contact => contact.version,
  kind: contact => contact.document.kind,
  address_book: contact => contact.location?.addressBook ?? '',
  nicknames: contact => labelledValues(contact.document.nicknames, value => value),
  organisations: contact => labelledValues(contact.document.organisations, value => value),
  titles: contact => labelledValues(contact.document.titles, value => value),
  roles: contact => labelledValues(contact.document.roles, value => value),
  notes: contact => labelledValues(contact.document.notes, value => value),
  webpages: contact => labelledValues(contact.document.webpages, value => value),
  categories: contact => contact.document.categories,
  phone: (contact, context) => formatLabelledField(contact.document.phoneNumbers, context.preferredPhoneNumberType),
  email: (contact, context) => formatLabelledField(contact.document.emails, context.preferredEmailAddressType),
  phone_numbers: contact => typedValues(contact.document.phoneNumbers, value => value),
  emails: contact => typedValues(contact.document.emails, value => value),
  post_addresses: contact => typedValues(contact.document.postAddresses, address),
  formatted_post_addresses: contact => typedValues(contact.document.formattedPostAddresses(), value => value),
  birthday: contact => date(contact.document.birthday, contact),
  anniversary: contact => date(contact.document.anniversary, contact),
  private_objects: contact => {
    const objects = contact.document.privateObjects(contact.options.privateObjects);
    return Object.fromEntries(
      Object.entries(objects).map(([name, values]): [string, FieldValue] => [name, labelledValues(values, value => value)]),
    );
  },
} satisfies Record<string, Accessor>;

export type FieldName = keyof typeof ACCESSORS;

export const FIELD_NAMES = Object.keys(ACCESSORS).filter(isFieldName);

export function isFieldName(name: string): name is FieldName {
  return Object.prototype.hasOwnProperty.call(ACCESSORS, name);
}

function isList(value: FieldValue): value is readonly FieldValue[] {
  return Array.isArray(value);
}

function step(value: FieldValue, segment: string): FieldValue {
  if (typeof value === 'string') return '';
  if (isList(value)) {
    const index = /^\d+$/.test(segment) ? Number(segment) : Number.NaN;
    return value[index] ?? '';
  }
  return value[segment] ?? '';
}

/** Flatten a value for a table cell. */
export function renderFieldValue(value: FieldValue): string {
  if (typeof value === 'string') return value;
  if (isList(value)) return value.map(renderFieldValue).join(', ');
  return Object.entries(value)
    .map(([key, entry]) => `${key}: ${renderFieldValue(entry)}`)
    .join(', ');
}

/**
 * Look up a field by dotted path, e.g. `emails.home.0` or `birthday`.
 * Unknown field names are rejected; unknown keys below them yield "".
 */
export function getFieldValue(contact: Contact, path: string, context: FieldContext = DEFAULT_CONTEXT): FieldValue {
  const [name = '', ...rest] = path.split('.');
  const field = name.toLowerCase().replace(/ /g, '_');
  if (!isFieldName(field)) {
    throw new ValidationError(path, `Unknown field: ${name}. Known fields: ${FIELD_NAMES.join(', ')}`);
  }
  const accessor: Accessor = ACCESSORS[field];
  return rest.reduce(step, accessor(contact, context));
}

export function getField(contact: Contact, path: string, context: FieldContext = DEFAULT_CONTEXT): string {
  return renderFieldValue(getFieldValue(contact, path, context));
}
