import type { ParamMap, Property, PropertyValue } from '../types/vcard.js';
import { DEFAULT_VERSION, isSupportedVersion, listValue, structuredValue, textValue } from '../types/vcard.js';
import type { DateValue, Labelled, PostAddress, StrList, TypedValues } from '../types/contact.js';
import { isLabelled } from '../types/contact.js';
import { logger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { FieldShape, listToString, normalizeField, stringToList } from './field-codec.js';
import {
  DEFAULT_TYPES, checkTypes, parseTypes, typeKey, typesOf, vocabularyFor, type TypedField,
} from './type-label.js';
import { formatVCardDate, parseDate } from './dates.js';

/** Property names the document has typed accessors for. */
export const Field = {
  Version: 'VERSION',
  Uid: 'UID',
  FormattedName: 'FN',
  Name: 'N',
  Revision: 'REV',
  Birthday: 'BDAY',
  Anniversary: 'ANNIVERSARY',
  LegacyAnniversary: 'X-ANNIVERSARY',
  Kind: 'KIND',
  Nickname: 'NICKNAME',
  Note: 'NOTE',
  Role: 'ROLE',
  Title: 'TITLE',
  Categories: 'CATEGORIES',
  Url: 'URL',
  Organisation: 'ORG',
  Phone: 'TEL',
  Email: 'EMAIL',
  Address: 'ADR',
  Label: 'X-ABLABEL',
  ShowAs: 'X-ABSHOWAS',
} as const;

export type KnownField = (typeof Field)[keyof typeof Field];

/** Fields that may occur at most once per card. */
export const SINGLETON_FIELDS: readonly string[] = [
  Field.Version, Field.Uid, Field.FormattedName, Field.Revision, Field.Birthday, Field.Anniversary,
];

/** Input accepted by the labelled adders: a value, or a single-key `{ label: value }` mapping. */
export type FieldInput = string | readonly unknown[] | Readonly<Record<string, unknown>>;

/** Name components in N order. */
const NAME_PARTS = ['prefix', 'given', 'additional', 'family', 'suffix'] as const;
type NamePart = (typeof NAME_PARTS)[number];

/** ADR component order (RFC 6350 §6.3.1). */
const ADDRESS_ORDER: readonly (keyof PostAddress)[] = [
  'box', 'extended', 'street', 'city', 'region', 'code', 'country',
];

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function compareLists(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const result = compareText(a[i] ?? '', b[i] ?? '');
    if (result !== 0) return result;
  }
  return a.length - b.length;
}

function compareValues(a: string | readonly string[], b: string | readonly string[]): number {
  if (typeof a === 'string' && typeof b === 'string') return compareText(a, b);
  return compareLists(typeof a === 'string' ? [a] : a, typeof b === 'string' ? [b] : b);
}

/** Unlabelled values first, ordered by value; labelled values after, ordered by label. */
function compareLabelled<T extends string | readonly string[]>(a: Labelled<T>, b: Labelled<T>): number {
  const aLabelled = isLabelled(a);
  const bLabelled = isLabelled(b);
  if (aLabelled && bLabelled) return compareText(a.label, b.label);
  if (aLabelled) return 1;
  if (bLabelled) return -1;
  return compareValues(a, b);
}

/** Plain text of a property value, joining list and structured parts. */
export function valueText(value: PropertyValue): string {
  switch (value.kind) {
    case 'text':
      return value.text;
    case 'list':
      return value.items.join(', ');
    case 'structured':
      return value.parts.map(part => part.join(' ')).join(' ');
  }
}

function valueItems(value: PropertyValue): string[] {
  switch (value.kind) {
    case 'text':
      return [value.text];
    case 'list':
      return [...value.items];
    case 'structured':
      return value.parts.flat();
  }
}

function component(parts: readonly (readonly string[])[], index: number): StrList {
  const part = parts[index] ?? [];
  if (part.length === 0) return '';
  if (part.length === 1) return part[0] ?? '';
  return [...part];
}

/** TEL, URL and UID are written unescaped, so a line break would end the content line. */
function singleLine(field: string, value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new ValidationError(field, `Error: ${field} must not contain line breaks: ${JSON.stringify(value)}`);
  }
  return value;
}

function isMapping(input: FieldInput): input is Readonly<Record<string, unknown>> {
  return typeof input === 'object' && !Array.isArray(input);
}

interface TypedFieldSpec {
  field: TypedField;
  property: KnownField;
  description: string;
  inputName: string;
  group: string;
}

const TYPED_FIELDS: Readonly<Record<TypedField, TypedFieldSpec>> = {
  phone: { field: 'phone', property: Field.Phone, description: 'phone number', inputName: 'Phone', group: 'tel' },
  email: { field: 'email', property: Field.Email, description: 'email address', inputName: 'Email', group: 'email' },
  address: { field: 'address', property: Field.Address, description: 'post address', inputName: 'Address', group: 'adr' },
};

/**
 * In-memory vCard: an ordered list of property occurrences with typed
 * accessors per field category.
 *
 * Insertion order is kept so that encoding is stable. Custom labels are
 * attached through a shared group: a value and its X-ABLABEL form a pair
 * only when they are the sole two members of the group.
 */
export class VCardDocument {
  private readonly props: Property[];

  /** `checkVersion` is false only for copies of a document that was already checked. */
  constructor(properties: readonly Property[] = [], fallbackVersion: string = DEFAULT_VERSION, checkVersion = true) {
    this.props = [...properties];
    if (!checkVersion) return;
    const version = this.version;
    if (!version) {
      logger.warn(`Wrapping unversioned vCard object, setting version to ${fallbackVersion}.`);
      this.version = fallbackVersion;
    } else if (!isSupportedVersion(version)) {
      logger.warn(`Wrapping vCard with unsupported version ${version}, this might change any incompatible attributes.`);
    }
  }

  /** An empty card carrying only its version. */
  static create(version: string = DEFAULT_VERSION): VCardDocument {
    return new VCardDocument([{ name: Field.Version, params: new Map(), value: textValue(version) }]);
  }

  clone(): VCardDocument {
    return new VCardDocument(this.props.map(prop => ({
      ...prop,
      params: new Map([...prop.params].map(([key, values]) => [key, [...values]])),
      value: cloneValue(prop.value),
    })), this.version || DEFAULT_VERSION, false);
  }

  // --- Raw occurrences (codecs only) ---

  get properties(): readonly Property[] {
    return this.props;
  }

  appendProperty(prop: Property): void {
    this.props.push({ ...prop, name: prop.name.toUpperCase() });
  }

  removeProperty(prop: Property): void {
    const index = this.props.indexOf(prop);
    if (index !== -1) this.props.splice(index, 1);
  }

  getAll(name: string): Property[] {
    const upper = name.toUpperCase();
    return this.props.filter(prop => prop.name === upper);
  }

  first(name: string): Property | undefined {
    const upper = name.toUpperCase();
    return this.props.find(prop => prop.name === upper);
  }

  /** Delete every occurrence of a field together with the labels in its groups. */
  deleteField(name: string): void {
    const upper = name.toUpperCase();
    const doomed = new Set<Property>();
    for (const prop of this.props) {
      if (prop.name !== upper) continue;
      doomed.add(prop);
      if (!prop.group) continue;
      for (const label of this.props) {
        if (label.name === Field.Label && sameGroup(label.group, prop.group)) doomed.add(label);
      }
    }
    for (const prop of doomed) this.removeProperty(prop);
  }

  /**
   * The custom label of an occurrence: set only if exactly two occurrences
   * share its group and exactly one of them is an X-ABLABEL.
   */
  labelOf(prop: Property): string {
    if (!prop.group) return '';
    const members = this.props.filter(other => sameGroup(other.group, prop.group));
    if (members.length !== 2) return '';
    const labels = members.filter(member => member.name === Field.Label);
    const [label] = labels;
    if (labels.length !== 1 || !label) return '';
    return valueText(label.value);
  }

  /** First unused group name of the form `item<type><n>`. */
  newGroup(groupType = ''): string {
    for (let counter = 1; ; counter++) {
      const candidate = `item${groupType}${counter}`;
      if (!this.props.some(prop => sameGroup(prop.group, candidate))) return candidate;
    }
  }

  private stringField(name: KnownField): string {
    const prop = this.first(name);
    return prop ? valueText(prop.value) : '';
  }

  private setSingleton(name: KnownField, value: PropertyValue, params: ParamMap = new Map()): void {
    this.deleteField(name);
    this.appendProperty({ name, params, value });
  }

  // --- Singletons ---

  get version(): string {
    return this.stringField(Field.Version);
  }

  set version(value: string) {
    if (!isSupportedVersion(value)) {
      logger.warn(`Setting vcard version to unsupported version ${value}`);
    }
    this.setSingleton(Field.Version, textValue(normalizeField('version', value, FieldShape.Scalar)));
  }

  get uid(): string {
    return this.stringField(Field.Uid);
  }

  set uid(value: string) {
    this.setSingleton(Field.Uid, textValue(singleLine('uid', normalizeField('uid', value, FieldShape.Scalar))));
  }

  get revision(): string {
    return this.stringField(Field.Revision);
  }

  /** Replace REV with the current UTC time. */
  updateRevision(now: Date = new Date()): void {
    const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
    this.setSingleton(Field.Revision, textValue(stamp));
  }

  get kind(): string {
    const kind = this.stringField(Field.Kind) || 'individual';
    return kind === 'org' ? 'organisation' : kind;
  }

  get formattedName(): string {
    return this.stringField(Field.FormattedName);
  }

  /** Setting an empty name fills FN from the N components when there are any. */
  set formattedName(value: string) {
    let final: string;
    if (value) {
      final = normalizeField('FN', value, FieldShape.Scalar);
    } else if (this.firstNames.length > 0 || this.lastNames.length > 0) {
      final = [this.namePrefixes, this.firstNames, this.lastNames, this.nameSuffixes]
        .filter(names => names.length > 0)
        .map(names => names.join(' '))
        .join(' ');
    } else {
      final = '';
    }
    this.setSingleton(Field.FormattedName, textValue(final));
  }

  // --- Structured name ---

  private namePart(part: NamePart): string[] {
    const prop = this.first(Field.Name);
    if (!prop || prop.value.kind !== 'structured') return [];
    const values = prop.value.parts[NAME_PARTS.indexOf(part)] ?? [];
    return values.join('') ? [...values] : [];
  }

  get namePrefixes(): string[] {
    return this.namePart('prefix');
  }

  get firstNames(): string[] {
    return this.namePart('given');
  }

  get additionalNames(): string[] {
    return this.namePart('additional');
  }

  get lastNames(): string[] {
    return this.namePart('family');
  }

  get nameSuffixes(): string[] {
    return this.namePart('suffix');
  }

  get firstName(): string {
    return this.firstNames.join(' ');
  }

  get lastName(): string {
    return this.lastNames.join(' ');
  }

  /** Add an N entry. Existing entries are left alone. */
  addName(prefix: unknown, given: unknown, additional: unknown, family: unknown, suffix: unknown): void {
    const parts = [
      normalizeField('name prefix', prefix, FieldShape.ScalarOrList),
      normalizeField('first name', given, FieldShape.ScalarOrList),
      normalizeField('additional name', additional, FieldShape.ScalarOrList),
      normalizeField('last name', family, FieldShape.ScalarOrList),
      normalizeField('name suffix', suffix, FieldShape.ScalarOrList),
    ].map(part => (typeof part === 'string' ? [part] : part));
    this.appendProperty({ name: Field.Name, params: new Map(), value: structuredValue(parts) });
  }

  /** Given, additional and family names, or FN when the card has no N. */
  firstNameLastName(): string {
    const names = [...this.firstNames, ...this.additionalNames, ...this.lastNames];
    return names.length > 0 ? names.join(' ') : this.formattedName;
  }

  /** "Family, Given Additional", or FN when the card has no N. */
  lastNameFirstName(): string {
    const last = this.lastNames;
    const first = [...this.firstNames, ...this.additionalNames];
    if (last.length > 0 && first.length > 0) return `${last.join(' ')}, ${first.join(' ')}`;
    if (last.length > 0) return last.join(' ');
    if (first.length > 0) return first.join(' ');
    return this.formattedName;
  }

  // --- Labelled repeatable fields ---

  private labelledValues<T extends string | string[]>(name: string, extract: (prop: Property) => T): Labelled<T>[] {
    const values: Labelled<T>[] = [];
    for (const prop of this.getAll(name)) {
      const label = this.labelOf(prop);
      const value = extract(prop);
      values.push(label ? { label, value } : value);
    }
    return values.sort(compareLabelled);
  }

  /**
   * Add an occurrence; a single-key mapping puts the value into a new group
   * together with an X-ABLABEL holding the key.
   */
  private addLabelled(
    name: string,
    input: FieldInput,
    shape: FieldShape.Scalar | FieldShape.List,
    groupType: string,
    raw = false,
  ): void {
    let label: string | undefined;
    let content: unknown = input;
    if (isMapping(input)) {
      const keys = Object.keys(input);
      const [key] = keys;
      if (keys.length !== 1 || key === undefined) {
        throw new ValidationError(name, `Error: ${name.toLowerCase()} must be a string or a dict containing one key/value pair.`);
      }
      label = key;
      content = input[key];
    }
    const normalized = normalizeField(name.toLowerCase(), content, shape);
    const value = typeof normalized === 'string'
      ? textValue(raw ? singleLine(name.toLowerCase(), normalized) : normalized)
      : listValue(normalized);
    if (label === undefined) {
      this.appendProperty({ name, params: new Map(), value });
      return;
    }
    const group = this.newGroup(groupType);
    this.appendProperty({ group, name, params: new Map(), value });
    this.appendProperty({ group, name: Field.Label, params: new Map(), value: textValue(label) });
  }

  private textValues(name: string): Labelled<string>[] {
    return this.labelledValues(name, prop => valueText(prop.value));
  }

  get organisations(): Labelled<string[]>[] {
    return this.labelledValues(Field.Organisation, prop => valueItems(prop.value));
  }

  /**
   * Add one ORG entry. A card without FN takes its name from the first
   * organisation and is marked as a company.
   */
  addOrganisation(organisation: FieldInput): void {
    this.addLabelled(Field.Organisation, organisation, FieldShape.List, 'org');
    const [first] = this.organisations;
    if (this.formattedName || first === undefined) return;
    const units = isLabelled(first) ? first.value : first;
    this.formattedName = listToString(units, ', ').replace(/\n/g, ' ').replace(/\\/g, '');
    this.appendProperty({ name: Field.ShowAs, params: new Map(), value: textValue('COMPANY') });
  }

  get titles(): Labelled<string>[] {
    return this.textValues(Field.Title);
  }

  addTitle(title: FieldInput): void {
    this.addLabelled(Field.Title, title, FieldShape.Scalar, 'title');
  }

  get roles(): Labelled<string>[] {
    return this.textValues(Field.Role);
  }

  addRole(role: FieldInput): void {
    this.addLabelled(Field.Role, role, FieldShape.Scalar, 'role');
  }

  get nicknames(): Labelled<string>[] {
    return this.textValues(Field.Nickname);
  }

  addNickname(nickname: FieldInput): void {
    this.addLabelled(Field.Nickname, nickname, FieldShape.Scalar, 'nickname');
  }

  get notes(): Labelled<string>[] {
    return this.textValues(Field.Note);
  }

  addNote(note: FieldInput): void {
    this.addLabelled(Field.Note, note, FieldShape.Scalar, 'note');
  }

  get webpages(): Labelled<string>[] {
    return this.textValues(Field.Url);
  }

  addWebpage(webpage: FieldInput): void {
    this.addLabelled(Field.Url, webpage, FieldShape.Scalar, 'url', true);
  }

  /** Every CATEGORIES occurrence as its own list, sorted. */
  get categories(): string[][] {
    return this.getAll(Field.Categories)
      .map(prop => valueItems(prop.value))
      .sort(compareLists);
  }

  addCategory(categories: unknown): void {
    const items = normalizeField('category', categories, FieldShape.List);
    if (items.length === 0) return;
    this.appendProperty({ name: Field.Categories, params: new Map(), value: listValue(items) });
  }

  // --- Private objects ---

  /** X-<NAME> values for the recognised private object names, keyed as configured. */
  privateObjects(supported: readonly string[]): Record<string, Labelled<string>[]> {
    const lower = supported.map(name => name.toLowerCase());
    const result: Record<string, Labelled<string>[]> = {};
    for (const prop of this.props) {
      const name = prop.name.toLowerCase();
      if (!name.startsWith('x-')) continue;
      const index = lower.indexOf(name.slice(2));
      const key = supported[index];
      if (index === -1 || key === undefined) continue;
      const label = this.labelOf(prop);
      const value = valueText(prop.value);
      (result[key] ??= []).push(label ? { label, value } : value);
    }
    for (const values of Object.values(result)) values.sort(compareLabelled);
    return result;
  }

  addPrivateObject(key: string, value: FieldInput): void {
    this.addLabelled(`X-${key.toUpperCase()}`, value, FieldShape.Scalar, '');
  }

  // --- Typed fields ---

  private typedValues<T>(spec: TypedFieldSpec, extract: (prop: Property) => T): TypedValues<T> {
    const result: TypedValues<T> = {};
    for (const prop of this.getAll(spec.property)) {
      const key = typeKey(typesOf(prop.params, this.labelOf(prop), DEFAULT_TYPES[spec.field]));
      (result[key] ??= []).push(extract(prop));
    }
    return result;
  }

  /**
   * Validate a type string and add the occurrence. A custom label is stored
   * as an X- TYPE token plus an X-ABLABEL in a shared group.
   */
  private addTyped(spec: TypedFieldSpec, type: StrList, value: PropertyValue, description: string, extraParams: ParamMap = new Map()): void {
    const parsed = parseTypes(stringToList(type, ','), vocabularyFor(spec.field, this.version));
    checkTypes(parsed, spec.inputName, spec.description, description);
    const { standardTypes, customTypes, pref } = parsed;
    const params: ParamMap = new Map(extraParams);
    if (this.version === '4.0') {
      if (pref > 0) params.set('PREF', [String(pref)]);
    } else if (pref > 0) {
      standardTypes.push('pref');
    }
    if (standardTypes.length > 0) params.set('TYPE', standardTypes);
    const [custom] = customTypes;
    if (custom === undefined) {
      this.appendProperty({ name: spec.property, params, value });
      return;
    }
    const group = this.newGroup(spec.group);
    this.appendProperty({ group, name: spec.property, params, value });
    this.appendProperty({ group, name: Field.Label, params: new Map(), value: textValue(custom) });
  }

  get phoneNumbers(): TypedValues<string> {
    const numbers = this.typedValues(TYPED_FIELDS.phone, prop => {
      const text = valueText(prop.value);
      // vCard 4.0 stores numbers as tel: URIs
      return text.toLowerCase().startsWith('tel:') ? text.slice(4) : text;
    });
    for (const list of Object.values(numbers)) list.sort(compareText);
    return numbers;
  }

  addPhoneNumber(type: StrList, phoneNumber: string): void {
    const number = singleLine('phone number', normalizeField('phone number', phoneNumber, FieldShape.Scalar));
    if (this.version === '4.0') {
      this.addTyped(TYPED_FIELDS.phone, type, textValue(`tel:${number}`), number, new Map([['VALUE', ['uri']]]));
    } else {
      this.addTyped(TYPED_FIELDS.phone, type, textValue(number), number);
    }
  }

  get emails(): TypedValues<string> {
    const emails = this.typedValues(TYPED_FIELDS.email, prop => valueText(prop.value));
    for (const list of Object.values(emails)) list.sort(compareText);
    return emails;
  }

  addEmail(type: StrList, address: string): void {
    const email = normalizeField('email address', address, FieldShape.Scalar);
    this.addTyped(TYPED_FIELDS.email, type, textValue(email), email);
  }

  get postAddresses(): TypedValues<PostAddress> {
    const addresses = this.typedValues(TYPED_FIELDS.address, prop => {
      const parts = prop.value.kind === 'structured' ? prop.value.parts : [[], [], [valueText(prop.value)]];
      const address: Partial<PostAddress> = {};
      ADDRESS_ORDER.forEach((field, index) => {
        address[field] = component(parts, index);
      });
      return toPostAddress(address);
    });
    const sortKey = (address: PostAddress) => [
      listToString(address.city, ' ').toLowerCase(),
      listToString(address.street, ' ').toLowerCase(),
    ];
    for (const list of Object.values(addresses)) list.sort((a, b) => compareLists(sortKey(a), sortKey(b)));
    return addresses;
  }

  /** Add an ADR entry; the components may be strings or lists of strings. */
  addPostAddress(type: StrList, address: Readonly<Partial<Record<keyof PostAddress, unknown>>>): void {
    const labels: Record<keyof PostAddress, string> = {
      box: 'box address field',
      extended: 'extended address field',
      street: 'street',
      code: 'post code',
      city: 'city',
      region: 'region',
      country: 'country',
    };
    const parts = ADDRESS_ORDER.map(field => {
      const normalized = normalizeField(labels[field], address[field] ?? '', FieldShape.ScalarOrList);
      return typeof normalized === 'string' ? [normalized] : normalized;
    });
    const street = listToString(parts[2] ?? [], ' ');
    this.addTyped(TYPED_FIELDS.address, type, structuredValue(parts), street);
  }

  /** Addresses as multi-line text: street, box/extended, code and city, region and country. */
  formattedPostAddresses(): TypedValues<string> {
    const result: TypedValues<string> = {};
    for (const [type, addresses] of Object.entries(this.postAddresses)) {
      result[type] = addresses.map(formatPostAddress);
    }
    return result;
  }

  // --- Dates ---

  private dateField(name: KnownField): DateValue | undefined {
    const prop = this.first(name);
    if (!prop) return undefined;
    const text = valueText(prop.value);
    if (prop.params.get('VALUE')?.[0]?.toLowerCase() === 'text') return text;
    return parseDate(text);
  }

  /**
   * Prepare a date for storage: text only for vCard 4.0, dates in the
   * version's format. Undefined means the value cannot be stored.
   */
  private prepareDate(date: DateValue): { value: string; text: boolean } | undefined {
    if (typeof date === 'string') {
      return this.version === '4.0' ? { value: date.trim(), text: true } : undefined;
    }
    return { value: formatVCardDate(date, this.version), text: false };
  }

  get birthday(): DateValue | undefined {
    return this.dateField(Field.Birthday);
  }

  set birthday(date: DateValue) {
    const prepared = this.prepareDate(date);
    if (!prepared) {
      logger.warn(`Failed to set birthday to ${String(date)}`);
      return;
    }
    const params: ParamMap = prepared.text ? new Map([['VALUE', ['text']]]) : new Map();
    this.setSingleton(Field.Birthday, textValue(prepared.value), params);
  }

  /** ANNIVERSARY, falling back to the X-ANNIVERSARY vCard 3.0 cards use. */
  get anniversary(): DateValue | undefined {
    return this.dateField(Field.Anniversary) ?? this.dateField(Field.LegacyAnniversary);
  }

  set anniversary(date: DateValue) {
    const prepared = this.prepareDate(date);
    if (!prepared) {
      logger.warn(`Failed to set anniversary to ${String(date)}`);
      return;
    }
    this.deleteField(Field.LegacyAnniversary);
    if (prepared.text) {
      this.setSingleton(Field.Anniversary, textValue(prepared.value), new Map([['VALUE', ['text']]]));
    } else if (this.version === '4.0') {
      this.setSingleton(Field.Anniversary, textValue(prepared.value));
    } else {
      this.setSingleton(Field.LegacyAnniversary, textValue(prepared.value));
    }
  }
}

function sameGroup(a: string | undefined, b: string | undefined): boolean {
  return a !== undefined && b !== undefined && a.toLowerCase() === b.toLowerCase();
}

function cloneValue(value: PropertyValue): PropertyValue {
  switch (value.kind) {
    case 'text':
      return textValue(value.text);
    case 'list':
      return listValue(value.items);
    case 'structured':
      return structuredValue(value.parts);
  }
}

function toPostAddress(address: Partial<PostAddress>): PostAddress {
  return {
    box: address.box ?? '',
    extended: address.extended ?? '',
    street: address.street ?? '',
    code: address.code ?? '',
    city: address.city ?? '',
    region: address.region ?? '',
    country: address.country ?? '',
  };
}

function formatPostAddress(address: PostAddress): string {
  const present = (field: keyof PostAddress) => address[field] !== '';
  const get = (field: keyof PostAddress) => listToString(address[field], ' ');
  const pair = (a: keyof PostAddress, b: keyof PostAddress, separator: string): string | undefined => {
    if (present(a) && present(b)) return `${get(a)}${separator}${get(b)}`;
    if (present(a)) return get(a);
    if (present(b)) return get(b);
    return undefined;
  };
  const lines: string[] = [];
  if (present('street')) lines.push(listToString(address.street, '\n'));
  for (const line of [pair('box', 'extended', ' '), pair('code', 'city', ' '), pair('region', 'country', ', ')]) {
    if (line !== undefined) lines.push(line);
  }
  return lines.join('\n');
}
