import type { VCardVersion } from './vcard.js';

export type StrList = string | string[];

/** A value that was attached to a custom label through a shared group. */
export interface LabelledValue<T> {
  label: string;
  value: T;
}

export type Labelled<T> = T | LabelledValue<T>;

export function isLabelled<T>(item: Labelled<T>): item is LabelledValue<T> {
  return typeof item === 'object' && item !== null && !Array.isArray(item) && 'label' in item;
}

export interface PostAddress {
  box: StrList;
  extended: StrList;
  street: StrList;
  code: StrList;
  city: StrList;
  region: StrList;
  country: StrList;
}

export const POST_ADDRESS_FIELDS = [
  'box', 'extended', 'street', 'code', 'city', 'region', 'country',
] as const satisfies readonly (keyof PostAddress)[];

/**
 * A calendar date with optional time of day. `offset` is set only when the
 * source carried an explicit UTC offset such as `+02:00`. Year 1900 with a
 * zero time marks a date without year.
 */
export interface DateTimeValue {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  offset?: string;
}

/** Free text (vCard 4.0 only) or a date. */
export type DateValue = string | DateTimeValue;

/** Values of a typed field, keyed by their type string ("home", "work, pref"). */
export type TypedValues<T> = Record<string, T[]>;

/** The field-name to value structure every front end hands to the update operation. */
export type CanonicalDict = Readonly<Record<string, unknown>>;

/** Where a contact lives; owned by the storage collaborator. */
export interface ContactLocation {
  addressBook: string;
  filename: string;
}

export interface ContactOptions {
  /** Recognised private extension names, written as X-<NAME>. */
  privateObjects: readonly string[];
  /** Version for contacts created from scratch. */
  version: VCardVersion;
  localizeDates: boolean;
}

export const DEFAULT_CONTACT_OPTIONS: ContactOptions = {
  privateObjects: [],
  version: '3.0',
  localizeDates: false,
};
