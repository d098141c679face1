import { join } from 'node:path';
import type { CanonicalDict, ContactLocation, ContactOptions } from '../types/contact.js';
import { DEFAULT_CONTACT_OPTIONS } from '../types/contact.js';
import { VCardDocument } from '../vcard/document.js';
import { decodeVCard, encodeVCard } from '../vcard/codec.js';
import { generateUid } from '../utils/uid.js';
import { applyUpdate, parseStructuredText } from './structured-text.js';
import { toTemplate } from './template.js';
import { prettyContact } from './display.js';
import type { ContactFilter } from './filter.js';

/** The address book a new contact is created in. */
export interface AddressBookRef {
  name: string;
  path: string;
}

export interface LoadOptions {
  location?: ContactLocation;
  /** Checked against the raw file text before the card is parsed. */
  filter?: ContactFilter;
  options?: Partial<ContactOptions>;
}

function resolveOptions(options: Partial<ContactOptions> = {}): ContactOptions {
  return { ...DEFAULT_CONTACT_OPTIONS, ...options };
}

function locationFor(addressBook: AddressBookRef | undefined, uid: string): ContactLocation | undefined {
  if (!addressBook) return undefined;
  return { addressBook: addressBook.name, filename: join(addressBook.path, `${uid}.vcf`) };
}

/**
 * A vCard together with its identity and where it is stored. The document
 * is replaced, never patched, by updates from the editable form.
 */
export class Contact {
  private doc: VCardDocument;

  private constructor(
    document: VCardDocument,
    readonly options: ContactOptions,
    readonly location: ContactLocation | undefined,
  ) {
    this.doc = document;
  }

  /** A new, empty contact with a freshly generated UID. */
  static create(options: Partial<ContactOptions> = {}, addressBook?: AddressBookRef): Contact {
    const resolved = resolveOptions(options);
    const document = VCardDocument.create(resolved.version);
    document.uid = generateUid();
    return new Contact(document, resolved, locationFor(addressBook, document.uid));
  }

  /**
   * Parse vCard text. Returns undefined when a filter is given and the raw
   * text does not match it.
   */
  static fromVCard(text: string, load: LoadOptions = {}): Contact | undefined {
    if (load.filter && !load.filter.matchesText(text)) return undefined;
    const options = resolveOptions(load.options);
    const document = decodeVCard(text, { fallbackVersion: options.version });
    return new Contact(document, options, load.location);
  }

  static fromCanonical(data: CanonicalDict, options: Partial<ContactOptions> = {}, addressBook?: AddressBookRef): Contact {
    const contact = Contact.create(options, addressBook);
    contact.applyCanonical(data);
    return contact;
  }

  static fromStructuredText(text: string, options: Partial<ContactOptions> = {}, addressBook?: AddressBookRef): Contact {
    return Contact.fromCanonical(parseStructuredText(text), options, addressBook);
  }

  /** Copy a contact and replace its data with the edited form in one step. */
  static cloneWithUpdate(contact: Contact, text: string, options: Partial<ContactOptions> = {}): Contact {
    const copy = new Contact(contact.doc.clone(), { ...contact.options, ...options }, contact.location);
    copy.update(text);
    return copy;
  }

  get document(): VCardDocument {
    return this.doc;
  }

  get uid(): string {
    return this.doc.uid;
  }

  get version(): string {
    return this.doc.version;
  }

  get formattedName(): string {
    return this.doc.formattedName;
  }

  /** Replace all editable fields with the content of the form text. */
  update(text: string): void {
    this.applyCanonical(parseStructuredText(text));
  }

  applyCanonical(data: CanonicalDict): void {
    this.doc = applyUpdate(this.doc, data, { privateObjects: this.options.privateObjects });
  }

  /** Serialize for storage; a card without UID gets one first. */
  toVCard(): string {
    if (!this.doc.uid) this.doc.uid = generateUid();
    return encodeVCard(this.doc);
  }

  toTemplate(): string {
    return toTemplate(this.doc, { privateObjects: this.options.privateObjects });
  }

  pretty(verbose = true): string {
    return prettyContact(this, verbose);
  }

  /** Contacts are equal when they display the same, whatever their UID or location. */
  equals(other: Contact): boolean {
    return this.pretty(false) === other.pretty(false);
  }

  toString(): string {
    return this.formattedName;
  }
}
