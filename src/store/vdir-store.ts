import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ContactOptions } from '../types/contact.js';
import type { ContactStorage, WriteOptions } from '../types/store.js';
import { Contact } from '../contacts/contact.js';
import type { ContactFilter } from '../contacts/filter.js';
import { AnyFilter } from '../contacts/filter.js';
import { AddressBookParseError, ContactNotFoundError, StoreError, logger } from '../utils/index.js';
import { errorCode, writeFileAtomic } from './atomic-write.js';
import { contactPath, isContactFile } from './file-layout.js';

export interface VdirOptions {
  contact?: Partial<ContactOptions>;
  /** Log and skip files that cannot be read or parsed instead of failing. */
  skipUnparsable?: boolean;
  /** Run the filter over the raw file text before parsing. */
  searchInSourceFiles?: boolean;
}

/**
 * A directory of `.vcf` files, one contact per file. New contacts are
 * stored as `<uid>.vcf`; existing files keep the name they were found under.
 */
export class VdirStore implements ContactStorage {
  readonly name: string;
  readonly path: string;
  private options: VdirOptions;

  constructor(name: string, bookPath: string, options: VdirOptions = {}) {
    this.name = name;
    this.path = bookPath;
    this.options = options;
  }

  get contactOptions(): Partial<ContactOptions> {
    return this.options.contact ?? {};
  }

  /** A new contact located in this directory. */
  create(): Contact {
    return Contact.create(this.contactOptions, { name: this.name, path: this.path });
  }

  async write(contact: Contact, options: WriteOptions = {}): Promise<void> {
    const vcard = contact.toVCard();
    const target = contact.location?.filename ?? contactPath(this.path, contact.uid);
    await writeFileAtomic(target, vcard, options.overwrite ?? false);
    logger.debug('Wrote contact', contact.uid, 'to', target);
  }

  async read(uid: string): Promise<Contact | undefined> {
    const direct = await this.readFile(contactPath(this.path, uid));
    if (direct?.uid === uid) return direct;
    const all = await this.loadAll();
    return all.find(contact => contact.uid === uid);
  }

  async delete(uid: string): Promise<void> {
    const contact = await this.read(uid);
    if (!contact?.location) throw new ContactNotFoundError(uid);
    await fs.unlink(contact.location.filename);
    logger.info('Deleted contact:', uid, contact.formattedName);
  }

  async list(filter: ContactFilter = new AnyFilter()): Promise<Contact[]> {
    const contacts = await this.loadAll(filter);
    return contacts.filter(contact => filter.matches(contact));
  }

  /**
   * Parse every file of the directory. The filter is only applied here, to
   * the raw text, when `searchInSourceFiles` is set.
   */
  async loadAll(filter: ContactFilter = new AnyFilter()): Promise<Contact[]> {
    const prefilter = this.options.searchInSourceFiles ? filter : undefined;
    const files = await this.files();
    const results = await Promise.all(files.map(async file => {
      try {
        return await this.parseFile(file, prefilter);
      } catch (err) {
        if (!(err instanceof AddressBookParseError) || !this.options.skipUnparsable) throw err;
        logger.error(err.message);
        return undefined;
      }
    }));
    return results.filter((contact): contact is Contact => contact !== undefined);
  }

  async files(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.path);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') throw new StoreError(`Address book directory not found: ${this.path}`);
      throw err;
    }
    return entries
      .filter(entry => isContactFile(entry) && !entry.startsWith('.'))
      .sort()
      .map(entry => path.join(this.path, entry));
  }

  private async readFile(file: string): Promise<Contact | undefined> {
    try {
      return await this.parseFile(file);
    } catch (err) {
      if (err instanceof AddressBookParseError && errorCode(err.reason) === 'ENOENT') return undefined;
      throw err;
    }
  }

  private async parseFile(file: string, filter?: ContactFilter): Promise<Contact | undefined> {
    try {
      const text = await fs.readFile(file, 'utf-8');
      return Contact.fromVCard(text, {
        filter,
        location: { addressBook: this.name, filename: file },
        options: this.contactOptions,
      });
    } catch (err) {
      if (err instanceof Error) throw new AddressBookParseError(file, this.name, err);
      throw err;
    }
  }
}
