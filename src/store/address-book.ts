import type { Contact } from '../contacts/contact.js';
import type { ContactFilter } from '../contacts/filter.js';
import { AnyFilter } from '../contacts/filter.js';
import { StoreError, logger } from '../utils/index.js';
import type { VdirStore } from './vdir-store.js';

function commonPrefixLength(a: string, b: string): number {
  let length = 0;
  while (length < a.length && length < b.length && a[length] === b[length]) length++;
  return length;
}

/**
 * Contacts indexed by UID, loaded once. Concurrent callers of `load` share
 * the same pass; a failed load can be retried.
 */
export abstract class ContactIndex {
  protected readonly contacts = new Map<string, Contact>();
  private loading: Promise<void> | undefined;
  private shortUidIndex: Map<string, Contact> | undefined;

  abstract readonly name: string;

  protected abstract loadContacts(filter: ContactFilter): Promise<void>;

  get size(): number {
    return this.contacts.size;
  }

  load(filter: ContactFilter = new AnyFilter()): Promise<void> {
    if (!this.loading) {
      this.loading = this.loadContacts(filter).catch((err: unknown) => {
        this.loading = undefined;
        this.contacts.clear();
        throw err;
      });
    }
    return this.loading;
  }

  async search(filter: ContactFilter): Promise<Contact[]> {
    await this.load(filter);
    return [...this.contacts.values()].filter(contact => filter.matches(contact));
  }

  get(uid: string): Contact | undefined {
    return this.contacts.get(uid);
  }

  /** Loaded contacts with their UIDs. */
  entries(): Iterable<[string, Contact]> {
    return this.contacts.entries();
  }

  /**
   * Every loaded contact under the shortest prefix of its UID that no other
   * UID shares. A single contact is indexed by the first character.
   */
  shortUids(): Map<string, Contact> {
    if (this.shortUidIndex) return this.shortUidIndex;
    const index = new Map<string, Contact>();
    const uids = [...this.contacts.keys()].sort();
    uids.forEach((uid, position) => {
      const previous = uids[position - 1];
      const next = uids[position + 1];
      const shared = Math.max(
        previous === undefined ? 0 : commonPrefixLength(previous, uid),
        next === undefined ? 0 : commonPrefixLength(uid, next),
      );
      const contact = this.contacts.get(uid);
      if (contact) index.set(uid.slice(0, shared + 1), contact);
    });
    this.shortUidIndex = index;
    return index;
  }

  /** The short form of a UID, or "" when no loaded contact has it. */
  shortUid(uid: string): string {
    if (!uid) return '';
    const index = this.shortUids();
    for (let length = uid.length; length > 0; length--) {
      if (index.has(uid.slice(0, length))) return uid.slice(0, length);
    }
    return '';
  }

  toString(): string {
    return this.name;
  }
}

/** Contacts of one vdir. */
export class AddressBook extends ContactIndex {
  readonly name: string;

  constructor(readonly store: VdirStore) {
    super();
    this.name = store.name;
  }

  /**
   * Cards without UID and later cards that repeat a UID are left out with a
   * warning.
   */
  protected async loadContacts(filter: ContactFilter): Promise<void> {
    logger.debug('Loading address book', this.name, 'with filter', filter.toString());
    for (const contact of await this.store.loadAll(filter)) {
      const uid = contact.uid;
      const existing = this.contacts.get(uid);
      if (!uid) {
        logger.warn(`Card ${contact} from address book ${this.name} has no UID and will not be available.`);
      } else if (existing) {
        logger.warn(
          `Card ${contact} and ${existing} from address book ${this.name} have the same UID. The former will not be available.`,
        );
      } else {
        this.contacts.set(uid, contact);
      }
    }
    logger.debug(`Loaded ${this.contacts.size} contacts from address book ${this.name}.`);
  }
}

/**
 * Several address books searched as one. Short UIDs are computed over the
 * contacts of all of them; a UID already taken by an earlier book hides the
 * card of a later one.
 */
export class AddressBookCollection extends ContactIndex {
  private readonly books = new Map<string, AddressBook>();

  constructor(readonly name: string, books: readonly AddressBook[]) {
    super();
    for (const book of books) {
      if (this.books.has(book.name)) throw new StoreError(`Duplicate address book name: ${book.name}`);
      this.books.set(book.name, book);
    }
  }

  get length(): number {
    return this.books.size;
  }

  /** The member address book of that name. */
  book(name: string): AddressBook | undefined {
    return this.books.get(name);
  }

  [Symbol.iterator](): Iterator<AddressBook> {
    return this.books.values();
  }

  protected async loadContacts(filter: ContactFilter): Promise<void> {
    logger.debug('Loading collection', this.name, 'with filter', filter.toString());
    const books = [...this.books.values()];
    await Promise.all(books.map(book => book.load(filter)));
    for (const book of books) {
      for (const [uid, contact] of book.entries()) {
        if (this.contacts.has(uid)) {
          logger.warn(
            `Card ${contact} from address book ${book.name} will not be available because there is already another card with the same UID: ${uid}`,
          );
        } else {
          this.contacts.set(uid, contact);
        }
      }
    }
    logger.debug(`Loaded ${this.contacts.size} contacts from address book ${this.name}.`);
  }
}
