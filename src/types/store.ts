import type { Contact } from '../contacts/contact.js';
import type { ContactFilter } from '../contacts/filter.js';

export interface WriteOptions {
  /** Replace an existing file; otherwise an existing file is an error. */
  overwrite?: boolean;
}

/** Persistence collaborator for contacts, addressed by UID. */
export interface ContactStorage {
  readonly name: string;
  write(contact: Contact, options?: WriteOptions): Promise<void>;
  read(uid: string): Promise<Contact | undefined>;
  delete(uid: string): Promise<void>;
  list(filter?: ContactFilter): Promise<Contact[]>;
}
