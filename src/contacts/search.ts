import Fuse, { type IFuseOptions } from 'fuse.js';
import { isLabelled, type Labelled } from '../types/contact.js';
import type { Contact } from './contact.js';

/** Flattened view of a contact that fuse.js indexes. */
interface SearchRecord {
  contact: Contact;
  name: string;
  nicknames: string[];
  emails: string[];
  phones: string[];
  organisations: string[];
  notes: string[];
  categories: string[];
}

const FUSE_OPTIONS: IFuseOptions<SearchRecord> = {
  keys: [
    { name: 'name', weight: 0.3 },
    { name: 'nicknames', weight: 0.05 },
    { name: 'emails', weight: 0.25 },
    { name: 'phones', weight: 0.15 },
    { name: 'organisations', weight: 0.15 },
    { name: 'notes', weight: 0.05 },
    { name: 'categories', weight: 0.05 },
  ],
  threshold: 0.4,
  includeScore: true,
  ignoreLocation: true,
  minMatchCharLength: 2,
};

function unlabel<T>(items: readonly Labelled<T>[]): T[] {
  return items.map(item => (isLabelled(item) ? item.value : item));
}

function toRecord(contact: Contact): SearchRecord {
  const { document } = contact;
  return {
    contact,
    name: document.formattedName,
    nicknames: unlabel(document.nicknames),
    emails: Object.values(document.emails).flat(),
    phones: Object.values(document.phoneNumbers).flat(),
    organisations: unlabel(document.organisations).map(units => units.join(', ')),
    notes: unlabel(document.notes),
    categories: document.categories.flat(),
  };
}

/** Fuzzy search ranked by relevance; an empty query returns the first `limit` contacts. */
export function searchContacts(
  contacts: Contact[],
  query: string,
  limit: number = 20,
): Contact[] {
  if (!query.trim()) {
    return contacts.slice(0, limit);
  }

  const fuse = new Fuse(contacts.map(toRecord), FUSE_OPTIONS);
  const results = fuse.search(query, { limit });

  return results.map(r => r.item.contact);
}
