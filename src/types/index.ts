export * from './vcard.js';
export * from './contact.js';
export type { ContactStorage, WriteOptions } from './store.js';
