export { VdirStore, type VdirOptions } from './vdir-store.js';
export { AddressBook, AddressBookCollection, ContactIndex } from './address-book.js';
export { writeFileAtomic } from './atomic-write.js';
export { contactPath } from './file-layout.js';
