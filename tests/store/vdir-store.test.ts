import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { VdirStore } from '../../src/store/vdir-store.js';
import { Contact } from '../../src/contacts/contact.js';
import { FieldFilter, TermFilter } from '../../src/contacts/filter.js';
import { AddressBookParseError, ContactExistsError, ContactNotFoundError, StoreError } from '../../src/utils/errors.js';
import { createTestBook, vcard } from '../helpers.js';

describe('VdirStore', () => {
  let bookPath: string;
  let cleanup: () => Promise<void>;
  let store: VdirStore;

  beforeEach(async () => {
    ({ bookPath, cleanup } = await createTestBook());
    store = new VdirStore('test', bookPath);
  });

  afterEach(async () => {
    await cleanup();
  });

  function janeDoe(): Contact {
    return Contact.fromCanonical({ 'First name': 'Jane', 'Last name': 'Doe' }, {}, { name: store.name, path: bookPath });
  }

  it('should write a contact as <uid>.vcf and read it back', async () => {
    const contact = janeDoe();
    await store.write(contact);

    expect(await fs.readdir(bookPath)).toEqual([`${contact.uid}.vcf`]);
    const read = await store.read(contact.uid);
    expect(read?.formattedName).toBe('Jane Doe');
    expect(read?.location).toEqual({ addressBook: 'test', filename: path.join(bookPath, `${contact.uid}.vcf`) });
  });

  it('should not overwrite an existing contact by default', async () => {
    const contact = janeDoe();
    await store.write(contact);
    await expect(store.write(contact)).rejects.toBeInstanceOf(ContactExistsError);

    contact.update('First name : Janet\nLast name : Doe\nFormatted name :\n');
    await store.write(contact, { overwrite: true });
    expect((await store.read(contact.uid))?.formattedName).toBe('Janet Doe');
  });

  it('should create new contacts located in the store', async () => {
    const contact = store.create();
    contact.update('First name : Bob\n');
    await store.write(contact);
    expect((await store.read(contact.uid))?.formattedName).toBe('Bob');
  });

  it('should find a contact whose file is not named after its UID', async () => {
    await fs.writeFile(path.join(bookPath, 'other.vcf'), vcard('VERSION:3.0', 'UID:abc', 'FN:Other'));
    expect((await store.read('abc'))?.formattedName).toBe('Other');
    expect(await store.read('missing')).toBeUndefined();
  });

  it('should delete a contact', async () => {
    const contact = janeDoe();
    await store.write(contact);
    await store.delete(contact.uid);
    expect(await fs.readdir(bookPath)).toEqual([]);
    await expect(store.delete(contact.uid)).rejects.toBeInstanceOf(ContactNotFoundError);
  });

  it('should list contacts matching a filter', async () => {
    await store.write(janeDoe());
    await fs.writeFile(path.join(bookPath, 'bob.vcf'), vcard('VERSION:3.0', 'UID:bob', 'FN:Bob', 'EMAIL;TYPE=work:bob@example.com'));
    await fs.writeFile(path.join(bookPath, 'notes.txt'), 'not a card');

    expect((await store.list()).map(c => c.formattedName).sort()).toEqual(['Bob', 'Jane Doe']);
    expect((await store.list(new FieldFilter('emails', 'example'))).map(c => c.uid)).toEqual(['bob']);
  });

  it('should fail on unparsable files unless told to skip them', async () => {
    await fs.writeFile(path.join(bookPath, 'bad.vcf'), 'garbage');
    await fs.writeFile(path.join(bookPath, 'good.vcf'), vcard('VERSION:3.0', 'UID:good', 'FN:Good'));

    await expect(store.list()).rejects.toBeInstanceOf(AddressBookParseError);
    const lenient = new VdirStore('test', bookPath, { skipUnparsable: true });
    expect((await lenient.list()).map(c => c.uid)).toEqual(['good']);
  });

  it('should filter raw text before parsing when searching in source files', async () => {
    await fs.writeFile(path.join(bookPath, 'bad.vcf'), 'garbage');
    await fs.writeFile(path.join(bookPath, 'good.vcf'), vcard('VERSION:3.0', 'UID:good', 'FN:Good'));
    const fast = new VdirStore('test', bookPath, { searchInSourceFiles: true });
    expect((await fast.list(new TermFilter('good'))).map(c => c.uid)).toEqual(['good']);
  });

  it('should report a missing directory', async () => {
    const missing = new VdirStore('gone', path.join(bookPath, 'nope'));
    await expect(missing.list()).rejects.toBeInstanceOf(StoreError);
  });
});
