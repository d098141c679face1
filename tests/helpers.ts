import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Contact } from '../src/contacts/contact.js';
import type { ContactOptions } from '../src/types/contact.js';

/** Create a temp directory holding one address book for testing. */
export async function createTestBook(): Promise<{ bookPath: string; cleanup: () => Promise<void> }> {
  const bookPath = await fs.mkdtemp(path.join(os.tmpdir(), 'cardfile-test-'));
  return {
    bookPath,
    cleanup: async () => {
      await fs.rm(bookPath, { recursive: true, force: true });
    },
  };
}

/** Build a vCard text from content lines. */
export function vcard(...lines: string[]): string {
  return ['BEGIN:VCARD', ...lines, 'END:VCARD', ''].join('\r\n');
}

/** Build a contact from an editable form given as a key/value object. */
export function makeContact(data: Record<string, unknown>, options: Partial<ContactOptions> = {}): Contact {
  return Contact.fromCanonical(data, options);
}
