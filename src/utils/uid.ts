import { customAlphabet } from 'nanoid';

export const UID_LENGTH = 36;

const randomUid = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', UID_LENGTH);

/** A random lowercase alphanumeric UID for new contacts. */
export function generateUid(): string {
  return randomUid();
}
