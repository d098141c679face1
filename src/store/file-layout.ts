import * as path from 'node:path';
import { nanoid } from 'nanoid';

export const VCARD_EXTENSION = '.vcf';

export function contactPath(bookPath: string, uid: string): string {
  return path.join(bookPath, `${uid}${VCARD_EXTENSION}`);
}

export function isContactFile(filename: string): boolean {
  return path.extname(filename).toLowerCase() === VCARD_EXTENSION;
}

/** Hidden sibling of the target, so a reader listing *.vcf never sees it. */
export function tempPath(target: string): string {
  return path.join(path.dirname(target), `.${path.basename(target)}.${nanoid(8)}.tmp`);
}
