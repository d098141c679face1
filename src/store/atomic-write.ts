import * as fs from 'node:fs/promises';
import { ContactExistsError, logger } from '../utils/index.js';
import { tempPath } from './file-layout.js';

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

async function removeTemp(file: string): Promise<void> {
  try {
    await fs.unlink(file);
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') logger.warn('Could not remove temporary file', file, err);
  }
}

/**
 * Write `content` to `target` so that readers only ever see the old or the
 * complete new file. Without `overwrite`, an existing target fails with
 * ContactExistsError and is left untouched.
 */
export async function writeFileAtomic(target: string, content: string, overwrite: boolean): Promise<void> {
  const temp = tempPath(target);
  try {
    await fs.writeFile(temp, content, { encoding: 'utf-8', flag: 'wx' });
    if (overwrite) {
      await fs.rename(temp, target);
      return;
    }
    try {
      await fs.link(temp, target);
    } catch (err) {
      if (errorCode(err) === 'EEXIST') throw new ContactExistsError(target);
      throw err;
    }
  } finally {
    await removeTemp(temp);
  }
}
