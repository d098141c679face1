import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { writeFileAtomic } from '../../src/store/atomic-write.js';
import { ContactExistsError } from '../../src/utils/errors.js';
import { createTestBook } from '../helpers.js';

const diskFull = vi.hoisted(() => ({ next: false }));

vi.mock('node:fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    writeFile: async (...args: Parameters<typeof actual.writeFile>) => {
      if (!diskFull.next) return actual.writeFile(...args);
      diskFull.next = false;
      await actual.writeFile(args[0], 'par');
      throw Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });
    },
  };
});

describe('writeFileAtomic', () => {
  let bookPath: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ bookPath, cleanup } = await createTestBook());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should refuse to replace an existing file unless asked to', async () => {
    const target = path.join(bookPath, 'a.vcf');
    await writeFileAtomic(target, 'first', false);
    await expect(writeFileAtomic(target, 'second', false)).rejects.toBeInstanceOf(ContactExistsError);
    expect(await fs.readFile(target, 'utf-8')).toBe('first');

    await writeFileAtomic(target, 'third', true);
    expect(await fs.readFile(target, 'utf-8')).toBe('third');
  });

  it('should leave no temporary files behind', async () => {
    const target = path.join(bookPath, 'a.vcf');
    await writeFileAtomic(target, 'first', false);
    await writeFileAtomic(target, 'second', false).catch(() => undefined);
    await writeFileAtomic(target, 'third', true);
    expect(await fs.readdir(bookPath)).toEqual(['a.vcf']);
  });

  it('should remove a partly written temporary file', async () => {
    const target = path.join(bookPath, 'a.vcf');
    diskFull.next = true;
    await expect(writeFileAtomic(target, 'content', false)).rejects.toThrow('no space left on device');
    expect(await fs.readdir(bookPath)).toEqual([]);
  });
});
