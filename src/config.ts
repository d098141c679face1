import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import type { ContactOptions } from './types/index.js';
import { SUPPORTED_VERSIONS } from './types/index.js';
import { ConfigError, logger } from './utils/index.js';
import { errorCode } from './store/atomic-write.js';
import { AddressBook, AddressBookCollection } from './store/address-book.js';
import { VdirStore } from './store/vdir-store.js';

const addressBookSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
});

const typePreference = z.union([z.string(), z.array(z.string())])
  .transform(value => (typeof value === 'string' ? [value] : value));

export const configSchema = z.object({
  addressBooks: z.array(addressBookSchema).default([]),
  privateObjects: z.array(
    z.string().regex(/^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/, 'private object names may only contain letters, digits and inner dashes'),
  ).default([]),
  preferredVersion: z.enum(SUPPORTED_VERSIONS).default('3.0'),
  localizeDates: z.boolean().default(false),
  skipUnparsable: z.boolean().default(false),
  searchInSourceFiles: z.boolean().default(false),
  preferredPhoneNumberType: typePreference.default(['pref']),
  preferredEmailAddressType: typePreference.default(['pref']),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  for (const book of config.addressBooks) {
    if (seen.has(book.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate address book name: ${book.name}`, path: ['addressBooks'] });
    }
    seen.add(book.name);
  }
});

export type AppConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.config', 'cardfile', 'config.json');

function expandHome(value: string): string {
  return value === '~' || value.startsWith('~/') ? path.join(os.homedir(), value.slice(1)) : value;
}

/** Validate a parsed config object; relative book paths resolve against `baseDir`. */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return {
    ...result.data,
    addressBooks: result.data.addressBooks.map(book => ({
      ...book,
      path: path.resolve(baseDir, expandHome(book.path)),
    })),
  };
}

/**
 * Read the JSON config named by CARDFILE_CONFIG, or the default path. A
 * missing default file yields the defaults; a missing explicit file is an
 * error.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const explicit = configPath ?? process.env.CARDFILE_CONFIG;
  const file = explicit ?? DEFAULT_CONFIG_PATH;

  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT' && explicit === undefined) {
      logger.debug('No config file at', file, '- using defaults');
      return parseConfig({});
    }
    throw new ConfigError(`Could not read config file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw, path.dirname(file));
}

export function contactOptions(config: AppConfig): ContactOptions {
  return {
    privateObjects: config.privateObjects,
    version: config.preferredVersion,
    localizeDates: config.localizeDates,
  };
}

/** One AddressBook per configured vdir. */
export function openAddressBooks(config: AppConfig): AddressBook[] {
  return config.addressBooks.map(book => new AddressBook(new VdirStore(book.name, book.path, {
    contact: contactOptions(config),
    skipUnparsable: config.skipUnparsable,
    searchInSourceFiles: config.searchInSourceFiles,
  })));
}

/**
 * The named address books, or all configured ones when no names are given,
 * searched as one collection.
 */
export function openAddressBookCollection(config: AppConfig, names: readonly string[] = []): AddressBookCollection {
  const books = openAddressBooks(config);
  if (names.length === 0) return new AddressBookCollection('all', books);
  const selected = [...new Set(names)].map(name => {
    const book = books.find(candidate => candidate.name === name);
    if (!book) throw new ConfigError(`Unknown address book: ${name}`);
    return book;
  });
  return new AddressBookCollection(selected.map(book => book.name).join(', '), selected);
}
