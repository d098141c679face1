/** A caller-correctable problem with a single field of user input. */
export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** Malformed vCard text that could not be repaired. */
export class VCardParseError extends Error {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = 'VCardParseError';
    this.line = line;
  }
}

export class AddressBookParseError extends Error {
  readonly filename: string;
  readonly addressBook: string;
  readonly reason: Error;

  constructor(filename: string, addressBook: string, reason: Error) {
    super(`Error when parsing ${filename} in address book ${addressBook}: ${reason.message}`);
    this.name = 'AddressBookParseError';
    this.filename = filename;
    this.addressBook = addressBook;
    this.reason = reason;
  }
}

export class ContactNotFoundError extends Error {
  constructor(uid: string) {
    super(`Contact not found: ${uid}`);
    this.name = 'ContactNotFoundError';
  }
}

export class ContactExistsError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Refusing to overwrite existing contact file: ${path}`);
    this.name = 'ContactExistsError';
    this.path = path;
  }
}

export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
