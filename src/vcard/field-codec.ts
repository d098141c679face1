import { ValidationError } from '../utils/errors.js';

/** The value shape a vCard field accepts. */
export enum FieldShape {
  Scalar = 'scalar',
  List = 'list',
  ScalarOrList = 'scalar-or-list',
}

/**
 * Validate user input for a field and clean it for storage.
 *
 * Strings are trimmed (and wrapped for list fields). Lists must be flat lists
 * of strings; blank items are dropped and the rest trimmed.
 */
export function normalizeField(name: string, value: unknown, shape: FieldShape.Scalar): string;
export function normalizeField(name: string, value: unknown, shape: FieldShape.List): string[];
export function normalizeField(name: string, value: unknown, shape: FieldShape): string | string[];
export function normalizeField(name: string, value: unknown, shape: FieldShape): string | string[] {
  if (typeof value === 'string') {
    return shape === FieldShape.List ? [value.trim()] : value.trim();
  }
  if (Array.isArray(value)) {
    if (shape === FieldShape.Scalar) {
      throw new ValidationError(name, `Error: ${name} must contain a string.`);
    }
    const items: string[] = [];
    for (const entry of value) {
      if (typeof entry !== 'string') {
        throw new ValidationError(name, `Error: ${name} must not contain a nested list`);
      }
      const trimmed = entry.trim();
      if (trimmed) items.push(trimmed);
    }
    return items;
  }
  switch (shape) {
    case FieldShape.Scalar:
      throw new ValidationError(name, `Error: ${name} must be a string.`);
    case FieldShape.List:
      throw new ValidationError(name, `Error: ${name} must be a list with strings.`);
    default:
      throw new ValidationError(name, `Error: ${name} must be a string or a list with strings.`);
  }
}

/** Join a possibly nested list of strings with the delimiter. */
export function listToString(input: string | readonly unknown[], delimiter: string): string {
  if (typeof input === 'string') return input;
  return input
    .map(item => (typeof item === 'string' ? item : Array.isArray(item) ? listToString(item, delimiter) : ''))
    .join(delimiter);
}

/** Split a delimited string into trimmed items; lists pass through unchanged. */
export function stringToList(input: string | readonly string[], delimiter: string): string[] {
  if (typeof input !== 'string') return [...input];
  return input.split(delimiter).map(item => item.trim());
}
