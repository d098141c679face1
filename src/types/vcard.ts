export const SUPPORTED_VERSIONS = ['3.0', '4.0'] as const;
export type VCardVersion = (typeof SUPPORTED_VERSIONS)[number];
export const DEFAULT_VERSION: VCardVersion = '3.0';

export function isSupportedVersion(value: string): value is VCardVersion {
  return (SUPPORTED_VERSIONS as readonly string[]).includes(value);
}

/** Parameter names are upper case; values keep the case they were written in. */
export type ParamMap = Map<string, string[]>;

export type PropertyValue =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'list'; readonly items: readonly string[] }
  | { readonly kind: 'structured'; readonly parts: readonly (readonly string[])[] };

/** One occurrence of a named field inside a vCard. */
export interface Property {
  readonly group?: string;
  readonly name: string;
  readonly params: ParamMap;
  readonly value: PropertyValue;
}

export function textValue(text: string): PropertyValue {
  return { kind: 'text', text };
}

export function listValue(items: readonly string[]): PropertyValue {
  return { kind: 'list', items: [...items] };
}

export function structuredValue(parts: readonly (readonly string[])[]): PropertyValue {
  return { kind: 'structured', parts: parts.map(part => [...part]) };
}
