export { VCardDocument, Field, SINGLETON_FIELDS, type KnownField } from './document.js';
export { decodeVCard, encodeVCard, repairVCard, type DecodeOptions } from './codec.js';
export { FieldShape, normalizeField, listToString, stringToList } from './field-codec.js';
export { parseTypes, checkTypes, typeKey, vocabularyFor, type ParsedTypes, type TypedField } from './type-label.js';
export { parseDate, formatVCardDate, formatTemplateDate, formatDisplayDate, NO_YEAR } from './dates.js';
