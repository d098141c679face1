export { Contact, type AddressBookRef, type LoadOptions } from './contact.js';
export { parseStructuredText, applyUpdate, CanonicalKey } from './structured-text.js';
export { toTemplate } from './template.js';
export { prettyContact } from './display.js';
export {
  getField, getFieldValue, formatLabelledField, isFieldName, FIELD_NAMES,
  type FieldName, type FieldValue, type FieldContext,
} from './fields.js';
export {
  AnyFilter, NullFilter, TermFilter, FieldFilter, NameFilter, PhoneFilter,
  AndFilter, OrFilter, allOf, anyOf, parseFilter, type ContactFilter,
} from './filter.js';
export { normalizeEmail, normalizePhone, nationalDigits } from './normalize.js';
export { searchContacts } from './search.js';
