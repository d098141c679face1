export { logger } from './logger.js';
export { generateUid, UID_LENGTH } from './uid.js';
export {
  ValidationError,
  VCardParseError,
  AddressBookParseError,
  ContactNotFoundError,
  ContactExistsError,
  StoreError,
  ConfigError,
} from './errors.js';
