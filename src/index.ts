export * from './types/index.js';
export * from './vcard/index.js';
export * from './contacts/index.js';
export * from './store/index.js';
export {
  loadConfig, parseConfig, configSchema, contactOptions, openAddressBooks, openAddressBookCollection,
  DEFAULT_CONFIG_PATH, type AppConfig,
} from './config.js';
export {
  logger,
  generateUid,
  ValidationError,
  VCardParseError,
  AddressBookParseError,
  ContactNotFoundError,
  ContactExistsError,
  StoreError,
  ConfigError,
} from './utils/index.js';
