import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';

/** Normalize a phone number to E.164 format. Returns the digits if parsing fails. */
export function normalizePhone(raw: string, defaultCountry: CountryCode = 'US'): string {
  const parsed = parsePhoneNumberFromString(raw, defaultCountry);
  if (parsed && (parsed.isValid() || parsed.isPossible())) {
    return parsed.format('E.164');
  }
  // Fallback: strip formatting characters
  const stripped = raw.replace(/[\s\-().]/g, '');
  return stripped || raw;
}

/** The national significant number, the part every spelling of a number shares. */
export function nationalDigits(raw: string, defaultCountry: CountryCode = 'US'): string {
  const parsed = parsePhoneNumberFromString(raw, defaultCountry);
  if (parsed) return parsed.nationalNumber;
  return raw.replace(/\D/g, '');
}

/** Normalize an email address (lowercase, trim). */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
