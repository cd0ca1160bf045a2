import { AuthErrorCode, AuthException } from '../../common/exceptions/auth.exception';

const E164_PATTERN = /^\+[1-9]\d{7,14}$/;

/**
 * Normalizes a phone number to E.164.
 *
 * Accepted inputs (separators such as spaces, dashes and parentheses are ignored):
 * - `+<country><number>` kept as is
 * - `00<country><number>` international prefix
 * - `0<number>` national trunk prefix, prefixed with the default country code
 * - `<country><number>` when it already starts with the default country code
 * - `<number>` anything else is treated as a national number
 *
 * @throws AuthException INVALID_PHONE_NUMBER when the result is not valid E.164
 */
export function normalizePhoneNumber(raw: string, defaultCountryCode: string): string {
  const trimmed = raw.trim();
  const hasPlus = trimmed.startsWith('+');
  const digits = trimmed.replace(/\D/g, '');

  let normalized: string;
  if (hasPlus) {
    normalized = `+${digits}`;
  } else if (digits.startsWith('00')) {
    normalized = `+${digits.slice(2)}`;
  } else if (digits.startsWith('0')) {
    normalized = `+${defaultCountryCode}${digits.slice(1)}`;
  } else if (digits.startsWith(defaultCountryCode) && digits.length > 10) {
    normalized = `+${digits}`;
  } else {
    normalized = `+${defaultCountryCode}${digits}`;
  }

  if (!isCanonicalPhoneNumber(normalized)) {
    throw new AuthException(AuthErrorCode.INVALID_PHONE_NUMBER);
  }

  return normalized;
}

export function isCanonicalPhoneNumber(phone: string): boolean {
  return E164_PATTERN.test(phone);
}
