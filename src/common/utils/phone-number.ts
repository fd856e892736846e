import { ValidationException } from '../exceptions/domain.exceptions';

const MIN_PHONE_DIGITS = 10;
const MAX_PHONE_DIGITS = 15;

/**
 * Strip everything but digits. Identity is always keyed on the result.
 */
export function normalizePhoneNumber(raw: string): string {
  const digits = raw.replace(/\D/g, '');

  if (digits.length < MIN_PHONE_DIGITS) {
    throw ValidationException.forField(
      'phoneNumber',
      `Phone number must be at least ${MIN_PHONE_DIGITS} digits`,
    );
  }
  if (digits.length > MAX_PHONE_DIGITS) {
    throw ValidationException.forField(
      'phoneNumber',
      `Phone number must be at most ${MAX_PHONE_DIGITS} digits`,
    );
  }

  return digits;
}

export function normalizeNationalId(raw: string): string {
  const digits = raw.replace(/\D/g, '');
  if (digits.length !== 10) {
    throw ValidationException.forField('nationalId', 'National ID must be exactly 10 digits');
  }
  return digits;
}
