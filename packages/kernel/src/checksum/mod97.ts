/**
 * ISO 13616 rearrangement and ISO 7064 MOD 97-10 check digits.
 *
 * Identifiers can exceed 40 characters, which overflows any native integer
 * once letters are expanded to two digits, so the remainder is reduced one
 * digit at a time and never exceeds 97 * 10 + 9.
 */

import { ChecksumInputError } from '@ican/shared';

const PREFIX_LENGTH = 4;
const CHAR_CODE_0 = 48;
const CHAR_CODE_9 = 57;
const CHAR_CODE_A = 65;
const CHAR_CODE_Z = 90;

/**
 * Move the 4-character prefix to the end, uppercase, and expand letters to
 * two digits (A=10 ... Z=35). Digits are kept as they are.
 *
 * @example
 * ```typescript
 * rearrange('GB82WEST12345698765432'); // '3214282912345698765432161182'
 * ```
 */
export function rearrange(identifier: string): string {
  const upper = identifier.toUpperCase();
  const moved = `${upper.slice(PREFIX_LENGTH)}${upper.slice(0, PREFIX_LENGTH)}`;

  let digits = '';
  for (let index = 0; index < moved.length; index++) {
    const code = moved.charCodeAt(index);
    digits += code >= CHAR_CODE_A && code <= CHAR_CODE_Z ? String(code - CHAR_CODE_A + 10) : moved.charAt(index);
  }
  return digits;
}

/**
 * Remainder of a decimal digit string modulo 97.
 *
 * @throws ChecksumInputError when `digits` contains anything but 0-9
 */
export function mod97(digits: string): number {
  let remainder = 0;
  for (let index = 0; index < digits.length; index++) {
    const code = digits.charCodeAt(index);
    if (code < CHAR_CODE_0 || code > CHAR_CODE_9) {
      throw new ChecksumInputError(`Non-digit character at position ${index}`, { position: index });
    }
    remainder = (remainder * 10 + (code - CHAR_CODE_0)) % 97;
  }
  return remainder;
}

/**
 * An identifier passes the check when its rearranged form is 1 modulo 97.
 */
export function isChecksumValid(identifier: string): boolean {
  return mod97(rearrange(identifier)) === 1;
}

/**
 * Check digits for `code` + `payload`, always two characters in `02`..`98`.
 *
 * @example
 * ```typescript
 * computeCheckDigits('DE', '370400440532013000'); // '89'
 * ```
 */
export function computeCheckDigits(code: string, payload: string): string {
  const remainder = mod97(rearrange(`${code}00${payload}`));
  return String(98 - remainder).padStart(2, '0');
}
