// Base62 digits, most significant first: 0-9, A-Z, a-z
const alphabet = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';
const base = BigInt(alphabet.length);

export const SALT_RANGE = 1000;
export const DEFAULT_MIN_LENGTH = 7;

/**
 * Encode an allocated id and a salt into a short code.
 *
 * The id alone guarantees uniqueness; the salt only makes sequential codes
 * harder to guess. Codes shorter than `minLength` are left-padded with the
 * zero digit.
 */
export function encodeShortCode(
  id: number,
  salt: number,
  minLength: number = DEFAULT_MIN_LENGTH
): string {
  if (!Number.isSafeInteger(id) || id < 0) {
    throw new RangeError(`id must be a non-negative safe integer, got ${id}`);
  }
  if (!Number.isInteger(salt) || salt < 0 || salt >= SALT_RANGE) {
    throw new RangeError(`salt must be an integer in [0, ${SALT_RANGE}), got ${salt}`);
  }

  let combined = BigInt(id) * BigInt(SALT_RANGE) + BigInt(salt);
  if (combined === 0n) {
    return '0'.padStart(minLength, '0');
  }

  let digits = '';
  while (combined > 0n) {
    digits = alphabet[Number(combined % base)] + digits;
    combined /= base;
  }

  return digits.padStart(minLength, '0');
}

/**
 * Draw a salt in [0, SALT_RANGE)
 */
export function generateSalt(random: () => number = Math.random): number {
  return Math.min(SALT_RANGE - 1, Math.floor(random() * SALT_RANGE));
}

/**
 * Validate a URL by syntax only; any scheme the WHATWG parser accepts
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}
