/**
 * Characters used for security codes. Excludes 0/O, 1/I/L so codes read
 * unambiguously off a label.
 */
export const SECURITY_CODE_ALPHABET = '23456789ABCDEFGHJKMNPQRSTUVWXYZ';

export const SECURITY_CODE_LENGTH = 4;

/**
 * Uppercases and trims a code typed at a kiosk.
 */
export function normalizeSecurityCode(input: string): string {
  return input.trim().toUpperCase();
}

export function isWellFormedSecurityCode(
  code: string,
  alphabet: string = SECURITY_CODE_ALPHABET,
  length: number = SECURITY_CODE_LENGTH
): boolean {
  if (code.length !== length) return false;
  for (const ch of code) {
    if (!alphabet.includes(ch)) return false;
  }
  return true;
}

/**
 * Number of distinct codes available per day.
 */
export function securityCodeKeyspaceSize(
  alphabet: string = SECURITY_CODE_ALPHABET,
  length: number = SECURITY_CODE_LENGTH
): number {
  return Math.pow(alphabet.length, length);
}
