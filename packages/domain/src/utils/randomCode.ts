import { randomInt } from 'node:crypto';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Uppercase alphanumeric code drawn from a CSPRNG.
 */
export function randomAlphanumericCode(length: number): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new Error(`Code length must be a positive integer, got: ${length}`);
  }
  let code = '';
  for (let i = 0; i < length; i += 1) {
    code += ALPHABET[randomInt(ALPHABET.length)];
  }
  return code;
}
