import { assert } from '@cardprod/basics';
import { randomBytes, randomInt } from 'crypto';

/**
 * Random uppercase hex string of `length` characters from a CSPRNG.
 */
export function randomHex(length: number): string {
  assert(
    Number.isSafeInteger(length) && length > 0 && length % 2 === 0,
    'length must be a positive even integer'
  );
  return randomBytes(length / 2)
    .toString('hex')
    .toUpperCase();
}

/**
 * Random decimal string of `length` digits. Each digit is drawn on its own,
 * so every digit is uniform over 0-9.
 */
export function randomDigits(length: number): string {
  assert(
    Number.isSafeInteger(length) && length > 0,
    'length must be a positive integer'
  );
  let digits = '';
  for (let i = 0; i < length; i += 1) {
    digits += randomInt(0, 10).toString();
  }
  return digits;
}
