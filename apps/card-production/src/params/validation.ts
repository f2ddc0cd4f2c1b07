import { ValidationError } from '../errors';

const HEX_PATTERN = /^[0-9A-Fa-f]*$/;
const DIGITS_PATTERN = /^[0-9]*$/;

/**
 * Whether every character is a hex digit. Only ASCII digits count.
 */
export function isHex(value: string): boolean {
  return HEX_PATTERN.test(value);
}

/**
 * Whether every character is one of `0`-`9`. Other Unicode digits, such as
 * superscripts, do not count.
 */
export function isDigits(value: string): boolean {
  return DIGITS_PATTERN.test(value);
}

/**
 * An allowed length: either exact or an inclusive range.
 */
export type LengthRequirement = number | { min: number; max: number };

function describeLength(length: LengthRequirement): string {
  return typeof length === 'number'
    ? `exactly ${length}`
    : `${length.min}-${length.max}`;
}

function hasLength(value: string, length: LengthRequirement): boolean {
  return typeof length === 'number'
    ? value.length === length
    : value.length >= length.min && value.length <= length.max;
}

/**
 * Validates a hex field and returns it in its canonical case.
 */
export function requireHex(
  field: string,
  value: string,
  { length, letterCase }: { length: number; letterCase: 'upper' | 'lower' }
): string {
  const normalized =
    letterCase === 'upper' ? value.toUpperCase() : value.toLowerCase();
  if (!hasLength(value, length) || !isHex(normalized)) {
    throw new ValidationError(
      field,
      `${describeLength(length)} hex digits [0-9A-Fa-f]`,
      value
    );
  }
  return normalized;
}

/**
 * Validates a decimal PIN field.
 */
export function requireDigits(
  field: string,
  value: string,
  { length }: { length: LengthRequirement }
): string {
  if (!hasLength(value, length) || !isDigits(value)) {
    throw new ValidationError(
      field,
      `${describeLength(length)} decimal digits [0-9]`,
      value
    );
  }
  return value;
}

/**
 * Re-validation of a stored hex field: like {@link requireHex}, and the value
 * must already be in its canonical case.
 */
export function assertCanonicalHex(
  field: string,
  value: string,
  options: { length: number; letterCase: 'upper' | 'lower' }
): void {
  if (requireHex(field, value, options) !== value) {
    throw new ValidationError(
      field,
      `${options.letterCase}case hex digits`,
      value
    );
  }
}
