/**
 * Asserts that `condition` is truthy, narrowing its type.
 */
export function assert(
  condition: unknown,
  message = 'Assertion failed'
): asserts condition {
  if (!condition) {
    throw new Error(message);
  }
}

/**
 * Returns `value` after asserting it is neither `undefined` nor `null`.
 */
export function assertDefined<T>(
  value: T | undefined | null,
  message = 'Expected value to be defined'
): T {
  assert(value !== undefined && value !== null, message);
  return value;
}

/**
 * Compile-time completeness check for `switch` statements. Reaching this at
 * runtime means a value escaped its declared type.
 */
export function throwIllegalValue(value: never): never {
  throw new Error(`Illegal value: ${JSON.stringify(value)}`);
}
