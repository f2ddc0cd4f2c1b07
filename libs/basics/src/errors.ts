/**
 * Extracts the error message from an error in a type-safe way
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (
    error &&
    typeof error === 'object' &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  if (
    error &&
    typeof error === 'object' &&
    'toString' in error &&
    typeof error.toString === 'function'
  ) {
    return String(error.toString());
  }
  return String(error);
}
