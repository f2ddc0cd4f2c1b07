import { z } from 'zod';

/**
 * Joins zod issues into one line, e.g. `key.filename: Required; Unrecognized
 * key(s) in object: 'locked'`.
 */
export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
