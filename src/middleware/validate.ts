import { z } from 'zod';
import { ValidationError } from '../core/errors';

export type RequestPart = 'body' | 'query' | 'params';

/**
 * Parse one part of a request, turning zod issues into a ValidationError
 * the error handler renders as 400
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown, part: RequestPart): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const fieldErrors = result.error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
  }));

  throw new ValidationError(
    `Invalid request ${part}: ${fieldErrors.map(e => `${e.field || part}: ${e.message}`).join(', ')}`,
    fieldErrors[0]?.field,
    undefined,
    { fieldErrors }
  );
}
