import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseRequest } from '../../src/middleware/validate';
import { ValidationError } from '../../src/core/errors';

describe('parseRequest', () => {
  const schema = z.object({
    limit: z.coerce.number().int().min(1).default(10),
    platform: z.enum(['A', 'B']).optional(),
  });

  it('should return the parsed value with defaults applied', () => {
    expect(parseRequest(schema, { platform: 'B' }, 'query')).toEqual({ limit: 10, platform: 'B' });
    expect(parseRequest(schema, { limit: '25' }, 'query')).toEqual({ limit: 25 });
  });

  it('should raise a ValidationError naming each bad field', () => {
    let caught: unknown;
    try {
      parseRequest(schema, { limit: '0', platform: 'C' }, 'query');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;

    expect(caught.statusCode).toBe(400);
    expect(caught.field).toBe('limit');
    expect(caught.message).toMatch(/^Invalid request query: limit: .+, platform: .+$/);
    expect(caught.details?.['fieldErrors']).toHaveLength(2);
  });

  it('should name the request part when the whole input is wrong', () => {
    expect(() => parseRequest(schema, 'not an object', 'body')).toThrow(/^Invalid request body: body: /);
  });
});
