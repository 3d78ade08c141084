import { z } from 'zod';
import { ValidationError } from './errors';

export function validateSchema<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join(', ');

    throw new ValidationError(`Validation failed: ${errors}`);
  }

  return result.data;
}

/**
 * "2" => 2; rejects "2.5", "", "abc"
 */
export const integerStringSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform(Number);
