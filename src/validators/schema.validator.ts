import type { z } from 'zod';

import { ValidationError } from '../errors/validation.error';

export function ensureObject(input: unknown, label: string): Record<string, unknown> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new ValidationError({ kind: 'malformed-encoding' }, `${label} must be a JSON object`);
  }

  return input as Record<string, unknown>;
}

export function validateWithSchema<T extends z.ZodType>(
  schema: T,
  input: unknown,
  rootField = 'body',
): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const field = firstIssue?.path[0];

    throw new ValidationError(
      { kind: 'invalid-value', field: typeof field === 'string' ? field : rootField },
      firstIssue?.message ?? 'validation failed',
    );
  }

  return result.data as z.output<T>;
}
