import { z } from 'zod';

import { fromWire, wireName } from '../../shared/wire';
import type { AliasTable } from '../../shared/wire';
import { ValidationError } from './errors';
import type { FieldErrors } from './errors';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** One reason per field, keyed by wire name; the first issue zod reports wins. */
export const toFieldErrors = (error: z.ZodError, aliases: AliasTable): FieldErrors => {
  const details: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? wireName(aliases, String(issue.path[0])) : 'body';
    if (!Object.prototype.hasOwnProperty.call(details, field)) {
      details[field] = issue.message;
    }
  }
  return details;
};

const validate = <S extends z.ZodTypeAny>(
  schema: S,
  aliases: AliasTable,
  input: Record<string, unknown>,
  message: string
): z.output<S> => {
  const result = schema.safeParse(fromWire(input, aliases));
  if (!result.success) {
    throw new ValidationError(message, toFieldErrors(result.error, aliases));
  }
  return result.data;
};

/**
 * Validates a JSON request body. A missing body counts as an empty object so
 * that every required field is reported.
 *
 * For patch schemas the result only holds the keys the client actually sent.
 */
export const parseBody = <S extends z.ZodTypeAny>(schema: S, aliases: AliasTable, body: unknown): z.output<S> => {
  const input = body === undefined ? {} : body;
  if (!isRecord(input)) {
    throw new ValidationError('Invalid request body', { body: 'Expected a JSON object' });
  }
  return validate(schema, aliases, input, 'Invalid request body');
};

/** Validates a query string; repeated parameters keep their first value. */
export const parseQuery = <S extends z.ZodTypeAny>(schema: S, aliases: AliasTable, query: unknown): z.output<S> => {
  const input: Record<string, unknown> = {};
  if (isRecord(query)) {
    for (const [key, value] of Object.entries(query)) {
      const first = Array.isArray(value) ? value[0] : value;
      if (typeof first === 'string') {
        input[key] = first;
      }
    }
  }
  return validate(schema, aliases, input, 'Invalid query parameters');
};
