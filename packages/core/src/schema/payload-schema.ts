import type { ZodTypeAny } from 'zod';
import { ValidationError } from '../errors/tidemark-error.js';
import type { EntityPayload } from '../types/entity.js';
import { isPlainObject } from '../validation/input-validation.js';

/**
 * zod schema describing a collection's payloads. Must parse to a plain object.
 */
export type PayloadSchema = ZodTypeAny;

/**
 * Parse a payload against a collection schema.
 *
 * Returns the parsed value (defaults applied, unknown keys handled the way
 * the schema says). Throws {@link ValidationError} with one issue per zod
 * issue.
 */
export function parsePayload(
  collection: string,
  schema: PayloadSchema,
  payload: EntityPayload
): EntityPayload {
  const result = schema.safeParse(payload);

  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
      { collection }
    );
  }

  const parsed: unknown = result.data;
  if (!isPlainObject(parsed)) {
    throw new ValidationError([{ path: '', message: 'Schema must produce a plain object' }], {
      collection,
    });
  }
  return parsed;
}
