import { z, ZodTypeAny } from 'zod';
import { SchemaValidationError } from '../errors/index.js';

/**
 * Validation
 *
 * Request validation with Zod schemas. Controllers parse what they read from
 * the request; failures surface as SchemaValidationError, which the error
 * handler turns into a 400 with per-field details.
 */

/**
 * Validation target (where the value came from)
 */
export type ValidationTarget = 'body' | 'query' | 'params';

/**
 * @example
 * ```typescript
 * const { id } = parseRequest(jobIdParamSchema, req.params, 'params');
 * ```
 */
export function parseRequest<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  target: ValidationTarget = 'body'
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(
    result.error.issues.map(issue => ({
      path: [target, ...issue.path].join('.'),
      message: issue.message,
    })),
    `Request ${target} failed validation`
  );
}
