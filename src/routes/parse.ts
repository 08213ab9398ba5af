/**
 * Request body validation shared by the route handlers.
 */

import type { z } from 'zod';
import { RequestValidationError } from '../types/errors.js';

/**
 * Parse a JSON body with a Zod schema.
 * A missing body is read as an empty object.
 *
 * @throws RequestValidationError with the first issue's message
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new RequestValidationError(`${field}${issue ? issue.message : 'Invalid request body'}`);
  }
  return parsed.data;
}
