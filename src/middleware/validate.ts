/**
 * Request validation helpers
 */

import type { z } from 'zod'
import { RequestValidationError } from '../errors'

type RequestLocation = 'query'

/**
 * Parse one part of a request against a zod schema, raising a 422-mapped
 * RequestValidationError whose issue locations are prefixed with the part.
 */
export function validateRequest<T extends z.ZodTypeAny>(
  schema: T,
  location: RequestLocation,
  input: unknown
): z.output<T> {
  const result = schema.safeParse(input)

  if (!result.success) {
    throw new RequestValidationError(
      result.error.issues.map(issue => ({
        loc: [location, ...issue.path],
        msg: issue.message,
        type: issue.code
      }))
    )
  }

  return result.data
}
