/**
 * API error types
 *
 * Every error the service answers with on purpose extends ApiError; the
 * error handler turns the status code and message into the response.
 */

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, message, 'NOT_FOUND')
    this.name = 'NotFoundError'
  }
}

/** A request that breaks a domain rule, such as a duplicate signup. */
export class InvalidOperationError extends ApiError {
  constructor(message: string) {
    super(400, message, 'INVALID_OPERATION')
    this.name = 'InvalidOperationError'
  }
}

export interface ValidationIssue {
  loc: Array<string | number>
  msg: string
  type: string
}

export class RequestValidationError extends ApiError {
  constructor(public issues: ValidationIssue[]) {
    super(422, 'Request validation failed', 'VALIDATION_ERROR')
    this.name = 'RequestValidationError'
  }
}
