/**
 * Error Handler Middleware
 */

import type { Request, Response, NextFunction } from 'express'
import { ApiError, RequestValidationError } from '../errors'
import { logger } from '../utils/logger'

// Errors raised by Express itself or serve-static carry an HTTP status
function hasClientStatus(error: Error): error is Error & { status: number } {
  return 'status' in error
    && typeof error.status === 'number'
    && error.status >= 400
    && error.status < 500
}

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (error instanceof RequestValidationError) {
    logger.warn('Request validation failed', {
      path: req.path,
      method: req.method,
      issues: error.issues
    })
    return res.status(error.statusCode).json({ detail: error.issues })
  }

  if (error instanceof ApiError) {
    logger.warn('Request rejected', {
      error: error.message,
      code: error.code,
      path: req.path,
      method: req.method
    })
    return res.status(error.statusCode).json({ detail: error.message })
  }

  if (hasClientStatus(error)) {
    return res.status(error.status).json({ detail: error.message })
  }

  logger.error('Error handling request', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method
  })

  res.status(500).json({ detail: 'Internal Server Error' })
}

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ detail: 'Not Found' })
}

export const methodNotAllowedHandler = (req: Request, res: Response) => {
  res.status(405).json({ detail: 'Method Not Allowed' })
}
