/**
 * Express Middleware Setup
 */

import type { Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import type { Config } from '../config'
import { requestLogger } from './request-logger'
import { errorHandler, notFoundHandler } from './error-handler'

export function setupMiddleware(app: Express, config: Config) {
  // Security headers
  app.use(helmet())

  app.use(cors({
    origin: config.cors.origin,
    credentials: config.cors.credentials
  }))

  app.use(requestLogger)
}

/**
 * Registered after every route so unmatched paths and thrown errors land here
 */
export function setupErrorHandling(app: Express) {
  app.use(notFoundHandler)
  app.use(errorHandler)
}
