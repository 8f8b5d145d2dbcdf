/**
 * Express application factory
 */

import 'express-async-errors'
import express, { type Express } from 'express'
import type { Config } from './config'
import type { ActivityService } from './services/activity-service'
import { setupErrorHandling, setupMiddleware } from './middleware'
import { setupRoutes } from './routes'

export function createApp(config: Config, activityService: ActivityService): Express {
  const app = express()

  setupMiddleware(app, config)
  setupRoutes(app, activityService, config)
  setupErrorHandling(app)

  return app
}
