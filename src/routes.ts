/**
 * Routes Setup
 */

import express, { type Express } from 'express'
import type { Config } from './config'
import type { ActivityService } from './services/activity-service'
import { createActivityRouter } from './api/activities'
import { methodNotAllowedHandler } from './middleware/error-handler'

export const SERVICE_VERSION = '1.0.0'
export const INDEX_PAGE = '/static/index.html'

export function setupRoutes(app: Express, activityService: ActivityService, config: Config) {
  // 307 keeps the request method
  app.get('/', (req, res) => {
    res.redirect(307, INDEX_PAGE)
  })
  app.all('/', methodNotAllowedHandler)

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
      env: config.env
    })
  })

  // Front-end assets
  app.use('/static', express.static(config.staticDir))

  app.use('/activities', createActivityRouter(activityService))
}
