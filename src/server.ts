/**
 * Activity Signup Service - Main Server
 */

import http from 'http'
import { config } from './config'
import { createApp } from './app'
import { ActivityService } from './services/activity-service'
import { InMemoryActivityDirectory } from './storage/in-memory-activity-directory'
import { logger } from './utils/logger'

function startServer() {
  try {
    const directory = new InMemoryActivityDirectory()
    const activityService = new ActivityService(directory)

    const app = createApp(config, activityService)
    const server = http.createServer(app)

    server.listen(config.port, config.host, () => {
      logger.info('Activity signup service started', {
        port: config.port,
        host: config.host,
        env: config.env,
        index: `http://localhost:${config.port}/`,
        health: `http://localhost:${config.port}/health`
      })
    })

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`)

      server.close(() => {
        logger.info('HTTP server closed')
        process.exit(0)
      })

      // Force shutdown after timeout
      setTimeout(() => {
        logger.error('Forced shutdown after timeout')
        process.exit(1)
      }, 10000).unref()
    }

    process.on('SIGTERM', () => shutdown('SIGTERM'))
    process.on('SIGINT', () => shutdown('SIGINT'))
  } catch (error) {
    logger.error('Failed to start server', { error })
    process.exit(1)
  }
}

startServer()
