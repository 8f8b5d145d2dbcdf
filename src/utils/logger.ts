/**
 * Logger Utility
 */

import winston from 'winston'
import { config, type Config } from '../config'

export function createLogger(logging: Config['logging']): winston.Logger {
  const format = logging.format === 'json'
    ? winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      )
    : winston.format.combine(
        winston.format.timestamp(),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : ''
          return `${timestamp} ${level}: ${message} ${metaStr}`
        })
      )

  return winston.createLogger({
    level: logging.level,
    format,
    transports: [
      new winston.transports.Console()
    ]
  })
}

export const logger = createLogger(config.logging)
