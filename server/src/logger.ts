import pino from 'pino'
import pinoHttp from 'pino-http'
import { SERVICE_NAME } from './config/env'

const isDev = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test'

// Liveness checks from load balancers and uptime monitors skip request logging.
const QUIET_PATHS = new Set(['/', '/healthz'])

export function isQuietRequest(url: string | undefined): boolean {
  const path = (url ?? '').split('?')[0]
  return QUIET_PATHS.has(path)
}

export const logger = pino({
  name: SERVICE_NAME,
  level: process.env.LOG_LEVEL ?? (isDev ? 'debug' : 'info'),
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', 'apiKey'],
    censor: '[REDACTED]'
  },
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: { colorize: true }
      }
    : undefined
})

export const httpLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => isQuietRequest(req.url)
  },
  customLogLevel: (_req, res, err) => {
    if (res.statusCode >= 500 || err) return 'error'
    if (res.statusCode >= 400) return 'warn'
    return 'info'
  }
})
