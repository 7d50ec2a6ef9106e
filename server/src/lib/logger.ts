/**
 * Structured JSON logger for the API and the job worker. Single format: level, timestamp, service, env, release,
 * plus requestId / jobId / messageId on child loggers. Redacts known sensitive keys.
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info')

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'password',
  'token',
  'apiKey',
  'api_key',
  'authorization',
  'cookie',
  'req.headers.authorization',
  'req.headers["x-api-key"]',
  'PIPELINE_TOKEN',
  'REDIS_URL',
  'DATABASE_URL',
]

export type ServiceName = 'api' | 'worker'
export type Logger = pino.Logger

function createBaseLogger(service: ServiceName): Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, Logger>()

export function getLogger(service: ServiceName): Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger with requestId (API request context). */
export function withRequestId(requestId: string | undefined): Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Child logger with jobId and the delivery it came from (worker job context). */
export function withJobContext(base: Logger, jobId: string, messageId?: string): Logger {
  return base.child({ jobId, messageId: messageId || undefined })
}

/** Keep error logs small: message plus the first stack frames. */
export function describeError(err: unknown): { message: string; stack?: string } {
  if (err instanceof Error) {
    return { message: err.message, stack: err.stack?.split('\n').slice(0, 6).join('\n') }
  }
  return { message: String(err) }
}
