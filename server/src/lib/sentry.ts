/**
 * Sentry for API and worker: errors only, enabled when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV), SENTRY_TRACES_SAMPLE_RATE (default 0.05), RELEASE.
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import { getLogger } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined
const TRACES_SAMPLE_RATE = Math.min(
  1,
  Math.max(0, parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.05') || 0.05)
)

function enabled(): boolean {
  return Boolean(DSN && DSN.trim())
}

export function initSentry(): void {
  if (!enabled()) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: TRACES_SAMPLE_RATE,
    })
  } catch (err) {
    getLogger('api').warn({ err }, 'Sentry init failed; continuing without error reporting')
  }
}

/** Call after all routes. No-op if SENTRY_DSN not set. */
export function setupSentryErrorHandler(app: Express): void {
  if (!enabled()) return
  Sentry.setupExpressErrorHandler(app)
}

/** Set requestId on the Sentry scope for correlation. Run after requestIdMiddleware. */
export function sentryRequestIdScope(req: Request, _res: Response, next: NextFunction): void {
  const id = req.requestId
  if (id && enabled()) Sentry.getCurrentScope().setTag('request_id', id)
  next()
}

/** Capture a worker job failure with jobId/messageId/kind tags. */
export function captureJobError(
  jobId: string,
  messageId: string | undefined,
  kind: string,
  err: unknown
): void {
  if (!enabled()) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'worker')
    scope.setTag('job_id', jobId)
    scope.setTag('job_kind', kind)
    if (messageId) scope.setTag('message_id', messageId)
    Sentry.captureException(err)
  })
}

/** Flush pending events before the process exits. */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled()) return
  await Sentry.flush(timeoutMs)
}
