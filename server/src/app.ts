import express, { type Express, type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import { setupSentryErrorHandler, sentryRequestIdScope } from './lib/sentry'
import { describeError, withRequestId } from './lib/logger'
import { requestIdMiddleware } from './middleware/requestId'
import { createHealthRouter, type HealthDeps } from './routes/health'
import { createJobsRouter } from './routes/jobs'
import type { JobService } from './services/jobs'
import { requireApiKey } from './utils/apiKey'

export interface AppDeps extends Omit<HealthDeps, 'opsAuth'> {
  jobs: JobService
  apiKeys: ReadonlyMap<string, string>
  /** Require the API key on /ops/worker (on in production). */
  protectOps?: boolean
  /** Requests per minute per client on /api; 0 turns the limiter off. */
  rateLimitPerMinute?: number
  corsOrigins?: string[]
}

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '')
}

/** In dev, allow any origin that is localhost, 127.0.0.1, or [::1] (any port). */
function isLocalOrigin(origin: string): boolean {
  try {
    const host = new URL(origin).hostname.toLowerCase()
    return host === 'localhost' || host === '127.0.0.1' || host === '[::1]' || host === '::1'
  } catch {
    return false
  }
}

function corsOptions(origins: string[]): cors.CorsOptions {
  const allowed = new Set(origins.map(normalizeOrigin).filter(Boolean))
  const production = process.env.NODE_ENV === 'production'
  return {
    origin: (origin, callback) => {
      // curl, server-to-server
      if (!origin) return callback(null, true)
      const norm = normalizeOrigin(origin)
      callback(null, allowed.has(norm) || (!production && isLocalOrigin(norm)))
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Api-Key', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
    optionsSuccessStatus: 204,
  }
}

export function createApp(deps: AppDeps): Express {
  const app = express()
  app.disable('etag')
  app.disable('x-powered-by')
  // trust one proxy hop so the rate limiter sees the client address
  app.set('trust proxy', 1)

  app.use(cors(corsOptions(deps.corsOrigins ?? [])))
  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(express.json({ limit: '100kb' }))

  const perMinute = deps.rateLimitPerMinute ?? 120
  if (perMinute > 0) {
    app.use(
      '/api',
      rateLimit({
        windowMs: 60 * 1000,
        limit: perMinute,
        message: { message: 'Too many requests. Please wait.' },
        standardHeaders: true,
        legacyHeaders: false,
      })
    )
  }

  const operatorOnly = requireApiKey(deps.apiKeys)
  app.use('/api/jobs', createJobsRouter(deps.jobs, operatorOnly))
  app.use(
    createHealthRouter({
      pingDatabase: deps.pingDatabase,
      workerStatus: deps.workerStatus,
      heartbeat: deps.heartbeat,
      readyTimeoutMs: deps.readyTimeoutMs,
      opsAuth: deps.protectOps ? operatorOnly : undefined,
    })
  )

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Not found' })
  })

  setupSentryErrorHandler(app)

  // Body parser errors (malformed JSON, oversized body) carry a status; anything else is a 500
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err)
    if (status >= 500) withRequestId(req.requestId).error({ err: describeError(err) }, 'Unhandled request error')
    res.status(status).json({ message: status >= 500 ? 'Internal server error' : 'Invalid request body' })
  })

  return app
}

function errorStatus(err: unknown): number {
  if (err && typeof err === 'object') {
    const status: unknown = Reflect.get(err, 'status')
    if (typeof status === 'number' && status >= 400 && status < 600) return status
  }
  return 500
}
