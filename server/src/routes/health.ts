/**
 * Health, readiness, version and worker ops endpoints (no /api prefix).
 * /ops/worker needs an API key in production.
 */
import { Router, type Request, type Response, type RequestHandler } from 'express'
import { errorMessage } from '../lib/errors'
import type { WorkerHeartbeat } from '../utils/workerHeartbeat'
import type { WorkerStatus } from '../workers/workerLoop'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const BUILD_TIME = process.env.BUILD_TIME || undefined

const READYZ_TIMEOUT_MS = 5_000

export interface HealthDeps {
  /** Resolves when the job database answers. */
  pingDatabase: () => Promise<void>
  /** Status of the in-process worker; absent when the worker runs elsewhere (DISABLE_WORKER=true). */
  workerStatus?: () => WorkerStatus
  heartbeat?: WorkerHeartbeat
  /** Guard for /ops/worker; when omitted the endpoint is open. */
  opsAuth?: RequestHandler
  readyTimeoutMs?: number
}

function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  return Promise.race([
    p,
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms)
    }),
  ]).finally(() => clearTimeout(timer))
}

export function createHealthRouter(deps: HealthDeps) {
  const router = Router()
  const readyTimeoutMs = deps.readyTimeoutMs ?? READYZ_TIMEOUT_MS
  const open: RequestHandler = (_req, _res, next) => next()

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /readyz: 200 only if Postgres answers; 503 with the reason if not */
  router.get('/readyz', async (_req: Request, res: Response) => {
    try {
      await withTimeout(deps.pingDatabase(), readyTimeoutMs, 'Postgres')
    } catch (err) {
      res.status(503).json({ status: 'unhealthy', database: errorMessage(err) || 'Postgres unreachable' })
      return
    }
    res.status(200).json({ status: 'ok' })
  })

  router.get('/version', (_req: Request, res: Response) => {
    res.json({ service: 'api', release, buildTime: BUILD_TIME, env })
  })

  /** GET /ops/worker: in-process worker status and the age (ms) of the last heartbeat in Redis */
  router.get('/ops/worker', deps.opsAuth ?? open, async (_req: Request, res: Response) => {
    let lastHeartbeatAgeMs: number | null = null
    let heartbeatError: string | undefined
    if (deps.heartbeat) {
      try {
        lastHeartbeatAgeMs = await deps.heartbeat.lastBeatAgeMs()
      } catch (err) {
        heartbeatError = errorMessage(err)
      }
    }
    res.json({
      worker: deps.workerStatus ? deps.workerStatus() : null,
      lastHeartbeatAgeMs,
      ...(heartbeatError ? { heartbeatError } : {}),
    })
  })

  return router
}
