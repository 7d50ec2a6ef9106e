import './env'
import { initSentry, flushSentry } from './lib/sentry'

initSentry()
import { createApp } from './app'
import { describeError, getLogger } from './lib/logger'
import { createBackend, createHeartbeat, createPipeline, resolveBackendKind } from './services/backend'
import { createJobService } from './services/jobs'
import { loadApiKeys } from './utils/apiKey'
import { loadWorkerConfig } from './utils/workerConfig'
import { startWorker, type RunningWorker } from './workers/jobProcessor'

const log = getLogger('api')
const PORT = Number(process.env.PORT) || 3001
const production = process.env.NODE_ENV === 'production'

const config = loadWorkerConfig()
const kind = resolveBackendKind()
const backend = createBackend(kind, config)
const heartbeat = createHeartbeat()
const apiKeys = loadApiKeys()
if (apiKeys.size === 0) {
  log.warn('No API_KEY / API_KEYS configured; job reset is unavailable')
}

// Worker runs in a separate container when Dockerized (DISABLE_WORKER=true)
const runWorker = process.env.DISABLE_WORKER !== 'true'
const worker: RunningWorker | null = runWorker
  ? startWorker({ backend, config, pipeline: createPipeline(kind), heartbeat: heartbeat?.heartbeat })
  : null
if (worker) {
  log.info({ backend: kind }, 'Background worker started')
} else if (kind === 'memory') {
  log.warn('JOB_BACKEND=memory with DISABLE_WORKER=true: submitted jobs will never be processed')
}

const app = createApp({
  jobs: createJobService({
    store: backend.store,
    queue: backend.queue,
    stalenessThresholdSeconds: config.stalenessThresholdSeconds,
  }),
  apiKeys,
  protectOps: production,
  pingDatabase: () => backend.pingDatabase(),
  workerStatus: worker ? () => worker.loop.getStatus() : undefined,
  heartbeat: heartbeat?.heartbeat,
  corsOrigins: (process.env.CORS_ORIGINS || '').split(',').map((o) => o.trim()).filter(Boolean),
})

const server = app.listen(PORT, () => {
  log.info({ port: PORT, backend: kind }, 'Server listening')
})

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    log.fatal({ port: PORT }, 'Port already in use; change PORT in your .env file')
  } else {
    log.fatal({ err: describeError(error) }, 'Server error')
  }
  process.exit(1)
})

let shuttingDown = false
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  log.info({ signal }, 'Shutting down gracefully')
  await new Promise<void>((resolve) => server.close(() => resolve()))
  log.info('Server closed')
  try {
    await worker?.stop()
    await heartbeat?.close()
    await backend.close()
    await flushSentry()
  } catch (err) {
    log.error({ err: describeError(err) }, 'Error during shutdown')
    process.exitCode = 1
  }
  process.exit()
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))
